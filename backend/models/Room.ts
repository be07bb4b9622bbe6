import mongoose, { Schema } from 'mongoose';

// 面试间在 MongoDB 中的存储形态
export interface RoomRecord {
    _id: string;
    name: string;
    ownerIdentity: string;
    // 关联的简历节点ID，只能指向已发布的节点
    resumeId: string | null;
    createdAt: Date;
    updatedAt: Date;
}

const RoomSchema = new Schema<RoomRecord>({
    _id: {
        type: String,
        required: true
    },
    name: {
        type: String,
        default: '面试间'
    },
    ownerIdentity: {
        type: String,
        required: true
    },
    resumeId: {
        type: String,
        default: null
    },
    createdAt: {
        type: Date,
        required: true
    },
    updatedAt: {
        type: Date,
        required: true
    }
}, {
    collection: 'rooms',
    timestamps: false,
    versionKey: false
});

RoomSchema.index({ resumeId: 1 });
RoomSchema.index({ ownerIdentity: 1 });

const RoomModel = mongoose.model<RoomRecord>('Room', RoomSchema);

export default RoomModel;
