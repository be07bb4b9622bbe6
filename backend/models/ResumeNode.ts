import mongoose, { Schema } from 'mongoose';
import { ResumeStatus } from './domain';

// 简历节点在 MongoDB 中的存储形态，_id 即节点ID
export interface ResumeNodeRecord {
    _id: string;
    parentId: string | null;
    rootId: string;
    depth: number;
    name: string;
    ownerIdentity: string;
    status: ResumeStatus;
    targetCompany: string | null;
    targetPosition: string | null;
    forkCount: number;
    createdAt: Date;
    updatedAt: Date;
}

// 简历节点Schema定义
const ResumeNodeSchema = new Schema<ResumeNodeRecord>({
    _id: {
        type: String,
        required: true
    },
    // 父节点ID，根节点为null
    parentId: {
        type: String,
        default: null
    },
    // 根节点ID（方便查询整棵树）
    rootId: {
        type: String,
        required: true
    },
    // 树深度，根节点为0
    depth: {
        type: Number,
        required: true,
        min: 0
    },
    name: {
        type: String,
        required: true,
        trim: true
    },
    ownerIdentity: {
        type: String,
        required: true
    },
    status: {
        type: String,
        enum: Object.values(ResumeStatus),
        default: ResumeStatus.DRAFT
    },
    targetCompany: {
        type: String,
        default: null
    },
    targetPosition: {
        type: String,
        default: null
    },
    forkCount: {
        type: Number,
        default: 0
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
    collection: 'resume_nodes',
    // 时间戳由服务层统一赋值
    timestamps: false,
    versionKey: false
});

// 创建索引：parentId 即 父节点→子节点 的二级索引
ResumeNodeSchema.index({ parentId: 1, status: 1 });
ResumeNodeSchema.index({ rootId: 1 });
ResumeNodeSchema.index({ ownerIdentity: 1, status: 1, createdAt: 1 });

// 导出模型
const ResumeNodeModel = mongoose.model<ResumeNodeRecord>('ResumeNode', ResumeNodeSchema);

export default ResumeNodeModel;
