import type { ClientSession } from 'mongoose';
import RoomModel from '../../models/Room';
import type { RoomRecord } from '../../models/Room';
import type { Room } from '../../models/domain';
import type { RoomRepository } from '../types';

function toRoom(record: RoomRecord): Room {
    return {
        id: record._id,
        name: record.name,
        ownerIdentity: record.ownerIdentity,
        resumeId: record.resumeId ?? null,
        createdAt: record.createdAt,
        updatedAt: record.updatedAt
    };
}

export class MongoRoomRepository implements RoomRepository {
    constructor(private readonly session: ClientSession | null = null) { }

    async get(roomId: string): Promise<Room | null> {
        const record = await RoomModel.findById(roomId)
            .session(this.session)
            .lean<RoomRecord>()
            .exec();

        return record ? toRoom(record) : null;
    }

    async create(room: Room): Promise<void> {
        const { id, ...rest } = room;
        await new RoomModel({ _id: id, ...rest }).save({ session: this.session });
    }

    async setResumeReference(roomId: string, nodeId: string, at: Date): Promise<void> {
        const result = await RoomModel.updateOne({ _id: roomId }, { $set: { resumeId: nodeId, updatedAt: at } })
            .session(this.session)
            .exec();

        if (result.matchedCount === 0) {
            throw new Error(`面试间不存在: ${roomId}`);
        }
    }

    async countLinkedTo(nodeIds: string[]): Promise<number> {
        if (nodeIds.length === 0) {
            return 0;
        }

        return RoomModel.countDocuments({ resumeId: { $in: nodeIds } })
            .session(this.session)
            .exec();
    }

    async findLinkedTo(nodeId: string): Promise<Room[]> {
        const records = await RoomModel.find({ resumeId: nodeId })
            .sort({ createdAt: 1 })
            .session(this.session)
            .lean<RoomRecord[]>()
            .exec();

        return records.map(toRoom);
    }
}
