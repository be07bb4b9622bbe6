import type { ClientSession, FilterQuery, SortOrder } from 'mongoose';
import ResumeNodeModel from '../../models/ResumeNode';
import type { ResumeNodeRecord } from '../../models/ResumeNode';
import { ResumeStatus } from '../../models/domain';
import type { ResumeNode } from '../../models/domain';
import type { NodeChanges, NodeQuery, NodeSortOrder, TreeStore } from '../types';

const SORTS: Record<NodeSortOrder, Record<string, SortOrder>> = {
    createdAtAsc: { createdAt: 1, _id: 1 },
    updatedAtDesc: { updatedAt: -1, _id: 1 }
};

function toNode(record: ResumeNodeRecord): ResumeNode {
    return {
        id: record._id,
        parentId: record.parentId ?? null,
        rootId: record.rootId,
        depth: record.depth,
        name: record.name,
        ownerIdentity: record.ownerIdentity,
        status: record.status,
        targetCompany: record.targetCompany ?? null,
        targetPosition: record.targetPosition ?? null,
        forkCount: record.forkCount ?? 0,
        createdAt: record.createdAt,
        updatedAt: record.updatedAt
    };
}

/**
 * 基于 MongoDB 的节点存储；传入 session 时所有读写都在该事务内
 */
export class MongoTreeStore implements TreeStore {
    constructor(private readonly session: ClientSession | null = null) { }

    async findById(id: string): Promise<ResumeNode | null> {
        const record = await ResumeNodeModel.findById(id)
            .session(this.session)
            .lean<ResumeNodeRecord>()
            .exec();

        return record ? toNode(record) : null;
    }

    async insert(node: ResumeNode): Promise<void> {
        const { id, ...rest } = node;
        const record = new ResumeNodeModel({ _id: id, ...rest });
        await record.save({ session: this.session });
    }

    async update(id: string, changes: NodeChanges): Promise<void> {
        const result = await ResumeNodeModel.updateOne({ _id: id }, { $set: changes })
            .session(this.session)
            .exec();

        if (result.matchedCount === 0) {
            throw new Error(`节点不存在: ${id}`);
        }
    }

    async incrementForkCount(id: string): Promise<void> {
        const result = await ResumeNodeModel.updateOne({ _id: id }, { $inc: { forkCount: 1 } })
            .session(this.session)
            .exec();

        if (result.matchedCount === 0) {
            throw new Error(`节点不存在: ${id}`);
        }
    }

    async findActiveChildren(parentIds: string[]): Promise<ResumeNode[]> {
        if (parentIds.length === 0) {
            return [];
        }

        const records = await ResumeNodeModel.find({
            parentId: { $in: parentIds },
            status: { $ne: ResumeStatus.DELETED }
        })
            .session(this.session)
            .lean<ResumeNodeRecord[]>()
            .exec();

        return records.map(toNode);
    }

    async markDeleted(ids: string[], at: Date): Promise<number> {
        if (ids.length === 0) {
            return 0;
        }

        const result = await ResumeNodeModel.updateMany(
            { _id: { $in: ids }, status: { $ne: ResumeStatus.DELETED } },
            { $set: { status: ResumeStatus.DELETED, updatedAt: at } }
        )
            .session(this.session)
            .exec();

        return result.modifiedCount;
    }

    async findByOwner(ownerIdentity: string, query: NodeQuery = {}): Promise<ResumeNode[]> {
        const filter: FilterQuery<ResumeNodeRecord> = {
            ownerIdentity,
            status: query.status ?? { $ne: ResumeStatus.DELETED }
        };

        const records = await ResumeNodeModel.find(filter)
            .sort(SORTS[query.sort ?? 'createdAtAsc'])
            .session(this.session)
            .lean<ResumeNodeRecord[]>()
            .exec();

        return records.map(toNode);
    }
}
