import type { ClientSession, Connection } from 'mongoose';
import type { RepositoryScope, UnitOfWork } from '../types';
import { MongoContentRepository } from './contentRepository';
import { MongoRoomRepository } from './roomRepository';
import { MongoTreeStore } from './treeStore';

function createScope(session: ClientSession | null): RepositoryScope {
    return {
        nodes: new MongoTreeStore(session),
        contents: new MongoContentRepository(session),
        rooms: new MongoRoomRepository(session)
    };
}

/**
 * 基于 MongoDB 多文档事务的工作单元（需要副本集）。
 * 写冲突等错误直接抛给调用方，不使用 withTransaction 的自动重试。
 */
export class MongoUnitOfWork implements UnitOfWork {
    readonly repositories: RepositoryScope = createScope(null);

    constructor(private readonly connection: Connection) { }

    async run<T>(work: (scope: RepositoryScope) => Promise<T>): Promise<T> {
        const session = await this.connection.startSession();

        try {
            session.startTransaction();
            const result = await work(createScope(session));
            await session.commitTransaction();
            return result;
        } catch (error) {
            if (session.inTransaction()) {
                await session.abortTransaction();
            }
            throw error;
        } finally {
            await session.endSession();
        }
    }
}
