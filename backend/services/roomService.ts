import { v4 as uuidv4 } from 'uuid';
import type { Room } from '../models/domain';
import type { UnitOfWork } from '../repositories/types';
import { logger } from '../utils/logger';
import { TreeErrorKind, failure, runOperation, success } from '../utils/result';
import type { Result } from '../utils/result';
import type { AuthorizationGate } from './authorizationGate';

export const DEFAULT_ROOM_NAME = '面试间';

export interface RoomServiceOptions {
    now?: () => Date;
    generateId?: () => string;
}

/**
 * 面试间的最小实现：只负责所有权和简历引用，与简历节点共用同一个鉴权门
 */
export class RoomService {
    private readonly now: () => Date;
    private readonly generateId: () => string;

    constructor(
        private readonly unitOfWork: UnitOfWork,
        private readonly gate: AuthorizationGate,
        options: RoomServiceOptions = {}
    ) {
        this.now = options.now ?? (() => new Date());
        this.generateId = options.generateId ?? uuidv4;
    }

    async createRoom(ownerIdentity: string, name?: string): Promise<Result<Room>> {
        return runOperation('createRoom', { ownerIdentity }, () => this.unitOfWork.run(async scope => {
            const at = this.now();
            const room: Room = {
                id: this.generateId(),
                name: name && name.trim() !== '' ? name.trim() : DEFAULT_ROOM_NAME,
                ownerIdentity,
                resumeId: null,
                createdAt: at,
                updatedAt: at
            };

            await scope.rooms.create(room);

            logger.info('面试间已创建', { roomId: room.id, ownerIdentity });
            return success(room);
        }));
    }

    async getRoom(roomId: string, requesterIdentity: string): Promise<Result<Room>> {
        return runOperation('getRoom', { roomId, requesterIdentity }, async () => {
            const room = await this.unitOfWork.repositories.rooms.get(roomId);
            if (!room) {
                return failure(TreeErrorKind.NOT_FOUND, '面试间不存在', { roomId });
            }

            const access = this.gate.authorize(requesterIdentity, room, { type: 'room', id: roomId });
            if (!access.ok) {
                return access;
            }

            return success(room);
        });
    }
}
