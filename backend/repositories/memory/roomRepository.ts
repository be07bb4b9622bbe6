import type { Room } from '../../models/domain';
import type { RoomRepository } from '../types';
import type { StateAccessor } from './state';

export class MemoryRoomRepository implements RoomRepository {
    constructor(private readonly state: StateAccessor) { }

    async get(roomId: string): Promise<Room | null> {
        const room = this.state().rooms.get(roomId);
        return room ? { ...room } : null;
    }

    async create(room: Room): Promise<void> {
        const { rooms } = this.state();
        if (rooms.has(room.id)) {
            throw new Error(`面试间ID重复: ${room.id}`);
        }
        rooms.set(room.id, { ...room });
    }

    async setResumeReference(roomId: string, nodeId: string, at: Date): Promise<void> {
        const { rooms } = this.state();
        const room = rooms.get(roomId);
        if (!room) {
            throw new Error(`面试间不存在: ${roomId}`);
        }
        rooms.set(roomId, { ...room, resumeId: nodeId, updatedAt: at });
    }

    async countLinkedTo(nodeIds: string[]): Promise<number> {
        const targets = new Set(nodeIds);
        return [...this.state().rooms.values()]
            .filter(room => room.resumeId !== null && targets.has(room.resumeId))
            .length;
    }

    async findLinkedTo(nodeId: string): Promise<Room[]> {
        return [...this.state().rooms.values()]
            .filter(room => room.resumeId === nodeId)
            .map(room => ({ ...room }));
    }
}
