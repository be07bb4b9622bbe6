import mongoose from 'mongoose';
import type { StorageDriver } from '../config/app';
import { MemoryUnitOfWork } from '../repositories/memory/unitOfWork';
import { MongoUnitOfWork } from '../repositories/mongo/unitOfWork';
import type { UnitOfWork } from '../repositories/types';
import { AuthorizationGate } from './authorizationGate';
import { RoomService } from './roomService';
import { VersionTreeManager } from './versionTreeManager';
import type { VersionTreeOptions } from './versionTreeManager';

export interface Services {
    versionTree: VersionTreeManager;
    rooms: RoomService;
}

export function createUnitOfWork(driver: StorageDriver): UnitOfWork {
    return driver === 'memory'
        ? new MemoryUnitOfWork()
        : new MongoUnitOfWork(mongoose.connection);
}

/**
 * 进程启动时构造一次，再显式传给路由
 */
export function createServices(unitOfWork: UnitOfWork, options: VersionTreeOptions = {}): Services {
    const gate = new AuthorizationGate();

    return {
        versionTree: new VersionTreeManager(unitOfWork, gate, options),
        rooms: new RoomService(unitOfWork, gate, { now: options.now, generateId: options.generateId })
    };
}
