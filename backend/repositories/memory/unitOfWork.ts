import type { RepositoryScope, UnitOfWork } from '../types';
import { MemoryContentRepository } from './contentRepository';
import { MemoryRoomRepository } from './roomRepository';
import { createMemoryState } from './state';
import type { MemoryState, StateAccessor } from './state';
import { MemoryTreeStore } from './treeStore';

function createScope(state: StateAccessor): RepositoryScope {
    return {
        nodes: new MemoryTreeStore(state),
        contents: new MemoryContentRepository(state),
        rooms: new MemoryRoomRepository(state)
    };
}

/**
 * 进程内工作单元：每个单元在状态副本上执行，成功后整体替换，失败则丢弃副本。
 * 单元之间串行执行，因此遍历与批量标记之间不会插入其他写入。
 */
export class MemoryUnitOfWork implements UnitOfWork {
    private state: MemoryState = createMemoryState();
    private tail: Promise<void> = Promise.resolve();

    readonly repositories: RepositoryScope = createScope(() => this.state);

    run<T>(work: (scope: RepositoryScope) => Promise<T>): Promise<T> {
        const next = this.tail.then(() => this.execute(work));
        // 队列只关心顺序；失败结果仍由 next 交给调用方
        this.tail = next.then(() => undefined, () => undefined);
        return next;
    }

    private async execute<T>(work: (scope: RepositoryScope) => Promise<T>): Promise<T> {
        const draft = structuredClone(this.state);
        const result = await work(createScope(() => draft));
        this.state = draft;
        return result;
    }
}
