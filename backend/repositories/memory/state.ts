import type { ResumeContent, ResumeNode, Room } from '../../models/domain';

/**
 * 进程内存储的全部状态：节点平铺表 + 父节点→子节点索引
 */
export interface MemoryState {
    nodes: Map<string, ResumeNode>;
    // 插入顺序即创建顺序；只增不减，删除靠节点状态过滤
    childIndex: Map<string, string[]>;
    contents: Map<string, ResumeContent>;
    rooms: Map<string, Room>;
}

export function createMemoryState(): MemoryState {
    return {
        nodes: new Map(),
        childIndex: new Map(),
        contents: new Map(),
        rooms: new Map()
    };
}

export type StateAccessor = () => MemoryState;
