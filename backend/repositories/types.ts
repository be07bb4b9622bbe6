import type {
    ContentPatch,
    ResumeContent,
    ResumeNode,
    ResumeStatus,
    Room
} from '../models/domain';

export type NodeSortOrder = 'createdAtAsc' | 'updatedAtDesc';

export interface NodeQuery {
    // 不指定时返回所有未删除的节点
    status?: ResumeStatus;
    sort?: NodeSortOrder;
}

export type NodeChanges = Partial<Pick<ResumeNode,
    'status' | 'name' | 'targetCompany' | 'targetPosition' | 'updatedAt'>>;

/**
 * 简历节点存储。按ID点查，按父节点ID查子节点（二级索引），按所有者扫描。
 */
export interface TreeStore {
    // 包含已删除节点
    findById(id: string): Promise<ResumeNode | null>;
    insert(node: ResumeNode): Promise<void>;
    update(id: string, changes: NodeChanges): Promise<void>;
    incrementForkCount(id: string): Promise<void>;
    // 只返回未删除的子节点
    findActiveChildren(parentIds: string[]): Promise<ResumeNode[]>;
    // 批量标记删除，返回实际被标记的数量
    markDeleted(ids: string[], at: Date): Promise<number>;
    findByOwner(ownerIdentity: string, query?: NodeQuery): Promise<ResumeNode[]>;
}

/**
 * 简历内容存储，以节点ID为键
 */
export interface ContentRepository {
    get(nodeId: string): Promise<ResumeContent | null>;
    create(nodeId: string, at: Date): Promise<ResumeContent>;
    upsert(nodeId: string, patch: ContentPatch, at: Date): Promise<ResumeContent>;
    // 逐字段深拷贝，仅供 fork 使用
    copy(fromNodeId: string, toNodeId: string, at: Date): Promise<ResumeContent>;
}

/**
 * 面试间存储
 */
export interface RoomRepository {
    get(roomId: string): Promise<Room | null>;
    create(room: Room): Promise<void>;
    setResumeReference(roomId: string, nodeId: string, at: Date): Promise<void>;
    countLinkedTo(nodeIds: string[]): Promise<number>;
    findLinkedTo(nodeId: string): Promise<Room[]>;
}

export interface RepositoryScope {
    nodes: TreeStore;
    contents: ContentRepository;
    rooms: RoomRepository;
}

/**
 * 原子工作单元：work 中的全部写入要么一起提交，要么全部丢弃。
 * 不做自动重试。
 */
export interface UnitOfWork {
    // 事务外的只读视图
    readonly repositories: RepositoryScope;
    run<T>(work: (scope: RepositoryScope) => Promise<T>): Promise<T>;
}
