import { v4 as uuidv4 } from 'uuid';
import { ResumeStatus } from '../models/domain';
import type {
    ResumeContent,
    ResumeNode,
    ResumeStats,
    ResumeTreeView,
    Room
} from '../models/domain';
import type { RepositoryScope, TreeStore, UnitOfWork } from '../repositories/types';
import { logger } from '../utils/logger';
import { TreeErrorKind, failure, runOperation, success } from '../utils/result';
import type { Result } from '../utils/result';
import type { AuthorizationGate } from './authorizationGate';
import { parseContentPatch } from './contentSchema';

export const DEFAULT_MAX_DEPTH = 5;

export interface VersionTreeOptions {
    // 有效深度为 0..maxDepth-1
    maxDepth?: number;
    now?: () => Date;
    generateId?: () => string;
}

export interface NodeMetadataChanges {
    name?: string;
    targetCompany?: string | null;
    targetPosition?: string | null;
}

export interface NodeDetail {
    node: ResumeNode;
    content: ResumeContent | null;
    linkedRooms: Pick<Room, 'id' | 'name'>[];
}

export interface RoomResume {
    room: Room;
    node: ResumeNode | null;
    content: ResumeContent | null;
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * fork 出的子版本名：MMddHHmm，同一分钟内的兄弟节点允许重名
 */
export function forkName(at: Date): string {
    return `${pad(at.getMonth() + 1)}${pad(at.getDate())}${pad(at.getHours())}${pad(at.getMinutes())}`;
}

function isBlank(value: string | undefined): boolean {
    return value === undefined || value.trim() === '';
}

/**
 * 简历版本树管理
 *
 * 每个用户拥有一片简历森林：根节点由用户创建，子节点通过 fork 复制父节点内容得到。
 * 所有写操作都在一个工作单元内完成；所有操作都显式接收调用方身份。
 */
export class VersionTreeManager {
    private readonly maxDepth: number;
    private readonly now: () => Date;
    private readonly generateId: () => string;

    constructor(
        private readonly unitOfWork: UnitOfWork,
        private readonly gate: AuthorizationGate,
        options: VersionTreeOptions = {}
    ) {
        this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
        this.now = options.now ?? (() => new Date());
        this.generateId = options.generateId ?? uuidv4;
    }

    /**
     * 创建根简历，同时创建空的内容记录
     */
    async createRoot(
        ownerIdentity: string,
        name: string,
        targetCompany?: string | null,
        targetPosition?: string | null
    ): Promise<Result<ResumeNode>> {
        if (isBlank(name)) {
            return failure(TreeErrorKind.VALIDATION, '简历名称不能为空', { field: 'name' });
        }

        return runOperation<ResumeNode>('createRoot', { ownerIdentity }, () => this.unitOfWork.run(async scope => {
            const duplicate = await this.checkNameAvailable(scope.nodes, ownerIdentity, name.trim());
            if (!duplicate.ok) {
                return duplicate;
            }

            const at = this.now();
            const id = this.generateId();
            const node: ResumeNode = {
                id,
                parentId: null,
                rootId: id,
                depth: 0,
                name: name.trim(),
                ownerIdentity,
                status: ResumeStatus.DRAFT,
                targetCompany: targetCompany ?? null,
                targetPosition: targetPosition ?? null,
                forkCount: 0,
                createdAt: at,
                updatedAt: at
            };

            await scope.nodes.insert(node);
            await scope.contents.create(id, at);

            logger.info('根简历已创建', { resumeId: id, ownerIdentity });
            return success(node);
        }));
    }

    /**
     * 从父节点 fork 一个子版本，复制父节点当前的全部内容
     */
    async fork(parentId: string, requesterIdentity: string): Promise<Result<ResumeNode>> {
        return runOperation('fork', { parentId, requesterIdentity }, () => this.unitOfWork.run(async scope => {
            const loaded = await this.loadOwned(scope, parentId, requesterIdentity);
            if (!loaded.ok) {
                return loaded;
            }

            const parent = loaded.value;
            if (parent.depth >= this.maxDepth - 1) {
                return failure(
                    TreeErrorKind.DEPTH_LIMIT_EXCEEDED,
                    `简历树深度不能超过 ${this.maxDepth} 层`,
                    { parentDepth: parent.depth, maxDepth: this.maxDepth }
                );
            }

            const at = this.now();
            const child: ResumeNode = {
                id: this.generateId(),
                parentId: parent.id,
                rootId: parent.rootId,
                depth: parent.depth + 1,
                name: forkName(at),
                ownerIdentity: requesterIdentity,
                status: ResumeStatus.DRAFT,
                targetCompany: parent.targetCompany,
                targetPosition: parent.targetPosition,
                forkCount: 0,
                createdAt: at,
                updatedAt: at
            };

            await scope.nodes.insert(child);
            // 与并发的 deleteTree 写同一个父节点文档，存储层会拒绝其中一个事务
            await scope.nodes.incrementForkCount(parent.id);
            await scope.contents.copy(parent.id, child.id, at);

            logger.info('简历已 fork', { resumeId: child.id, parentId, depth: child.depth });
            return success(child);
        }));
    }

    /**
     * 软删除节点及其全部未删除的后代，返回被标记的节点数。
     * 遍历与批量标记在同一个工作单元内执行。内容记录保留。
     */
    async deleteTree(nodeId: string, requesterIdentity: string): Promise<Result<number>> {
        return runOperation('deleteTree', { nodeId, requesterIdentity }, () => this.unitOfWork.run(async scope => {
            const loaded = await this.loadOwned(scope, nodeId, requesterIdentity);
            if (!loaded.ok) {
                return loaded;
            }

            const ids = await this.collectSubtree(scope.nodes, nodeId);
            const count = await scope.nodes.markDeleted(ids, this.now());

            logger.info('简历子树已删除', { resumeId: nodeId, count });
            return success(count);
        }));
    }

    /**
     * 发布；保证已发布的节点一定有内容记录（可以为空）
     */
    async publish(nodeId: string, requesterIdentity: string): Promise<Result<ResumeNode>> {
        return runOperation('publish', { nodeId, requesterIdentity }, () => this.unitOfWork.run(async scope => {
            const loaded = await this.loadOwned(scope, nodeId, requesterIdentity);
            if (!loaded.ok) {
                return loaded;
            }

            const at = this.now();
            if (!(await scope.contents.get(nodeId))) {
                await scope.contents.create(nodeId, at);
            }

            await scope.nodes.update(nodeId, { status: ResumeStatus.PUBLISHED, updatedAt: at });

            logger.info('简历已发布', { resumeId: nodeId });
            return success({ ...loaded.value, status: ResumeStatus.PUBLISHED, updatedAt: at });
        }));
    }

    /**
     * 取消发布；对草稿调用不产生任何变化
     */
    async unpublish(nodeId: string, requesterIdentity: string): Promise<Result<ResumeNode>> {
        return runOperation('unpublish', { nodeId, requesterIdentity }, () => this.unitOfWork.run(async scope => {
            const loaded = await this.loadOwned(scope, nodeId, requesterIdentity);
            if (!loaded.ok) {
                return loaded;
            }

            const node = loaded.value;
            if (node.status === ResumeStatus.DRAFT) {
                return success(node);
            }

            const at = this.now();
            await scope.nodes.update(nodeId, { status: ResumeStatus.DRAFT, updatedAt: at });

            logger.info('简历已取消发布', { resumeId: nodeId });
            return success({ ...node, status: ResumeStatus.DRAFT, updatedAt: at });
        }));
    }

    /**
     * 更新内容，只写入传入的字段。已发布的简历被编辑后自动回到草稿状态。
     */
    async updateContent(nodeId: string, requesterIdentity: string, fields: unknown): Promise<Result<ResumeContent>> {
        const patch = parseContentPatch(fields);
        if (!patch.ok) {
            return patch;
        }

        return runOperation('updateContent', { nodeId, requesterIdentity }, () => this.unitOfWork.run(async scope => {
            const loaded = await this.loadOwned(scope, nodeId, requesterIdentity);
            if (!loaded.ok) {
                return loaded;
            }

            const at = this.now();
            const demoted = loaded.value.status === ResumeStatus.PUBLISHED;
            await scope.nodes.update(nodeId, demoted
                ? { status: ResumeStatus.DRAFT, updatedAt: at }
                : { updatedAt: at });

            const content = await scope.contents.upsert(nodeId, patch.value, at);

            logger.info('简历内容已更新', {
                resumeId: nodeId,
                fields: Object.keys(patch.value),
                demoted
            });
            return success(content);
        }));
    }

    /**
     * 修改名称和目标公司/职位，不影响发布状态
     */
    async updateMetadata(
        nodeId: string,
        requesterIdentity: string,
        changes: NodeMetadataChanges
    ): Promise<Result<ResumeNode>> {
        if (changes.name !== undefined && isBlank(changes.name)) {
            return failure(TreeErrorKind.VALIDATION, '简历名称不能为空', { field: 'name' });
        }

        return runOperation<ResumeNode>('updateMetadata', { nodeId, requesterIdentity }, () => this.unitOfWork.run(async scope => {
            const loaded = await this.loadOwned(scope, nodeId, requesterIdentity);
            if (!loaded.ok) {
                return loaded;
            }

            const node = loaded.value;
            if (changes.name !== undefined && changes.name.trim() !== node.name) {
                const duplicate = await this.checkNameAvailable(scope.nodes, node.ownerIdentity, changes.name.trim(), node.id);
                if (!duplicate.ok) {
                    return duplicate;
                }
            }

            const updated: ResumeNode = {
                ...node,
                name: changes.name !== undefined ? changes.name.trim() : node.name,
                targetCompany: changes.targetCompany !== undefined ? changes.targetCompany : node.targetCompany,
                targetPosition: changes.targetPosition !== undefined ? changes.targetPosition : node.targetPosition,
                updatedAt: this.now()
            };

            await scope.nodes.update(nodeId, {
                name: updated.name,
                targetCompany: updated.targetCompany,
                targetPosition: updated.targetPosition,
                updatedAt: updated.updatedAt
            });

            logger.info('简历信息已更新', { resumeId: nodeId });
            return success(updated);
        }));
    }

    /**
     * 将已发布的简历关联到面试间
     */
    async linkToRoom(nodeId: string, roomId: string, requesterIdentity: string): Promise<Result<void>> {
        return runOperation('linkToRoom', { nodeId, roomId, requesterIdentity }, () => this.unitOfWork.run(async scope => {
            const loaded = await this.loadOwned(scope, nodeId, requesterIdentity);
            if (!loaded.ok) {
                return loaded;
            }

            const room = await scope.rooms.get(roomId);
            if (!room) {
                return failure(TreeErrorKind.NOT_FOUND, '面试间不存在', { roomId });
            }

            const access = this.gate.authorize(requesterIdentity, room, { type: 'room', id: roomId });
            if (!access.ok) {
                return access;
            }

            if (loaded.value.status !== ResumeStatus.PUBLISHED) {
                return failure(TreeErrorKind.NOT_PUBLISHED, '只有已发布的简历才能关联到面试间', {
                    resumeId: nodeId,
                    status: loaded.value.status
                });
            }

            await scope.rooms.setResumeReference(roomId, nodeId, this.now());

            logger.info('简历已关联面试间', { resumeId: nodeId, roomId });
            return success(undefined);
        }));
    }

    /**
     * 获取用户的全部简历树（按创建时间升序，已删除节点不出现）
     */
    async listTrees(ownerIdentity: string): Promise<Result<ResumeTreeView[]>> {
        return runOperation('listTrees', { ownerIdentity }, async () => {
            const nodes = await this.unitOfWork.repositories.nodes.findByOwner(ownerIdentity, { sort: 'createdAtAsc' });
            return success(this.assembleForest(nodes));
        });
    }

    /**
     * 可关联面试间的简历：已发布，最近更新的在前
     */
    async getAvailablePublished(ownerIdentity: string): Promise<Result<ResumeNode[]>> {
        return runOperation('getAvailablePublished', { ownerIdentity }, async () => {
            const nodes = await this.unitOfWork.repositories.nodes.findByOwner(ownerIdentity, {
                status: ResumeStatus.PUBLISHED,
                sort: 'updatedAtDesc'
            });
            return success(nodes);
        });
    }

    async getStats(ownerIdentity: string): Promise<Result<ResumeStats>> {
        return runOperation('getStats', { ownerIdentity }, async () => {
            const { nodes, rooms } = this.unitOfWork.repositories;
            const active = await nodes.findByOwner(ownerIdentity);
            const linkedRooms = await rooms.countLinkedTo(active.map(node => node.id));

            return success({
                total: active.length,
                published: active.filter(node => node.status === ResumeStatus.PUBLISHED).length,
                draft: active.filter(node => node.status === ResumeStatus.DRAFT).length,
                linkedRooms
            });
        });
    }

    /**
     * 单个版本的详情：节点、内容及引用它的面试间
     */
    async getNode(nodeId: string, requesterIdentity: string): Promise<Result<NodeDetail>> {
        return runOperation('getNode', { nodeId, requesterIdentity }, async () => {
            const scope = this.unitOfWork.repositories;
            const loaded = await this.loadOwned(scope, nodeId, requesterIdentity);
            if (!loaded.ok) {
                return loaded;
            }

            const content = await scope.contents.get(nodeId);
            const rooms = await scope.rooms.findLinkedTo(nodeId);

            return success({
                node: loaded.value,
                content,
                linkedRooms: rooms.map(room => ({ id: room.id, name: room.name }))
            });
        });
    }

    /**
     * 按面试间取其关联的简历；未关联或简历已删除时返回 null
     */
    async getResumeForRoom(roomId: string, requesterIdentity: string): Promise<Result<RoomResume>> {
        return runOperation<RoomResume>('getResumeForRoom', { roomId, requesterIdentity }, async () => {
            const scope = this.unitOfWork.repositories;
            const room = await scope.rooms.get(roomId);
            if (!room) {
                return failure(TreeErrorKind.NOT_FOUND, '面试间不存在', { roomId });
            }

            const access = this.gate.authorize(requesterIdentity, room, { type: 'room', id: roomId });
            if (!access.ok) {
                return access;
            }

            if (room.resumeId === null) {
                return success({ room, node: null, content: null });
            }

            const node = await scope.nodes.findById(room.resumeId);
            if (!node || node.status === ResumeStatus.DELETED) {
                logger.warn('面试间引用的简历不存在', { roomId, resumeId: room.resumeId });
                return success({ room, node: null, content: null });
            }

            return success({ room, node, content: await scope.contents.get(node.id) });
        });
    }

    /**
     * 读取未删除的节点并校验所有权；已删除的节点视为不存在
     */
    private async loadOwned(
        scope: RepositoryScope,
        nodeId: string,
        requesterIdentity: string
    ): Promise<Result<ResumeNode>> {
        const node = await scope.nodes.findById(nodeId);

        if (!node || node.status === ResumeStatus.DELETED) {
            return failure(TreeErrorKind.NOT_FOUND, '找不到指定的简历', { resumeId: nodeId });
        }

        const access = this.gate.authorize(requesterIdentity, node, { type: 'resume', id: nodeId });
        if (!access.ok) {
            return access;
        }

        return success(node);
    }

    /**
     * 同一用户未删除的根简历之间名称不能重复；fork 自动生成的名称不参与检查
     */
    private async checkNameAvailable(
        nodes: TreeStore,
        ownerIdentity: string,
        name: string,
        excludeId?: string
    ): Promise<Result<void>> {
        const active = await nodes.findByOwner(ownerIdentity);
        const taken = active.some(node =>
            node.parentId === null && node.name === name && node.id !== excludeId);

        if (taken) {
            return failure(TreeErrorKind.VALIDATION, `简历名称 '${name}' 已存在，请使用其他名称`, { field: 'name' });
        }

        return success(undefined);
    }

    /**
     * 沿父节点→子节点索引逐层展开，收集节点自身及全部未删除的后代
     */
    private async collectSubtree(nodes: TreeStore, nodeId: string): Promise<string[]> {
        const collected = [nodeId];
        const seen = new Set(collected);
        let frontier = [nodeId];

        while (frontier.length > 0) {
            const children = await nodes.findActiveChildren(frontier);
            frontier = children.map(child => child.id).filter(id => !seen.has(id));
            frontier.forEach(id => seen.add(id));
            collected.push(...frontier);
        }

        return collected;
    }

    /**
     * 按 parentId 组装森林。父节点不在活动集合中的节点不会出现在结果里。
     */
    private assembleForest(nodes: ResumeNode[]): ResumeTreeView[] {
        const views = new Map<string, ResumeTreeView>(
            nodes.map(node => [node.id, { ...node, children: [] }])
        );
        const roots: ResumeTreeView[] = [];

        for (const node of nodes) {
            const view = views.get(node.id);
            if (!view) {
                continue;
            }

            if (node.parentId === null) {
                roots.push(view);
                continue;
            }

            const parent = views.get(node.parentId);
            if (parent) {
                parent.children.push(view);
            } else {
                logger.warn('发现孤立的简历节点', { resumeId: node.id, parentId: node.parentId });
            }
        }

        return roots;
    }
}
