import { ResumeStatus } from '../../models/domain';
import type { ResumeNode } from '../../models/domain';
import type { NodeChanges, NodeQuery, NodeSortOrder, TreeStore } from '../types';
import type { StateAccessor } from './state';

const COMPARATORS: Record<NodeSortOrder, (a: ResumeNode, b: ResumeNode) => number> = {
    createdAtAsc: (a, b) => a.createdAt.getTime() - b.createdAt.getTime(),
    updatedAtDesc: (a, b) => b.updatedAt.getTime() - a.updatedAt.getTime()
};

export class MemoryTreeStore implements TreeStore {
    constructor(private readonly state: StateAccessor) { }

    async findById(id: string): Promise<ResumeNode | null> {
        const node = this.state().nodes.get(id);
        return node ? { ...node } : null;
    }

    async insert(node: ResumeNode): Promise<void> {
        const { nodes, childIndex } = this.state();

        if (nodes.has(node.id)) {
            throw new Error(`节点ID重复: ${node.id}`);
        }

        nodes.set(node.id, { ...node });

        if (node.parentId !== null) {
            const siblings = childIndex.get(node.parentId) ?? [];
            childIndex.set(node.parentId, [...siblings, node.id]);
        }
    }

    async update(id: string, changes: NodeChanges): Promise<void> {
        const node = this.require(id);
        this.state().nodes.set(id, { ...node, ...changes });
    }

    async incrementForkCount(id: string): Promise<void> {
        const node = this.require(id);
        this.state().nodes.set(id, { ...node, forkCount: node.forkCount + 1 });
    }

    async findActiveChildren(parentIds: string[]): Promise<ResumeNode[]> {
        const { nodes, childIndex } = this.state();
        const children: ResumeNode[] = [];

        for (const parentId of parentIds) {
            for (const childId of childIndex.get(parentId) ?? []) {
                const child = nodes.get(childId);
                if (child && child.status !== ResumeStatus.DELETED) {
                    children.push({ ...child });
                }
            }
        }

        return children;
    }

    async markDeleted(ids: string[], at: Date): Promise<number> {
        const { nodes } = this.state();
        let count = 0;

        for (const id of new Set(ids)) {
            const node = nodes.get(id);
            if (node && node.status !== ResumeStatus.DELETED) {
                nodes.set(id, { ...node, status: ResumeStatus.DELETED, updatedAt: at });
                count += 1;
            }
        }

        return count;
    }

    async findByOwner(ownerIdentity: string, query: NodeQuery = {}): Promise<ResumeNode[]> {
        const matches = [...this.state().nodes.values()].filter(node => {
            if (node.ownerIdentity !== ownerIdentity) {
                return false;
            }
            return query.status
                ? node.status === query.status
                : node.status !== ResumeStatus.DELETED;
        });

        // Array.prototype.sort 是稳定排序，时间相同的保持插入顺序
        return matches
            .sort(COMPARATORS[query.sort ?? 'createdAtAsc'])
            .map(node => ({ ...node }));
    }

    private require(id: string): ResumeNode {
        const node = this.state().nodes.get(id);
        if (!node) {
            throw new Error(`节点不存在: ${id}`);
        }
        return node;
    }
}
