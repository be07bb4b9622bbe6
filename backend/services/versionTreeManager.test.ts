import { afterEach, describe, expect, it, vi } from 'vitest';
import { ResumeStatus } from '../models/domain';
import type { ResumeNode, ResumeTreeView } from '../models/domain';
import { MemoryContentRepository } from '../repositories/memory/contentRepository';
import { MemoryTreeStore } from '../repositories/memory/treeStore';
import { MemoryUnitOfWork } from '../repositories/memory/unitOfWork';
import { TreeErrorKind } from '../utils/result';
import type { Result, TreeError } from '../utils/result';
import { createServices } from './index';
import { forkName } from './versionTreeManager';

const ALICE = 'alice';
const MALLORY = 'mallory';

// 2025-03-07 09:05（本地时间），每次取时间前进一分钟
function setup(maxDepth = 5) {
    let tick = 0;
    let seq = 0;
    const base = new Date(2025, 2, 7, 9, 5).getTime();
    const unitOfWork = new MemoryUnitOfWork();
    const services = createServices(unitOfWork, {
        maxDepth,
        now: () => new Date(base + (tick++) * 60_000),
        generateId: () => `id-${++seq}`
    });

    return { unitOfWork, ...services };
}

function expectOk<T>(result: Result<T>): T {
    if (!result.ok) {
        throw new Error(`expected success, got ${result.error.kind}: ${result.error.message}`);
    }
    return result.value;
}

function expectError<T>(result: Result<T>, kind: TreeErrorKind): TreeError {
    if (result.ok) {
        throw new Error(`expected ${kind}, got success`);
    }
    expect(result.error.kind).toBe(kind);
    return result.error;
}

function ids(views: ResumeTreeView[]): string[] {
    return views.map(view => view.id);
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe('forkName', () => {
    it('formats local month, day, hour and minute as MMddHHmm', () => {
        expect(forkName(new Date(2025, 2, 7, 9, 5))).toBe('03070905');
        expect(forkName(new Date(2024, 11, 31, 23, 59))).toBe('12312359');
    });
});

describe('createRoot', () => {
    it('creates a draft root at depth 0 with an empty content record', async () => {
        const { versionTree } = setup();

        const root = expectOk(await versionTree.createRoot(ALICE, '  后端工程师  ', '某公司', null));

        expect(root).toMatchObject({
            id: 'id-1',
            parentId: null,
            rootId: 'id-1',
            depth: 0,
            name: '后端工程师',
            ownerIdentity: ALICE,
            status: ResumeStatus.DRAFT,
            targetCompany: '某公司',
            targetPosition: null,
            forkCount: 0
        });

        const detail = expectOk(await versionTree.getNode(root.id, ALICE));
        expect(detail.content).toMatchObject({
            nodeId: 'id-1',
            fullName: null,
            summary: null,
            education: [],
            experience: []
        });
        expect(detail.linkedRooms).toEqual([]);
    });

    it('rejects a blank name', async () => {
        const { versionTree } = setup();

        const error = expectError(await versionTree.createRoot(ALICE, '   '), TreeErrorKind.VALIDATION);
        expect(error.message).toBe('简历名称不能为空');
        expect(expectOk(await versionTree.listTrees(ALICE))).toEqual([]);
    });

    it('rejects a name already used by another live root of the same owner', async () => {
        const { versionTree } = setup();
        const first = expectOk(await versionTree.createRoot(ALICE, 'Java简历'));

        const error = expectError(await versionTree.createRoot(ALICE, ' Java简历 '), TreeErrorKind.VALIDATION);
        expect(error.message).toBe("简历名称 'Java简历' 已存在，请使用其他名称");
        expect(error.details).toEqual({ field: 'name' });

        expectOk(await versionTree.createRoot(MALLORY, 'Java简历'));
        expectOk(await versionTree.deleteTree(first.id, ALICE));
        expectOk(await versionTree.createRoot(ALICE, 'Java简历'));
    });

    it('does not compare against auto-named forks', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        const child = expectOk(await versionTree.fork(root.id, ALICE));

        expectOk(await versionTree.createRoot(ALICE, child.name));
    });

    it('leaves nothing behind when the content record cannot be created', async () => {
        const { versionTree, unitOfWork } = setup();
        vi.spyOn(MemoryContentRepository.prototype, 'create').mockRejectedValueOnce(new Error('disk full'));

        expectError(await versionTree.createRoot(ALICE, 'root'), TreeErrorKind.STORAGE_FAILURE);

        expect(await unitOfWork.repositories.nodes.findById('id-1')).toBeNull();
        expect(expectOk(await versionTree.listTrees(ALICE))).toEqual([]);
    });
});

describe('fork', () => {
    it('creates a child one level deeper in the same tree, named by the fork time', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root', '甲公司', '后端'));

        const child = expectOk(await versionTree.fork(root.id, ALICE));

        expect(child).toMatchObject({
            parentId: root.id,
            rootId: root.id,
            depth: 1,
            name: '03070906',
            ownerIdentity: ALICE,
            status: ResumeStatus.DRAFT,
            targetCompany: '甲公司',
            targetPosition: '后端'
        });

        const parent = expectOk(await versionTree.getNode(root.id, ALICE));
        expect(parent.node.forkCount).toBe(1);
    });

    it('copies the parent content so later edits stay independent', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        expectOk(await versionTree.updateContent(root.id, ALICE, {
            fullName: 'Alice',
            experience: [{ company: 'A', title: 'dev', start: '2020', end: '2022', highlights: ['x'] }]
        }));

        const child = expectOk(await versionTree.fork(root.id, ALICE));
        const copied = expectOk(await versionTree.getNode(child.id, ALICE));
        expect(copied.content?.fullName).toBe('Alice');
        expect(copied.content?.experience[0].highlights).toEqual(['x']);

        expectOk(await versionTree.updateContent(child.id, ALICE, {
            fullName: 'Bob',
            experience: [{ company: 'B', title: 'lead', start: '2022', end: '', highlights: ['y', 'z'] }]
        }));

        const parent = expectOk(await versionTree.getNode(root.id, ALICE));
        expect(parent.content?.fullName).toBe('Alice');
        expect(parent.content?.experience).toEqual([
            { company: 'A', title: 'dev', start: '2020', end: '2022', highlights: ['x'] }
        ]);
    });

    it('allows depths 0 through 4 and rejects a fork below depth 4', async () => {
        const { versionTree } = setup();
        let node: ResumeNode = expectOk(await versionTree.createRoot(ALICE, 'root'));

        for (let depth = 1; depth <= 4; depth++) {
            node = expectOk(await versionTree.fork(node.id, ALICE));
            expect(node.depth).toBe(depth);
        }

        const error = expectError(await versionTree.fork(node.id, ALICE), TreeErrorKind.DEPTH_LIMIT_EXCEEDED);
        expect(error.message).toBe('简历树深度不能超过 5 层');
    });

    it('honours a configured depth limit', async () => {
        const { versionTree } = setup(2);
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        const child = expectOk(await versionTree.fork(root.id, ALICE));

        expectError(await versionTree.fork(child.id, ALICE), TreeErrorKind.DEPTH_LIMIT_EXCEEDED);
    });

    it('rolls back the child when the content copy fails', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        vi.spyOn(MemoryContentRepository.prototype, 'copy').mockRejectedValueOnce(new Error('disk full'));

        const error = expectError(await versionTree.fork(root.id, ALICE), TreeErrorKind.STORAGE_FAILURE);
        expect(error.message).toBe('存储操作失败: disk full');
        expect(error.details).toEqual({ operation: 'fork' });

        const trees = expectOk(await versionTree.listTrees(ALICE));
        expect(ids(trees)).toEqual([root.id]);
        expect(trees[0].children).toEqual([]);
        expect(trees[0].forkCount).toBe(0);
    });
});

describe('deleteTree', () => {
    it('marks the node and every live descendant deleted and returns the count', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        const child = expectOk(await versionTree.fork(root.id, ALICE));
        const grandchild = expectOk(await versionTree.fork(child.id, ALICE));

        expect(expectOk(await versionTree.deleteTree(root.id, ALICE))).toBe(3);

        for (const id of [root.id, child.id, grandchild.id]) {
            expectError(await versionTree.getNode(id, ALICE), TreeErrorKind.NOT_FOUND);
        }
        expect(expectOk(await versionTree.listTrees(ALICE))).toEqual([]);
    });

    it('keeps the deleted nodes and their content as tombstones', async () => {
        const { versionTree, unitOfWork } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        const child = expectOk(await versionTree.fork(root.id, ALICE));
        const grandchild = expectOk(await versionTree.fork(child.id, ALICE));
        expectOk(await versionTree.deleteTree(root.id, ALICE));

        const { nodes, contents } = unitOfWork.repositories;
        for (const id of [root.id, child.id, grandchild.id]) {
            expect((await nodes.findById(id))?.status).toBe(ResumeStatus.DELETED);
            expect((await contents.get(id))?.nodeId).toBe(id);
        }
    });

    it('changes no status when the batch mark fails', async () => {
        const { versionTree, unitOfWork } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        const child = expectOk(await versionTree.fork(root.id, ALICE));
        expectOk(await versionTree.publish(root.id, ALICE));
        vi.spyOn(MemoryTreeStore.prototype, 'markDeleted').mockRejectedValueOnce(new Error('disk full'));

        expectError(await versionTree.deleteTree(root.id, ALICE), TreeErrorKind.STORAGE_FAILURE);

        const { nodes } = unitOfWork.repositories;
        expect((await nodes.findById(root.id))?.status).toBe(ResumeStatus.PUBLISHED);
        expect((await nodes.findById(child.id))?.status).toBe(ResumeStatus.DRAFT);
    });

    it('returns 1 for a leaf and leaves the rest of the tree intact', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        const leaf = expectOk(await versionTree.fork(root.id, ALICE));

        expect(expectOk(await versionTree.deleteTree(leaf.id, ALICE))).toBe(1);

        const trees = expectOk(await versionTree.listTrees(ALICE));
        expect(ids(trees)).toEqual([root.id]);
        expect(trees[0].children).toEqual([]);
    });

    it('does not count descendants that were already deleted', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        const first = expectOk(await versionTree.fork(root.id, ALICE));
        expectOk(await versionTree.fork(root.id, ALICE));
        expectOk(await versionTree.deleteTree(first.id, ALICE));

        expect(expectOk(await versionTree.deleteTree(root.id, ALICE))).toBe(2);
    });

    it('treats an already deleted node as missing', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        expectOk(await versionTree.deleteTree(root.id, ALICE));

        expectError(await versionTree.deleteTree(root.id, ALICE), TreeErrorKind.NOT_FOUND);
        expectError(await versionTree.fork(root.id, ALICE), TreeErrorKind.NOT_FOUND);
        expectError(await versionTree.publish(root.id, ALICE), TreeErrorKind.NOT_FOUND);
    });
});

describe('concurrent fork and deleteTree', () => {
    it('includes the new child when the fork runs first', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));

        const [forked, deleted] = await Promise.all([
            versionTree.fork(root.id, ALICE),
            versionTree.deleteTree(root.id, ALICE)
        ]);

        const child = expectOk(forked);
        expect(expectOk(deleted)).toBe(2);
        expectError(await versionTree.getNode(child.id, ALICE), TreeErrorKind.NOT_FOUND);
    });

    it('rejects the fork when the delete runs first', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));

        const [deleted, forked] = await Promise.all([
            versionTree.deleteTree(root.id, ALICE),
            versionTree.fork(root.id, ALICE)
        ]);

        expect(expectOk(deleted)).toBe(1);
        expectError(forked, TreeErrorKind.NOT_FOUND);
        expect(expectOk(await versionTree.listTrees(ALICE))).toEqual([]);
    });
});

describe('publish and unpublish', () => {
    it('publishes a draft and unpublishes it again', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));

        expect(expectOk(await versionTree.publish(root.id, ALICE)).status).toBe(ResumeStatus.PUBLISHED);
        expect(expectOk(await versionTree.unpublish(root.id, ALICE)).status).toBe(ResumeStatus.DRAFT);
    });

    it('leaves a draft untouched when unpublished', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));

        expect(expectOk(await versionTree.unpublish(root.id, ALICE))).toEqual(root);
        expect(expectOk(await versionTree.unpublish(root.id, ALICE))).toEqual(root);
        expect(expectOk(await versionTree.getNode(root.id, ALICE)).node).toEqual(root);
    });
});

describe('updateContent', () => {
    it('writes only the supplied fields and clears fields set to null', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        expectOk(await versionTree.updateContent(root.id, ALICE, { fullName: 'Alice', email: 'alice@example.com' }));

        const content = expectOk(await versionTree.updateContent(root.id, ALICE, {
            email: null,
            skills: [{ category: '语言', items: ['TypeScript'] }]
        }));

        expect(content.fullName).toBe('Alice');
        expect(content.email).toBeNull();
        expect(content.skills).toEqual([{ category: '语言', items: ['TypeScript'] }]);
    });

    it('returns a published resume to draft', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        expectOk(await versionTree.publish(root.id, ALICE));

        expectOk(await versionTree.updateContent(root.id, ALICE, { summary: '更新' }));

        expect(expectOk(await versionTree.getNode(root.id, ALICE)).node.status).toBe(ResumeStatus.DRAFT);
    });

    it('leaves a draft as a draft', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));

        expectOk(await versionTree.updateContent(root.id, ALICE, { summary: '草稿' }));

        expect(expectOk(await versionTree.getNode(root.id, ALICE)).node.status).toBe(ResumeStatus.DRAFT);
    });

    it('keeps a published resume published when the content write fails', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        expectOk(await versionTree.updateContent(root.id, ALICE, { summary: '原文' }));
        expectOk(await versionTree.publish(root.id, ALICE));
        vi.spyOn(MemoryContentRepository.prototype, 'upsert').mockRejectedValueOnce(new Error('disk full'));

        const error = expectError(
            await versionTree.updateContent(root.id, ALICE, { summary: '新内容' }),
            TreeErrorKind.STORAGE_FAILURE
        );
        expect(error.details).toEqual({ operation: 'updateContent' });

        const detail = expectOk(await versionTree.getNode(root.id, ALICE));
        expect(detail.node.status).toBe(ResumeStatus.PUBLISHED);
        expect(detail.content?.summary).toBe('原文');
    });

    it('fills missing record fields with empty values', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));

        const content = expectOk(await versionTree.updateContent(root.id, ALICE, {
            education: [{ school: '某大学' }]
        }));

        expect(content.education).toEqual([{ school: '某大学', degree: '', major: '', start: '', end: '' }]);
    });

    it('rejects malformed content without touching the node', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        expectOk(await versionTree.publish(root.id, ALICE));

        const error = expectError(
            await versionTree.updateContent(root.id, ALICE, { fullName: 42 }),
            TreeErrorKind.VALIDATION
        );
        expect(error.details).toEqual({ fields: { fullName: ['Expected string, received number'] } });
        expect(expectOk(await versionTree.getNode(root.id, ALICE)).node.status).toBe(ResumeStatus.PUBLISHED);
    });
});

describe('updateMetadata', () => {
    it('renames and retargets without changing the status', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root', '甲公司'));
        expectOk(await versionTree.publish(root.id, ALICE));

        const updated = expectOk(await versionTree.updateMetadata(root.id, ALICE, {
            name: '新名称',
            targetCompany: null,
            targetPosition: '架构师'
        }));

        expect(updated).toMatchObject({
            name: '新名称',
            targetCompany: null,
            targetPosition: '架构师',
            status: ResumeStatus.PUBLISHED
        });
    });

    it('rejects an empty name', async () => {
        const { versionTree } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));

        expectError(await versionTree.updateMetadata(root.id, ALICE, { name: '' }), TreeErrorKind.VALIDATION);
    });

    it('rejects renaming to another root\'s name but allows keeping its own', async () => {
        const { versionTree } = setup();
        const java = expectOk(await versionTree.createRoot(ALICE, 'Java简历'));
        const go = expectOk(await versionTree.createRoot(ALICE, 'Go简历'));

        const error = expectError(
            await versionTree.updateMetadata(go.id, ALICE, { name: 'Java简历' }),
            TreeErrorKind.VALIDATION
        );
        expect(error.message).toBe("简历名称 'Java简历' 已存在，请使用其他名称");

        expect(expectOk(await versionTree.updateMetadata(java.id, ALICE, { name: 'Java简历', targetCompany: '丙公司' }))).toMatchObject({
            name: 'Java简历',
            targetCompany: '丙公司'
        });
        expect(expectOk(await versionTree.updateMetadata(go.id, ALICE, { name: 'Go后端' })).name).toBe('Go后端');
    });
});

describe('linkToRoom', () => {
    it('only links published resumes', async () => {
        const { versionTree, rooms } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        const room = expectOk(await rooms.createRoom(ALICE, '一面'));

        const error = expectError(await versionTree.linkToRoom(root.id, room.id, ALICE), TreeErrorKind.NOT_PUBLISHED);
        expect(error.message).toBe('只有已发布的简历才能关联到面试间');

        expectOk(await versionTree.publish(root.id, ALICE));
        expectOk(await versionTree.linkToRoom(root.id, room.id, ALICE));

        const linked = expectOk(await versionTree.getResumeForRoom(room.id, ALICE));
        expect(linked.room.resumeId).toBe(root.id);
        expect(linked.node?.id).toBe(root.id);
        expect(linked.content?.nodeId).toBe(root.id);

        const detail = expectOk(await versionTree.getNode(root.id, ALICE));
        expect(detail.linkedRooms).toEqual([{ id: room.id, name: '一面' }]);
    });

    it('rejects a missing room or a room owned by someone else', async () => {
        const { versionTree, rooms } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        expectOk(await versionTree.publish(root.id, ALICE));
        const foreignRoom = expectOk(await rooms.createRoom(MALLORY));

        expectError(await versionTree.linkToRoom(root.id, 'no-such-room', ALICE), TreeErrorKind.NOT_FOUND);
        expectError(await versionTree.linkToRoom(root.id, foreignRoom.id, ALICE), TreeErrorKind.PERMISSION_DENIED);
    });

    it('reports an unlinked room, or one whose resume was deleted, as having no resume', async () => {
        const { versionTree, rooms } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        const room = expectOk(await rooms.createRoom(ALICE));

        expect(expectOk(await versionTree.getResumeForRoom(room.id, ALICE)).node).toBeNull();

        expectOk(await versionTree.publish(root.id, ALICE));
        expectOk(await versionTree.linkToRoom(root.id, room.id, ALICE));
        expectOk(await versionTree.deleteTree(root.id, ALICE));

        const orphaned = expectOk(await versionTree.getResumeForRoom(room.id, ALICE));
        expect(orphaned.node).toBeNull();
        expect(orphaned.content).toBeNull();
    });
});

describe('ownership', () => {
    it('refuses every write on a node owned by someone else', async () => {
        const { versionTree, rooms } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        expectOk(await versionTree.publish(root.id, ALICE));
        const room = expectOk(await rooms.createRoom(MALLORY));

        const attempts: Result<unknown>[] = [
            await versionTree.fork(root.id, MALLORY),
            await versionTree.deleteTree(root.id, MALLORY),
            await versionTree.publish(root.id, MALLORY),
            await versionTree.unpublish(root.id, MALLORY),
            await versionTree.updateContent(root.id, MALLORY, { fullName: 'x' }),
            await versionTree.updateMetadata(root.id, MALLORY, { name: 'x' }),
            await versionTree.linkToRoom(root.id, room.id, MALLORY),
            await versionTree.getNode(root.id, MALLORY)
        ];

        for (const attempt of attempts) {
            const error = expectError(attempt, TreeErrorKind.PERMISSION_DENIED);
            expect(error.details).toEqual({ resourceType: 'resume', resourceId: root.id });
        }

        const detail = expectOk(await versionTree.getNode(root.id, ALICE));
        expect(detail.node.status).toBe(ResumeStatus.PUBLISHED);
        expect(detail.node.forkCount).toBe(0);
        expect(detail.content?.fullName).toBeNull();
    });

    it('keeps each owner\'s reads to their own resumes', async () => {
        const { versionTree } = setup();
        expectOk(await versionTree.createRoot(ALICE, 'root'));

        expect(expectOk(await versionTree.listTrees(MALLORY))).toEqual([]);
        expect(expectOk(await versionTree.getStats(MALLORY))).toEqual({
            total: 0,
            published: 0,
            draft: 0,
            linkedRooms: 0
        });
    });
});

describe('reads', () => {
    it('lists trees oldest first with nested children', async () => {
        const { versionTree } = setup();
        const first = expectOk(await versionTree.createRoot(ALICE, 'first'));
        const second = expectOk(await versionTree.createRoot(ALICE, 'second'));
        const a = expectOk(await versionTree.fork(first.id, ALICE));
        const b = expectOk(await versionTree.fork(first.id, ALICE));
        const aa = expectOk(await versionTree.fork(a.id, ALICE));

        const trees = expectOk(await versionTree.listTrees(ALICE));

        expect(ids(trees)).toEqual([first.id, second.id]);
        expect(ids(trees[0].children)).toEqual([a.id, b.id]);
        expect(ids(trees[0].children[0].children)).toEqual([aa.id]);
        expect(trees[1].children).toEqual([]);
    });

    it('lists published resumes most recently updated first', async () => {
        const { versionTree } = setup();
        const a = expectOk(await versionTree.createRoot(ALICE, 'a'));
        const b = expectOk(await versionTree.createRoot(ALICE, 'b'));
        expectOk(await versionTree.createRoot(ALICE, 'draft'));
        expectOk(await versionTree.publish(a.id, ALICE));
        expectOk(await versionTree.publish(b.id, ALICE));

        expect(expectOk(await versionTree.getAvailablePublished(ALICE)).map(node => node.id)).toEqual([b.id, a.id]);

        expectOk(await versionTree.updateMetadata(a.id, ALICE, { targetCompany: '乙公司' }));

        expect(expectOk(await versionTree.getAvailablePublished(ALICE)).map(node => node.id)).toEqual([a.id, b.id]);
    });

    it('counts live resumes by status and the rooms linked to them', async () => {
        const { versionTree, rooms } = setup();
        const root = expectOk(await versionTree.createRoot(ALICE, 'root'));
        expectOk(await versionTree.fork(root.id, ALICE));
        const other = expectOk(await versionTree.createRoot(ALICE, 'other'));
        expectOk(await versionTree.publish(root.id, ALICE));
        expectOk(await versionTree.publish(other.id, ALICE));
        const room = expectOk(await rooms.createRoom(ALICE));
        const otherRoom = expectOk(await rooms.createRoom(ALICE));
        expectOk(await versionTree.linkToRoom(root.id, room.id, ALICE));
        expectOk(await versionTree.linkToRoom(other.id, otherRoom.id, ALICE));
        expectOk(await versionTree.deleteTree(other.id, ALICE));

        expect(expectOk(await versionTree.getStats(ALICE))).toEqual({
            total: 2,
            published: 1,
            draft: 1,
            linkedRooms: 1
        });
    });
});
