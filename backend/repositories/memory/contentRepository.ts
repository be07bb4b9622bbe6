import {
    applyContentPatch,
    copyContentFields,
    emptyContentFields
} from '../../models/domain';
import type { ContentFields, ContentPatch, ResumeContent } from '../../models/domain';
import type { ContentRepository } from '../types';
import type { StateAccessor } from './state';

function cloneContent(content: ResumeContent): ResumeContent {
    return {
        nodeId: content.nodeId,
        ...copyContentFields(content),
        createdAt: content.createdAt,
        updatedAt: content.updatedAt
    };
}

export class MemoryContentRepository implements ContentRepository {
    constructor(private readonly state: StateAccessor) { }

    async get(nodeId: string): Promise<ResumeContent | null> {
        const content = this.state().contents.get(nodeId);
        return content ? cloneContent(content) : null;
    }

    async create(nodeId: string, at: Date): Promise<ResumeContent> {
        return this.put(nodeId, emptyContentFields(), at, at);
    }

    async upsert(nodeId: string, patch: ContentPatch, at: Date): Promise<ResumeContent> {
        const existing = this.state().contents.get(nodeId);
        const fields = applyContentPatch(existing ?? emptyContentFields(), patch);
        return this.put(nodeId, fields, existing?.createdAt ?? at, at);
    }

    async copy(fromNodeId: string, toNodeId: string, at: Date): Promise<ResumeContent> {
        const source = this.state().contents.get(fromNodeId);
        const fields = source ? copyContentFields(source) : emptyContentFields();
        return this.put(toNodeId, fields, at, at);
    }

    private put(nodeId: string, fields: ContentFields, createdAt: Date, updatedAt: Date): ResumeContent {
        const content: ResumeContent = { nodeId, ...copyContentFields(fields), createdAt, updatedAt };
        this.state().contents.set(nodeId, content);
        return cloneContent(content);
    }
}
