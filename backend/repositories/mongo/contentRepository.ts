import type { ClientSession } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import ResumeContentModel from '../../models/ResumeContent';
import type { ResumeContentRecord } from '../../models/ResumeContent';
import {
    applyContentPatch,
    copyContentFields,
    emptyContentFields
} from '../../models/domain';
import type { ContentFields, ContentPatch, ResumeContent } from '../../models/domain';
import type { ContentRepository } from '../types';

function toContent(record: ResumeContentRecord): ResumeContent {
    return {
        nodeId: record.nodeId,
        ...copyContentFields({
            fullName: record.fullName ?? null,
            email: record.email ?? null,
            phone: record.phone ?? null,
            location: record.location ?? null,
            website: record.website ?? null,
            summary: record.summary ?? null,
            education: record.education ?? [],
            experience: record.experience ?? [],
            projects: record.projects ?? [],
            skills: record.skills ?? [],
            certifications: record.certifications ?? []
        }),
        createdAt: record.createdAt,
        updatedAt: record.updatedAt
    };
}

export class MongoContentRepository implements ContentRepository {
    constructor(private readonly session: ClientSession | null = null) { }

    async get(nodeId: string): Promise<ResumeContent | null> {
        const record = await ResumeContentModel.findOne({ nodeId })
            .session(this.session)
            .lean<ResumeContentRecord>()
            .exec();

        return record ? toContent(record) : null;
    }

    async create(nodeId: string, at: Date): Promise<ResumeContent> {
        return this.insert(nodeId, emptyContentFields(), at);
    }

    async upsert(nodeId: string, patch: ContentPatch, at: Date): Promise<ResumeContent> {
        const existing = await this.get(nodeId);

        if (!existing) {
            return this.insert(nodeId, applyContentPatch(emptyContentFields(), patch), at);
        }

        const fields = applyContentPatch(existing, patch);
        await ResumeContentModel.updateOne({ nodeId }, { $set: { ...fields, updatedAt: at } })
            .session(this.session)
            .exec();

        return { nodeId, ...fields, createdAt: existing.createdAt, updatedAt: at };
    }

    async copy(fromNodeId: string, toNodeId: string, at: Date): Promise<ResumeContent> {
        const source = await this.get(fromNodeId);
        const fields = source ? copyContentFields(source) : emptyContentFields();
        return this.insert(toNodeId, fields, at);
    }

    private async insert(nodeId: string, fields: ContentFields, at: Date): Promise<ResumeContent> {
        const record = new ResumeContentModel({
            _id: uuidv4(),
            nodeId,
            ...fields,
            createdAt: at,
            updatedAt: at
        });
        await record.save({ session: this.session });

        return { nodeId, ...copyContentFields(fields), createdAt: at, updatedAt: at };
    }
}
