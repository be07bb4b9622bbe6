// 简历版本状态
export enum ResumeStatus {
    DRAFT = 'draft',           // 编辑中
    PUBLISHED = 'published',   // 已发布，可关联面试间
    DELETED = 'deleted'        // 已删除（墓碑，保留记录）
}

// 任何带所有者身份的资源都走同一套鉴权
export interface OwnedResource {
    ownerIdentity: string;
}

// 简历版本节点
export interface ResumeNode extends OwnedResource {
    id: string;
    parentId: string | null;
    rootId: string;
    depth: number;
    name: string;
    status: ResumeStatus;
    targetCompany: string | null;
    targetPosition: string | null;
    // 该节点被 fork 的累计次数；fork 与删除写同一文档，从而互相冲突
    forkCount: number;
    createdAt: Date;
    updatedAt: Date;
}

export interface EducationEntry {
    school: string;
    degree: string;
    major: string;
    start: string;
    end: string;
}

export interface ExperienceEntry {
    company: string;
    title: string;
    start: string;
    end: string;
    highlights: string[];
}

export interface ProjectEntry {
    name: string;
    description: string;
    highlights: string[];
}

export interface SkillGroup {
    category: string;
    items: string[];
}

export interface CertificationEntry {
    name: string;
    issuer: string;
    date: string;
}

// 简历内容的可编辑字段
export interface ContentFields {
    fullName: string | null;
    email: string | null;
    phone: string | null;
    location: string | null;
    website: string | null;
    summary: string | null;
    education: EducationEntry[];
    experience: ExperienceEntry[];
    projects: ProjectEntry[];
    skills: SkillGroup[];
    certifications: CertificationEntry[];
}

export type ContentPatch = Partial<ContentFields>;

// 简历内容，与节点一对一
export interface ResumeContent extends ContentFields {
    nodeId: string;
    createdAt: Date;
    updatedAt: Date;
}

// 面试间（外部资源，只关心所有者和简历引用）
export interface Room extends OwnedResource {
    id: string;
    name: string;
    resumeId: string | null;
    createdAt: Date;
    updatedAt: Date;
}

export interface ResumeTreeView extends ResumeNode {
    children: ResumeTreeView[];
}

export interface ResumeStats {
    total: number;
    published: number;
    draft: number;
    linkedRooms: number;
}

export function emptyContentFields(): ContentFields {
    return {
        fullName: null,
        email: null,
        phone: null,
        location: null,
        website: null,
        summary: null,
        education: [],
        experience: [],
        projects: [],
        skills: [],
        certifications: []
    };
}

/**
 * 取出内容字段的深拷贝，不含节点ID和时间戳
 */
export function copyContentFields(source: ContentFields): ContentFields {
    return {
        fullName: source.fullName,
        email: source.email,
        phone: source.phone,
        location: source.location,
        website: source.website,
        summary: source.summary,
        education: source.education.map(entry => ({ ...entry })),
        experience: source.experience.map(entry => ({ ...entry, highlights: [...entry.highlights] })),
        projects: source.projects.map(entry => ({ ...entry, highlights: [...entry.highlights] })),
        skills: source.skills.map(group => ({ ...group, items: [...group.items] })),
        certifications: source.certifications.map(entry => ({ ...entry }))
    };
}

/**
 * 将补丁中出现的字段合并到现有内容上，未出现的字段保持不变；null 表示清空
 */
export function applyContentPatch(current: ContentFields, patch: ContentPatch): ContentFields {
    return copyContentFields({
        fullName: pick(patch.fullName, current.fullName),
        email: pick(patch.email, current.email),
        phone: pick(patch.phone, current.phone),
        location: pick(patch.location, current.location),
        website: pick(patch.website, current.website),
        summary: pick(patch.summary, current.summary),
        education: pick(patch.education, current.education),
        experience: pick(patch.experience, current.experience),
        projects: pick(patch.projects, current.projects),
        skills: pick(patch.skills, current.skills),
        certifications: pick(patch.certifications, current.certifications)
    });
}

function pick<T>(next: T | undefined, fallback: T): T {
    return next === undefined ? fallback : next;
}
