import { z } from 'zod';
import type {
    CertificationEntry,
    ContentPatch,
    EducationEntry,
    ExperienceEntry,
    ProjectEntry,
    SkillGroup
} from '../models/domain';
import { TreeErrorKind, failure, success } from '../utils/result';
import type { Result } from '../utils/result';

// 记录中缺失的文本字段补为空串，多余字段丢弃
const text = z.string().default('');
const textList = z.array(z.string()).default([]);

export const educationEntrySchema: z.ZodType<EducationEntry, z.ZodTypeDef, unknown> = z.object({
    school: text,
    degree: text,
    major: text,
    start: text,
    end: text
});

export const experienceEntrySchema: z.ZodType<ExperienceEntry, z.ZodTypeDef, unknown> = z.object({
    company: text,
    title: text,
    start: text,
    end: text,
    highlights: textList
});

export const projectEntrySchema: z.ZodType<ProjectEntry, z.ZodTypeDef, unknown> = z.object({
    name: text,
    description: text,
    highlights: textList
});

export const skillGroupSchema: z.ZodType<SkillGroup, z.ZodTypeDef, unknown> = z.object({
    category: text,
    items: textList
});

export const certificationEntrySchema: z.ZodType<CertificationEntry, z.ZodTypeDef, unknown> = z.object({
    name: text,
    issuer: text,
    date: text
});

const scalar = z.string().nullable();

// 内容补丁：只允许已知字段，全部可选；null 用于清空标量字段
export const contentPatchSchema: z.ZodType<ContentPatch, z.ZodTypeDef, unknown> = z.object({
    fullName: scalar,
    email: scalar,
    phone: scalar,
    location: scalar,
    website: scalar,
    summary: scalar,
    education: z.array(educationEntrySchema),
    experience: z.array(experienceEntrySchema),
    projects: z.array(projectEntrySchema),
    skills: z.array(skillGroupSchema),
    certifications: z.array(certificationEntrySchema)
}).partial().strict();

/**
 * 校验内容补丁，失败时返回按字段路径归类的错误信息
 */
export function parseContentPatch(input: unknown): Result<ContentPatch> {
    const parsed = contentPatchSchema.safeParse(input);

    if (parsed.success) {
        return success(parsed.data);
    }

    const fields: Record<string, string[]> = {};
    for (const issue of parsed.error.issues) {
        const key = issue.path.length > 0 ? issue.path.join('.') : '_';
        fields[key] = [...(fields[key] ?? []), issue.message];
    }

    return failure(TreeErrorKind.VALIDATION, '简历内容格式不正确', { fields });
}
