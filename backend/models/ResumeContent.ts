import mongoose, { Schema } from 'mongoose';
import type {
    CertificationEntry,
    EducationEntry,
    ExperienceEntry,
    ProjectEntry,
    SkillGroup
} from './domain';

// 简历内容在 MongoDB 中的存储形态
export interface ResumeContentRecord {
    _id: string;
    nodeId: string;
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
    createdAt: Date;
    updatedAt: Date;
}

const nullableText = { type: String, default: null };

// 各段落的子文档不需要独立的 _id
const EducationSchema = new Schema<EducationEntry>({
    school: { type: String, default: '' },
    degree: { type: String, default: '' },
    major: { type: String, default: '' },
    start: { type: String, default: '' },
    end: { type: String, default: '' }
}, { _id: false });

const ExperienceSchema = new Schema<ExperienceEntry>({
    company: { type: String, default: '' },
    title: { type: String, default: '' },
    start: { type: String, default: '' },
    end: { type: String, default: '' },
    highlights: { type: [String], default: [] }
}, { _id: false });

const ProjectSchema = new Schema<ProjectEntry>({
    name: { type: String, default: '' },
    description: { type: String, default: '' },
    highlights: { type: [String], default: [] }
}, { _id: false });

const SkillGroupSchema = new Schema<SkillGroup>({
    category: { type: String, default: '' },
    items: { type: [String], default: [] }
}, { _id: false });

const CertificationSchema = new Schema<CertificationEntry>({
    name: { type: String, default: '' },
    issuer: { type: String, default: '' },
    date: { type: String, default: '' }
}, { _id: false });

// 简历内容Schema定义，与节点一对一
const ResumeContentSchema = new Schema<ResumeContentRecord>({
    _id: {
        type: String,
        required: true
    },
    nodeId: {
        type: String,
        required: true,
        unique: true
    },
    fullName: nullableText,
    email: nullableText,
    phone: nullableText,
    location: nullableText,
    website: nullableText,
    summary: nullableText,
    education: { type: [EducationSchema], default: [] },
    experience: { type: [ExperienceSchema], default: [] },
    projects: { type: [ProjectSchema], default: [] },
    skills: { type: [SkillGroupSchema], default: [] },
    certifications: { type: [CertificationSchema], default: [] },
    createdAt: {
        type: Date,
        required: true
    },
    updatedAt: {
        type: Date,
        required: true
    }
}, {
    collection: 'resume_contents',
    timestamps: false,
    versionKey: false
});

const ResumeContentModel = mongoose.model<ResumeContentRecord>('ResumeContent', ResumeContentSchema);

export default ResumeContentModel;
