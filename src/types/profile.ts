import { z } from 'zod';
import { DeepReadonly } from '../utils/deep-freeze.util';

/**
 * Input boundary types.
 *
 * A ProfileSnapshot arrives already extracted and validated by the profile
 * collaborator; the schemas here only pin its shape. Both inputs are frozen
 * for the duration of an invocation.
 */

export const ExperienceEntrySchema = z.object({
    title: z.string().min(1),
    company: z.string().min(1),
    location: z.string().optional(),
    startDate: z.string().optional(),
    endDate: z.string().optional(),
    current: z.boolean().default(false),
    bullets: z.array(z.string()).default([])
});

export const EducationEntrySchema = z.object({
    degree: z.string().min(1),
    fieldOfStudy: z.string().optional(),
    institution: z.string().min(1),
    startDate: z.string().optional(),
    endDate: z.string().optional(),
    gpa: z.string().optional()
});

export const SkillEntrySchema = z.object({
    name: z.string().min(1),
    category: z.string().optional()
});

export const ProjectEntrySchema = z.object({
    name: z.string().min(1),
    description: z.string().default(''),
    technologies: z.array(z.string()).default([]),
    url: z.string().optional()
});

export const ProfileSnapshotSchema = z.object({
    name: z.string().min(1),
    email: z.string().optional(),
    phone: z.string().optional(),
    location: z.string().optional(),
    linkedin: z.string().optional(),
    website: z.string().optional(),
    summary: z.string().default(''),
    education: z.array(EducationEntrySchema).default([]),
    experience: z.array(ExperienceEntrySchema).default([]),
    skills: z.array(SkillEntrySchema).default([]),
    projects: z.array(ProjectEntrySchema).default([])
});

export const RoleContextSchema = z.object({
    companyName: z.string().min(1),
    roleTitle: z.string().min(1),
    jobDescription: z.string().min(1),
    notes: z.string().optional()
});

export type ExperienceEntry = DeepReadonly<z.infer<typeof ExperienceEntrySchema>>;
export type EducationEntry = DeepReadonly<z.infer<typeof EducationEntrySchema>>;
export type SkillEntry = DeepReadonly<z.infer<typeof SkillEntrySchema>>;
export type ProjectEntry = DeepReadonly<z.infer<typeof ProjectEntrySchema>>;

/** Caller-facing shape, before schema defaults are applied. */
export type ProfileSnapshotInput = z.input<typeof ProfileSnapshotSchema>;
export type ProfileSnapshot = DeepReadonly<z.infer<typeof ProfileSnapshotSchema>>;
export type RoleContext = DeepReadonly<z.infer<typeof RoleContextSchema>>;

/** Parsed, still-mutable inputs as they leave the boundary schemas. */
export type ProfileSnapshotData = z.infer<typeof ProfileSnapshotSchema>;
export type RoleContextData = z.infer<typeof RoleContextSchema>;
