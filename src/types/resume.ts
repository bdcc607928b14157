import { z } from 'zod';
import { SeniorityLevelSchema } from './task-outputs';

/**
 * Output boundary.
 *
 * Every field is required. Values the profile may not carry are `null`
 * rather than absent, so a consumer never has to test for a missing key.
 */

const nullableText = z.string().nullable();

export const ContactSchema = z.object({
    name: z.string().min(1),
    email: nullableText,
    phone: nullableText,
    location: nullableText,
    linkedin: nullableText,
    website: nullableText
});

export const ResumeExperienceSchema = z.object({
    title: z.string(),
    company: z.string(),
    location: nullableText,
    startDate: nullableText,
    endDate: nullableText,
    current: z.boolean(),
    bullets: z.array(z.string())
});

export const ResumeEducationSchema = z.object({
    degree: z.string(),
    fieldOfStudy: nullableText,
    institution: z.string(),
    startDate: nullableText,
    endDate: nullableText,
    gpa: nullableText
});

export const ResumeProjectSchema = z.object({
    name: z.string(),
    description: z.string(),
    technologies: z.array(z.string()),
    url: nullableText
});

export const InsightsSchema = z.object({
    jobAnalysis: z.array(z.string()),
    quality: z.array(z.string()),
    optimization: z.array(z.string()),
    calibration: z.array(z.string()),
    alignment: z.array(z.string())
});

export const SynthesizedResumeSchema = z.object({
    contact: ContactSchema,
    summary: z.string().min(1),
    /** `placeholder` means the summary was written from the role, not the candidate. */
    summarySource: z.enum(['optimization', 'profile', 'placeholder']),
    skills: z.array(z.string()),
    experience: z.array(ResumeExperienceSchema),
    education: z.array(ResumeEducationSchema),
    projects: z.array(ResumeProjectSchema),
    keywordCoverage: z.object({
        covered: z.array(z.string()),
        emphasized: z.array(z.string())
    }),
    requiredQualifications: z.array(z.string()),
    seniority: z.object({
        current: SeniorityLevelSchema,
        target: SeniorityLevelSchema
    }),
    semanticFit: z.number().min(0).max(100).nullable(),
    insights: InsightsSchema,
    markdown: z.string().min(1),
    html: z.string().min(1),
    defaultedFields: z.array(z.string())
});

export type Contact = z.infer<typeof ContactSchema>;
export type ResumeExperience = z.infer<typeof ResumeExperienceSchema>;
export type ResumeEducation = z.infer<typeof ResumeEducationSchema>;
export type ResumeProject = z.infer<typeof ResumeProjectSchema>;
export type Insights = z.infer<typeof InsightsSchema>;
export type SynthesizedResume = z.infer<typeof SynthesizedResumeSchema>;

/** The content blocks a renderer lays out. */
export type ResumeContent = Pick<
    SynthesizedResume,
    'contact' | 'summary' | 'skills' | 'experience' | 'education' | 'projects'
>;

const subScore = z.number().int().min(0).max(100);

export const MatchScoreSchema = z.object({
    overall: subScore,
    subScores: z.object({
        keywordCoverage: subScore,
        qualificationCoverage: subScore,
        structuralCompliance: subScore,
        semanticFit: subScore
    }),
    weights: z.object({
        keywordCoverage: z.number(),
        qualificationCoverage: z.number(),
        structuralCompliance: z.number(),
        semanticFit: z.number()
    }),
    missingKeywords: z.array(z.string()),
    gaps: z.array(z.string()),
    /** End date of current roles when experience years were counted. */
    referenceDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/)
});

export type SubScores = z.infer<typeof MatchScoreSchema>['subScores'];
export type MatchScore = z.infer<typeof MatchScoreSchema>;
