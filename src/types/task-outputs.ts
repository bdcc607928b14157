import { z } from 'zod';

/**
 * Output schemas for each analysis task.
 *
 * Every task output, whether it came from the backend or from the fallback,
 * is parsed with its schema before it is published. Fields the synthesizer
 * reads from a single designated task are optional here so a backend may
 * omit them; the synthesizer substitutes a default and flags it.
 */

export const SeniorityLevelSchema = z.enum(['junior', 'mid', 'senior', 'executive']);
export type SeniorityLevel = z.infer<typeof SeniorityLevelSchema>;

const textList = () => z.array(z.string()).default([]);

// job_analysis
export const JobAnalysisOutputSchema = z.object({
    keywords: z.object({
        hardSkills: z.array(z.string()),
        softSkills: z.array(z.string()),
        industryTerms: textList()
    }),
    responsibilities: textList(),
    qualifications: z.object({
        required: z.array(z.string()),
        preferred: textList()
    }),
    seniorityLevel: SeniorityLevelSchema,
    roleFocus: z.string().default(''),
    notes: textList()
});
export type JobAnalysisOutput = z.infer<typeof JobAnalysisOutputSchema>;

// quality_review
export const QualityReviewOutputSchema = z.object({
    cliches: textList(),
    bulletsMissingMetrics: textList(),
    repetitiveWords: z.array(z.object({
        word: z.string(),
        count: z.number().int().positive()
    })).default([]),
    qualityScore: z.number().int().min(0).max(100),
    notes: textList()
});
export type QualityReviewOutput = z.infer<typeof QualityReviewOutputSchema>;

// content_optimization
export const OptimizedBulletSchema = z.object({
    experienceIndex: z.number().int().min(0),
    bulletIndex: z.number().int().min(0),
    text: z.string().min(1)
});

export const ContentOptimizationOutputSchema = z.object({
    optimizedSummary: z.string().min(1).optional(),
    prioritizedSkills: z.array(z.string().min(1)).optional(),
    skillsToAdd: textList(),
    skillsToEmphasize: textList(),
    optimizedBullets: z.array(OptimizedBulletSchema).optional(),
    suggestions: textList()
});
export type ContentOptimizationOutput = z.infer<typeof ContentOptimizationOutputSchema>;

// role_calibration
export const RoleCalibrationOutputSchema = z.object({
    currentLevel: SeniorityLevelSchema.optional(),
    targetLevel: SeniorityLevelSchema,
    alignmentScore: z.number().int().min(0).max(100),
    issues: textList(),
    suggestedVerbs: textList(),
    toneShift: z.string().default('')
});
export type RoleCalibrationOutput = z.infer<typeof RoleCalibrationOutputSchema>;

// alignment
export const AlignmentOutputSchema = z.object({
    coveredKeywords: z.array(z.string()).optional(),
    emphasizedKeywords: z.array(z.string()).optional(),
    semanticFit: z.number().min(0).max(100).nullable().optional(),
    notes: textList()
});
export type AlignmentOutput = z.infer<typeof AlignmentOutputSchema>;
