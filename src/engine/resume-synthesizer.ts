import { z } from 'zod';
import { ProfileSnapshot, RoleContext } from '../types/profile';
import { Insights, ResumeContent, ResumeExperience, SynthesizedResume } from '../types/resume';
import { FinalizedResults } from '../types/task';
import {
    AlignmentOutputSchema,
    ContentOptimizationOutput,
    ContentOptimizationOutputSchema,
    JobAnalysisOutputSchema,
    QualityReviewOutputSchema,
    RoleCalibrationOutputSchema,
    SeniorityLevel
} from '../types/task-outputs';
import {
    ALIGNMENT_TASK,
    CONTENT_OPTIMIZATION_TASK,
    JOB_ANALYSIS_TASK,
    QUALITY_REVIEW_TASK,
    ROLE_CALIBRATION_TASK
} from '../tasks';
import { renderHtml, renderMarkdown } from './resume-renderer';

const DEFAULT_SENIORITY: SeniorityLevel = 'mid';

/**
 * Output of a finalized task, re-read through its schema. Missing tasks
 * and outputs that do not parse both come back as null.
 */
function sourceOutput<T>(
    results: FinalizedResults,
    task: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T | null {
    const result = results.get(task);
    if (!result || result.output === null || result.output === undefined) {
        return null;
    }
    const parsed = schema.safeParse(result.output);
    return parsed.success ? parsed.data : null;
}

function mergeSkills(profile: ProfileSnapshot, prioritized: readonly string[] | undefined): string[] | null {
    const profileSkills = profile.skills.map(skill => skill.name);
    if (!prioritized) {
        return null;
    }

    const byKey = new Map(profileSkills.map(name => [name.trim().toLowerCase(), name]));
    const ordered: string[] = [];
    for (const candidate of prioritized) {
        const name = byKey.get(candidate.trim().toLowerCase());
        if (name !== undefined && !ordered.includes(name)) {
            ordered.push(name);
        }
    }
    if (ordered.length === 0 && profileSkills.length > 0) {
        return null;
    }
    return [...ordered, ...profileSkills.filter(name => !ordered.includes(name))];
}

function mergeExperience(
    profile: ProfileSnapshot,
    optimization: ContentOptimizationOutput | null
): ResumeExperience[] {
    const rewrites = new Map<string, string>();
    for (const bullet of optimization?.optimizedBullets ?? []) {
        rewrites.set(`${bullet.experienceIndex}:${bullet.bulletIndex}`, bullet.text);
    }

    return profile.experience.map((entry, experienceIndex) => ({
        title: entry.title,
        company: entry.company,
        location: entry.location ?? null,
        startDate: entry.startDate ?? null,
        endDate: entry.endDate ?? null,
        current: entry.current,
        bullets: entry.bullets.map(
            (bullet, bulletIndex) => rewrites.get(`${experienceIndex}:${bulletIndex}`) ?? bullet
        )
    }));
}

/**
 * Resume Synthesizer
 *
 * Merges the finalized task outputs into one SynthesizedResume. Each field
 * has a single source task; when that source is missing or omits the field,
 * a structural default takes its place and the field name is recorded in
 * `defaultedFields`. Never throws for any combination of results.
 *
 * | field                   | source                                   | default                         |
 * |-------------------------|------------------------------------------|---------------------------------|
 * | summary                 | content_optimization.optimizedSummary    | profile summary, then a stub    |
 * | skills                  | content_optimization.prioritizedSkills   | profile skill names             |
 * | experience              | content_optimization.optimizedBullets    | profile bullets                 |
 * | keywordCoverage         | alignment.covered/emphasizedKeywords     | empty lists                     |
 * | requiredQualifications  | job_analysis.qualifications.required     | empty list                      |
 * | seniority               | role_calibration                         | mid, or job_analysis seniority  |
 * | semanticFit             | alignment.semanticFit                    | null                            |
 * | insights.*              | notes of each task                       | empty lists                     |
 */
export function synthesizeResume(
    profile: ProfileSnapshot,
    role: RoleContext,
    results: FinalizedResults
): SynthesizedResume {
    const defaulted: string[] = [];
    const orDefault = <T>(field: string, value: T | null | undefined, fallback: T): T => {
        if (value === null || value === undefined) {
            defaulted.push(field);
            return fallback;
        }
        return value;
    };

    const job = sourceOutput(results, JOB_ANALYSIS_TASK, JobAnalysisOutputSchema);
    const quality = sourceOutput(results, QUALITY_REVIEW_TASK, QualityReviewOutputSchema);
    const optimization = sourceOutput(results, CONTENT_OPTIMIZATION_TASK, ContentOptimizationOutputSchema);
    const calibration = sourceOutput(results, ROLE_CALIBRATION_TASK, RoleCalibrationOutputSchema);
    const alignment = sourceOutput(results, ALIGNMENT_TASK, AlignmentOutputSchema);

    const profileSummary = profile.summary.trim();
    const optimizedSummary = optimization?.optimizedSummary?.trim() || null;
    const summary = orDefault(
        'summary',
        optimizedSummary,
        profileSummary || `${role.roleTitle} candidate for ${role.companyName}.`
    );
    const summarySource: SynthesizedResume['summarySource'] = optimizedSummary
        ? 'optimization'
        : profileSummary ? 'profile' : 'placeholder';

    const skills = orDefault(
        'skills',
        mergeSkills(profile, optimization?.prioritizedSkills),
        profile.skills.map(skill => skill.name)
    );

    if (!optimization?.optimizedBullets) {
        defaulted.push('experience');
    }
    const experience = mergeExperience(profile, optimization);

    const keywordCoverage = {
        covered: orDefault('keywordCoverage.covered', alignment?.coveredKeywords, []),
        emphasized: orDefault('keywordCoverage.emphasized', alignment?.emphasizedKeywords, [])
    };

    const requiredQualifications = orDefault('requiredQualifications', job?.qualifications.required, []);

    const seniority = calibration
        ? {
            current: orDefault('seniority.current', calibration.currentLevel, DEFAULT_SENIORITY),
            target: calibration.targetLevel
        }
        : orDefault<{ current: SeniorityLevel; target: SeniorityLevel }>('seniority', null, {
            current: DEFAULT_SENIORITY,
            target: job?.seniorityLevel ?? DEFAULT_SENIORITY
        });

    const semanticFit = orDefault<number | null>('semanticFit', alignment?.semanticFit, null);

    const insights: Insights = {
        jobAnalysis: orDefault('insights.jobAnalysis', job?.notes, []),
        quality: orDefault('insights.quality', quality?.notes, []),
        optimization: orDefault('insights.optimization', optimization?.suggestions, []),
        calibration: orDefault(
            'insights.calibration',
            calibration ? [...calibration.issues, calibration.toneShift].filter(note => note.length > 0) : null,
            []
        ),
        alignment: orDefault('insights.alignment', alignment?.notes, [])
    };

    const content: ResumeContent = {
        contact: {
            name: profile.name,
            email: profile.email ?? null,
            phone: profile.phone ?? null,
            location: profile.location ?? null,
            linkedin: profile.linkedin ?? null,
            website: profile.website ?? null
        },
        summary,
        skills,
        experience,
        education: profile.education.map(entry => ({
            degree: entry.degree,
            fieldOfStudy: entry.fieldOfStudy ?? null,
            institution: entry.institution,
            startDate: entry.startDate ?? null,
            endDate: entry.endDate ?? null,
            gpa: entry.gpa ?? null
        })),
        projects: profile.projects.map(project => ({
            name: project.name,
            description: project.description,
            technologies: [...project.technologies],
            url: project.url ?? null
        }))
    };

    return {
        ...content,
        summarySource,
        keywordCoverage,
        requiredQualifications,
        seniority,
        semanticFit,
        insights,
        markdown: renderMarkdown(content),
        html: renderHtml(content),
        defaultedFields: defaulted
    };
}
