import { IBackendAdapter } from '../services/backend.service';
import { ProfileSnapshot } from '../types/profile';
import { TaskSpec } from '../types/task';
import {
    AlignmentOutput,
    AlignmentOutputSchema,
    ContentOptimizationOutput,
    ContentOptimizationOutputSchema,
    JobAnalysisOutput,
    JobAnalysisOutputSchema
} from '../types/task-outputs';
import { TextIndex } from '../utils/text-analysis.util';
import { CONTENT_OPTIMIZATION_TASK } from './content-optimization.task';
import { JOB_ANALYSIS_TASK } from './job-analysis.task';
import { mentionsSkill } from './lexicon';
import { delegateTo, dependencyOutput, evidenceText, profilePayload } from './task-helpers';

export const ALIGNMENT_TASK = 'alignment';

const EMPHASIS_SKILL_COUNT = 5;

/**
 * Rule-based alignment check. Semantic fit needs a model, so the fallback
 * leaves it out and the scorer derives it from the other sub-scores.
 */
export function checkAlignmentFallback(
    profile: ProfileSnapshot,
    job: JobAnalysisOutput,
    optimization: ContentOptimizationOutput
): AlignmentOutput {
    const keywords = [
        ...job.keywords.hardSkills,
        ...job.keywords.softSkills,
        ...job.keywords.industryTerms
    ].filter((keyword, index, all) => all.indexOf(keyword) === index);

    const prioritized = optimization.prioritizedSkills ?? [];
    const tailored = new TextIndex([
        evidenceText(profile),
        optimization.optimizedSummary ?? '',
        ...prioritized
    ].join('\n'));
    const emphasis = new TextIndex([
        optimization.optimizedSummary ?? profile.summary,
        ...prioritized.slice(0, EMPHASIS_SKILL_COUNT)
    ].join('\n'));

    const coveredKeywords = keywords.filter(keyword => mentionsSkill(tailored, keyword));
    const emphasizedKeywords = coveredKeywords.filter(keyword => mentionsSkill(emphasis, keyword));
    const uncovered = keywords.filter(keyword => !coveredKeywords.includes(keyword));

    const notes = [`${coveredKeywords.length} of ${keywords.length} posting keywords appear in the tailored content.`];
    if (uncovered.length > 0) {
        notes.push(`Not evidenced: ${uncovered.join(', ')}.`);
    }

    return { coveredKeywords, emphasizedKeywords, notes };
}

export function createAlignmentTask(adapter?: IBackendAdapter): TaskSpec<AlignmentOutput> {
    return {
        name: ALIGNMENT_TASK,
        dependencies: [JOB_ANALYSIS_TASK, CONTENT_OPTIMIZATION_TASK],
        schema: AlignmentOutputSchema,
        fallback: context => checkAlignmentFallback(
            context.profile,
            dependencyOutput(context, JOB_ANALYSIS_TASK, JobAnalysisOutputSchema),
            dependencyOutput(context, CONTENT_OPTIMIZATION_TASK, ContentOptimizationOutputSchema)
        ),
        backend: delegateTo(adapter, context => ({
            task: ALIGNMENT_TASK,
            instructions: 'Judge how well the tailored content fits the posting. Return coveredKeywords, '
                + 'emphasizedKeywords, semanticFit (number 0-100) and notes (strings).',
            input: {
                jobDescription: context.role.jobDescription,
                jobAnalysis: dependencyOutput(context, JOB_ANALYSIS_TASK, JobAnalysisOutputSchema),
                optimization: dependencyOutput(context, CONTENT_OPTIMIZATION_TASK, ContentOptimizationOutputSchema),
                profile: profilePayload(context.profile)
            }
        }))
    };
}
