import { IBackendAdapter } from '../services/backend.service';
import { ProfileSnapshot } from '../types/profile';
import { TaskSpec } from '../types/task';
import {
    ContentOptimizationOutput,
    ContentOptimizationOutputSchema,
    JobAnalysisOutput,
    JobAnalysisOutputSchema
} from '../types/task-outputs';
import { TextIndex } from '../utils/text-analysis.util';
import { JOB_ANALYSIS_TASK } from './job-analysis.task';
import { mentionsSkill } from './lexicon';
import { delegateTo, dependencyOutput, evidenceText, profilePayload, profileSkillNames } from './task-helpers';

export const CONTENT_OPTIMIZATION_TASK = 'content_optimization';

const SUMMARY_SKILL_CANDIDATES = 3;
const MAX_SKILLS_TO_ADD = 5;
const MAX_SKILLS_TO_EMPHASIZE = 5;

function skillsOverlap(a: string, b: string): boolean {
    return mentionsSkill(new TextIndex(a), b) || mentionsSkill(new TextIndex(b), a);
}

function withTerminalPunctuation(text: string): string {
    return /[.!?]$/.test(text) ? text : `${text}.`;
}

/**
 * The summary only ever gains a skill the candidate already evidences
 * somewhere in the profile.
 */
function optimizeSummary(
    profile: ProfileSnapshot,
    evidencedSkills: string[]
): string | undefined {
    const base = profile.summary.trim();

    if (base.length > 0) {
        const summaryIndex = new TextIndex(base);
        const missing = evidencedSkills.find(skill => !mentionsSkill(summaryIndex, skill));
        return missing ? `${withTerminalPunctuation(base)} Experienced with ${missing}.` : base;
    }

    const skills = evidencedSkills.length > 0
        ? evidencedSkills
        : profileSkillNames(profile).slice(0, SUMMARY_SKILL_CANDIDATES);
    const latestTitle = profile.experience[0]?.title;

    if (latestTitle && skills.length > 0) {
        return `${latestTitle} with experience in ${skills.join(', ')}.`;
    }
    if (latestTitle) {
        return withTerminalPunctuation(latestTitle);
    }
    if (skills.length > 0) {
        return `Professional with experience in ${skills.join(', ')}.`;
    }
    // Nothing of the candidate's to build on; the synthesizer supplies a default.
    return undefined;
}

/**
 * Rule-based optimization: reorder the candidate's skills so the ones the
 * posting asks for come first, and work one evidenced top skill into the
 * summary. Bullets are left as written.
 */
export function optimizeContentFallback(
    profile: ProfileSnapshot,
    job: JobAnalysisOutput
): ContentOptimizationOutput {
    const hardSkills = job.keywords.hardSkills;
    const evidence = new TextIndex(evidenceText(profile));
    const skills = profileSkillNames(profile);

    const matched = skills.filter(skill => hardSkills.some(hard => skillsOverlap(skill, hard)));
    const unmatched = skills.filter(skill => !matched.includes(skill));

    const evidencedTopSkills = hardSkills
        .slice(0, SUMMARY_SKILL_CANDIDATES)
        .filter(skill => mentionsSkill(evidence, skill));

    const skillsToAdd = hardSkills
        .filter(skill => !mentionsSkill(evidence, skill))
        .slice(0, MAX_SKILLS_TO_ADD);
    const skillsToEmphasize = matched.slice(0, MAX_SKILLS_TO_EMPHASIZE);

    const suggestions: string[] = [];
    if (skillsToAdd.length > 0) {
        suggestions.push(`If you have them, add these skills from the posting: ${skillsToAdd.slice(0, 3).join(', ')}.`);
    }
    if (matched.length > 0) {
        suggestions.push(`Emphasize ${matched.slice(0, 3).join(', ')} in your experience bullets.`);
    }

    return {
        optimizedSummary: optimizeSummary(profile, evidencedTopSkills),
        prioritizedSkills: [...matched, ...unmatched],
        skillsToAdd,
        skillsToEmphasize,
        optimizedBullets: [],
        suggestions
    };
}

export function createContentOptimizationTask(adapter?: IBackendAdapter): TaskSpec<ContentOptimizationOutput> {
    return {
        name: CONTENT_OPTIMIZATION_TASK,
        dependencies: [JOB_ANALYSIS_TASK],
        schema: ContentOptimizationOutputSchema,
        fallback: context => optimizeContentFallback(
            context.profile,
            dependencyOutput(context, JOB_ANALYSIS_TASK, JobAnalysisOutputSchema)
        ),
        backend: delegateTo(adapter, context => ({
            task: CONTENT_OPTIMIZATION_TASK,
            instructions: 'Tailor the resume content to the job analysis without inventing experience. '
                + 'Return optimizedSummary, prioritizedSkills (only skills from the profile), skillsToAdd, '
                + 'skillsToEmphasize, optimizedBullets [{experienceIndex, bulletIndex, text}] and suggestions.',
            input: {
                roleTitle: context.role.roleTitle,
                companyName: context.role.companyName,
                jobAnalysis: dependencyOutput(context, JOB_ANALYSIS_TASK, JobAnalysisOutputSchema),
                profile: profilePayload(context.profile)
            }
        }))
    };
}
