import { IBackendAdapter } from '../services/backend.service';
import { ProfileSnapshot } from '../types/profile';
import { TaskSpec } from '../types/task';
import {
    JobAnalysisOutputSchema,
    RoleCalibrationOutput,
    RoleCalibrationOutputSchema,
    SeniorityLevel
} from '../types/task-outputs';
import { tokenize } from '../utils/text-analysis.util';
import { JOB_ANALYSIS_TASK } from './job-analysis.task';
import { delegateTo, dependencyOutput, narrativeText, profilePayload } from './task-helpers';

export const ROLE_CALIBRATION_TASK = 'role_calibration';

const LEVEL_VERBS: Readonly<Record<SeniorityLevel, readonly string[]>> = {
    junior: ['assisted', 'supported', 'contributed', 'learned', 'participated', 'helped'],
    mid: ['developed', 'implemented', 'delivered', 'improved', 'built', 'created'],
    senior: ['led', 'architected', 'drove', 'mentored', 'optimized', 'designed'],
    executive: ['directed', 'transformed', 'established', 'spearheaded', 'envisioned', 'pioneered']
};

const DETECTION_ORDER: readonly SeniorityLevel[] = ['junior', 'mid', 'senior', 'executive'];
const MIN_VERB_HITS = 2;
const ALIGNED_SCORE = 100;
const MISALIGNED_SCORE = 60;

export function detectWritingLevel(profile: ProfileSnapshot): SeniorityLevel {
    const words = new Set(tokenize(narrativeText(profile)));
    const detected = DETECTION_ORDER.find(
        level => LEVEL_VERBS[level].filter(verb => words.has(verb)).length >= MIN_VERB_HITS
    );
    return detected ?? 'mid';
}

/**
 * Rule-based tone calibration: guesses the level the resume reads at from
 * its action verbs and compares it with the level the posting targets.
 */
export function calibrateRoleFallback(profile: ProfileSnapshot, targetLevel: SeniorityLevel): RoleCalibrationOutput {
    const currentLevel = detectWritingLevel(profile);
    const aligned = currentLevel === targetLevel;
    const suggestedVerbs = [...LEVEL_VERBS[targetLevel]];

    return {
        currentLevel,
        targetLevel,
        alignmentScore: aligned ? ALIGNED_SCORE : MISALIGNED_SCORE,
        issues: aligned
            ? []
            : [`Language reads as ${currentLevel} level; the role targets ${targetLevel}. Prefer verbs such as ${suggestedVerbs.slice(0, 3).join(', ')}.`],
        suggestedVerbs,
        toneShift: targetLevel === 'executive'
            ? 'Focus on strategic impact'
            : targetLevel === 'junior'
                ? 'Highlight learning and contribution'
                : 'Shift from collaborative to ownership language'
    };
}

export function createRoleCalibrationTask(adapter?: IBackendAdapter): TaskSpec<RoleCalibrationOutput> {
    return {
        name: ROLE_CALIBRATION_TASK,
        dependencies: [JOB_ANALYSIS_TASK],
        schema: RoleCalibrationOutputSchema,
        fallback: context => calibrateRoleFallback(
            context.profile,
            dependencyOutput(context, JOB_ANALYSIS_TASK, JobAnalysisOutputSchema).seniorityLevel
        ),
        backend: delegateTo(adapter, context => ({
            task: ROLE_CALIBRATION_TASK,
            instructions: 'Assess the seniority the resume language conveys against the target level. '
                + 'Return currentLevel, targetLevel (junior|mid|senior|executive), alignmentScore (integer 0-100), '
                + 'issues, suggestedVerbs and toneShift.',
            input: {
                roleTitle: context.role.roleTitle,
                targetLevel: dependencyOutput(context, JOB_ANALYSIS_TASK, JobAnalysisOutputSchema).seniorityLevel,
                profile: profilePayload(context.profile)
            }
        }))
    };
}
