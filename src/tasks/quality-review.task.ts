import { IBackendAdapter } from '../services/backend.service';
import { ProfileSnapshot } from '../types/profile';
import { TaskSpec } from '../types/task';
import { QualityReviewOutput, QualityReviewOutputSchema } from '../types/task-outputs';
import { normalizeText } from '../utils/text-analysis.util';
import { delegateTo, narrativeText, profileBullets, profilePayload } from './task-helpers';

export const QUALITY_REVIEW_TASK = 'quality_review';

const CLICHES = [
    'team player', 'hard worker', 'fast learner', 'detail-oriented', 'self-motivated',
    'go-getter', 'think outside the box', 'synergy', 'results-driven', 'dynamic'
];

const METRIC = /\d/;
const MIN_BULLET_LENGTH_FOR_METRICS = 20;
const REPETITION_MIN_WORD_LENGTH = 6;
const REPETITION_THRESHOLD = 4;
const BASE_QUALITY_SCORE = 85;
const CLICHE_PENALTY = 5;
const LOW_METRICS_PENALTY = 10;
const LOW_METRICS_THRESHOLD = 70;

/**
 * Rule-based proofreading: clichés, bullets with no numbers and words that
 * repeat too often. Spelling is out of reach without a dictionary.
 */
export function reviewQualityFallback(profile: ProfileSnapshot): QualityReviewOutput {
    const text = normalizeText(narrativeText(profile));
    const cliches = CLICHES.filter(cliche => text.includes(cliche));

    const bullets = profileBullets(profile);
    const bulletsMissingMetrics = bullets.filter(
        bullet => bullet.length > MIN_BULLET_LENGTH_FOR_METRICS && !METRIC.test(bullet)
    );

    const counts = new Map<string, number>();
    for (const word of text.split(/[^a-z0-9'-]+/)) {
        if (word.length >= REPETITION_MIN_WORD_LENGTH) {
            counts.set(word, (counts.get(word) ?? 0) + 1);
        }
    }
    const repetitiveWords = [...counts.entries()]
        .filter(([, count]) => count > REPETITION_THRESHOLD)
        .map(([word, count]) => ({ word, count }));

    const metricsCoverage = bullets.length === 0
        ? 100
        : Math.round(((bullets.length - bulletsMissingMetrics.length) / bullets.length) * 100);
    const qualityScore = Math.max(
        0,
        BASE_QUALITY_SCORE
            - cliches.length * CLICHE_PENALTY
            - (metricsCoverage < LOW_METRICS_THRESHOLD ? LOW_METRICS_PENALTY : 0)
    );

    const notes: string[] = [];
    if (bulletsMissingMetrics.length > 0) {
        notes.push(`${bulletsMissingMetrics.length} experience bullets have no quantifiable metric; add numbers, percentages or timeframes.`);
    }
    for (const cliche of cliches) {
        notes.push(`Replace the overused phrase "${cliche}" with a specific achievement.`);
    }
    for (const { word, count } of repetitiveWords) {
        notes.push(`"${word}" appears ${count} times; vary the wording.`);
    }

    return {
        cliches,
        bulletsMissingMetrics,
        repetitiveWords,
        qualityScore,
        notes
    };
}

export function createQualityReviewTask(adapter?: IBackendAdapter): TaskSpec<QualityReviewOutput> {
    return {
        name: QUALITY_REVIEW_TASK,
        dependencies: [],
        schema: QualityReviewOutputSchema,
        fallback: context => reviewQualityFallback(context.profile),
        backend: delegateTo(adapter, context => ({
            task: QUALITY_REVIEW_TASK,
            instructions: 'Proofread the resume content. Return cliches, bulletsMissingMetrics (strings), '
                + 'repetitiveWords [{word, count}], qualityScore (integer 0-100) and notes (strings).',
            input: {
                roleTitle: context.role.roleTitle,
                profile: profilePayload(context.profile)
            }
        }))
    };
}
