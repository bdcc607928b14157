import { DEFAULT_SCORE_WEIGHTS, ScoreWeights, assertValidWeights } from '../config/engine.config';
import { RoleContext } from '../types/profile';
import { MatchScore, SubScores, SynthesizedResume } from '../types/resume';
import { mentionsSkill } from '../tasks/lexicon';
import {
    DEFAULT_STOP_WORDS,
    TextIndex,
    extractTerms,
    isContentToken,
    tokenize
} from '../utils/text-analysis.util';

const BULLET_MIN_CHARS = 20;
const BULLET_MAX_CHARS = 220;
const RESUME_MIN_WORDS = 100;
const RESUME_MAX_WORDS = 1200;

const YEARS_REQUIREMENT = /(\d+)\s*\+?\s*(?:-\s*\d+\s*)?(?:years?|yrs?)\b/i;
// "2019", "2019-03", "2019/3"; a bare year counts from January.
const YEAR_MONTH = /\b((?:19|20)\d{2})(?:[-/](\d{1,2})\b)?/;

// Ordered from lowest to highest; rank is the index + 1.
const DEGREE_RANKS: readonly RegExp[] = [
    /\bassociate'?s?\b/i,
    /\bbachelor'?s?\b|\bb\.?s\.?c?\b|\bb\.?a\b|\bundergraduate\b/i,
    /\bmaster'?s?\b|\bm\.?s\.?c?\b|\bmba\b/i,
    /\bph\.?d\b|\bdoctora(?:te|l)\b/i
];

export function clampScore(value: number): number {
    return Math.min(100, Math.max(0, Math.round(value)));
}

/**
 * Weighted average of the sub-scores, rounded and clamped. The overall
 * score is never set any other way.
 */
export function computeOverall(subScores: SubScores, weights: ScoreWeights): number {
    return clampScore(
        weights.keywordCoverage * subScores.keywordCoverage
        + weights.qualificationCoverage * subScores.qualificationCoverage
        + weights.structuralCompliance * subScores.structuralCompliance
        + weights.semanticFit * subScores.semanticFit
    );
}

/**
 * Text the candidate can be credited for. A placeholder summary is written
 * from the role, not the profile, so it is left out.
 */
export function candidateText(resume: SynthesizedResume): string {
    return [
        candidateSummary(resume),
        resume.skills.join(', '),
        ...resume.experience.flatMap(entry => [`${entry.title}, ${entry.company}`, ...entry.bullets]),
        ...resume.education.map(entry => [entry.degree, entry.fieldOfStudy ?? '', entry.institution].join(', ')),
        ...resume.projects.map(project => [project.name, project.description, ...project.technologies].join(', '))
    ].join('\n');
}

function candidateSummary(resume: SynthesizedResume): string {
    return resume.summarySource === 'placeholder' ? '' : resume.summary.trim();
}

/** Months since year 0, or null when the text carries no year. */
function monthIndex(date: string | null): number | null {
    const match = date ? YEAR_MONTH.exec(date) : null;
    if (!match) {
        return null;
    }
    const month = match[2] ? Math.min(12, Math.max(1, Number(match[2]))) : 1;
    return Number(match[1]) * 12 + month - 1;
}

/** `YYYY-MM-DD` in UTC. */
export function toReferenceDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * Summed length of the dated experience entries, in whole years. A current
 * role runs until the reference date.
 */
export function experienceYears(resume: SynthesizedResume, referenceDate: Date): number {
    const reference = referenceDate.getUTCFullYear() * 12 + referenceDate.getUTCMonth();

    const months = resume.experience.reduce((total, entry) => {
        const start = monthIndex(entry.startDate);
        const end = monthIndex(entry.endDate) ?? (entry.current ? reference : null);
        return start !== null && end !== null ? total + Math.max(0, end - start) : total;
    }, 0);

    return Math.floor(months / 12);
}

export function degreeRank(text: string): number {
    let rank = 0;
    DEGREE_RANKS.forEach((pattern, index) => {
        if (pattern.test(text)) {
            rank = index + 1;
        }
    });
    return rank;
}

/**
 * Match Scorer
 *
 * Scores a SynthesizedResume against the posting. It reads only the
 * synthesized content and the RoleContext, so the result is the same
 * whichever tasks ran on the backend.
 */
export class MatchScorer {
    constructor(
        private readonly weights: ScoreWeights = DEFAULT_SCORE_WEIGHTS,
        private readonly stopWords: ReadonlySet<string> = DEFAULT_STOP_WORDS
    ) {
        assertValidWeights(weights);
    }

    /**
     * `referenceDate` is where current roles end; the same resume, role and
     * date always give the same score.
     */
    score(resume: SynthesizedResume, role: RoleContext, referenceDate: Date): MatchScore {
        const index = new TextIndex(candidateText(resume));

        const terms = extractTerms(role.jobDescription, this.stopWords);
        const missingKeywords = terms.filter(term => !index.hasTerm(term));
        const keywordCoverage = terms.length === 0
            ? 100
            : clampScore(((terms.length - missingKeywords.length) / terms.length) * 100);

        const qualifications = resume.requiredQualifications;
        const unmet = qualifications.filter(
            qualification => !this.isSatisfied(qualification, resume, index, referenceDate)
        );
        const qualificationCoverage = qualifications.length === 0
            ? 100
            : clampScore(((qualifications.length - unmet.length) / qualifications.length) * 100);

        const structuralCompliance = this.structuralCompliance(resume);

        const semanticFit = resume.semanticFit !== null
            ? clampScore(resume.semanticFit)
            : clampScore((keywordCoverage + qualificationCoverage + structuralCompliance) / 3);

        const subScores: SubScores = {
            keywordCoverage,
            qualificationCoverage,
            structuralCompliance,
            semanticFit
        };

        return {
            overall: computeOverall(subScores, this.weights),
            subScores,
            weights: { ...this.weights },
            missingKeywords,
            referenceDate: toReferenceDate(referenceDate),
            gaps: unmet.map(qualification => `Missing required qualification: ${qualification}`)
        };
    }

    private isSatisfied(
        qualification: string,
        resume: SynthesizedResume,
        index: TextIndex,
        referenceDate: Date
    ): boolean {
        const years = YEARS_REQUIREMENT.exec(qualification);
        if (years) {
            return experienceYears(resume, referenceDate) >= Number(years[1]);
        }

        const requiredRank = degreeRank(qualification);
        if (requiredRank > 0) {
            const held = Math.max(0, ...resume.education.map(entry => degreeRank(entry.degree)));
            return held >= requiredRank;
        }

        if (mentionsSkill(index, qualification)) {
            return true;
        }
        const tokens = tokenize(qualification).filter(token => isContentToken(token, this.stopWords));
        return tokens.every(token => index.hasToken(token));
    }

    /** Seven equally weighted checks. */
    private structuralCompliance(resume: SynthesizedResume): number {
        const bullets = resume.experience.flatMap(entry => entry.bullets);
        const words = candidateText(resume).split(/\s+/).filter(word => word.length > 0).length;

        const checks = [
            candidateSummary(resume).length > 0,
            resume.experience.length > 0,
            resume.skills.length > 0,
            resume.education.length > 0,
            resume.experience.length > 0 && resume.experience.every(entry => entry.bullets.length > 0),
            bullets.length > 0 && bullets.every(
                bullet => bullet.trim().length >= BULLET_MIN_CHARS && bullet.trim().length <= BULLET_MAX_CHARS
            ),
            words >= RESUME_MIN_WORDS && words <= RESUME_MAX_WORDS
        ];

        return clampScore((checks.filter(Boolean).length / checks.length) * 100);
    }
}
