import { describe, it, expect } from 'vitest';
import {
    clampScore,
    computeOverall,
    degreeRank,
    experienceYears,
    MatchScorer
} from '../../../src/engine/match-scorer';
import { synthesizeResume } from '../../../src/engine/resume-synthesizer';
import { DEFAULT_SCORE_WEIGHTS } from '../../../src/config/engine.config';
import { MatchScoreSchema, SynthesizedResume } from '../../../src/types/resume';
import { ProfileSnapshotData } from '../../../src/types/profile';
import { buildProfile, buildRole, fallbackResults } from '../../fixtures';

// Acme 2019-01..2021-01 (24 months) plus Northwind 2016-06..2018-12 (30 months).
const REFERENCE_DATE = new Date('2021-01-15T00:00:00Z');

function tailoredResume(overrides: Partial<ProfileSnapshotData> = {}): SynthesizedResume {
    const profile = buildProfile(overrides);
    const role = buildRole();
    return synthesizeResume(profile, role, fallbackResults(profile, role));
}

describe('Match Scorer', () => {
    const role = buildRole();

    describe('score', () => {
        it('should score a resume missing one of three required keywords', () => {
            const score = new MatchScorer().score(tailoredResume(), role, REFERENCE_DATE);

            expect(score).toEqual({
                overall: 70,
                subScores: {
                    keywordCoverage: 67,
                    qualificationCoverage: 67,
                    structuralCompliance: 86,
                    semanticFit: 73
                },
                weights: { ...DEFAULT_SCORE_WEIGHTS },
                missingKeywords: ['aws'],
                gaps: ['Missing required qualification: AWS'],
                referenceDate: '2021-01-15'
            });
            expect(MatchScoreSchema.safeParse(score).success).toBe(true);
        });

        it('should use the semantic fit carried by the resume', () => {
            const score = new MatchScorer().score({ ...tailoredResume(), semanticFit: 92 }, role, REFERENCE_DATE);

            expect(score.subScores.semanticFit).toBe(92);
            expect(score.overall).toBe(74);
        });

        it('should apply custom weights', () => {
            const weights = { keywordCoverage: 1, qualificationCoverage: 0, structuralCompliance: 0, semanticFit: 0 };
            const score = new MatchScorer(weights).score(tailoredResume(), role, REFERENCE_DATE);

            expect(score.overall).toBe(67);
            expect(score.weights).toEqual(weights);
        });

        it('should reject weights that do not sum to one', () => {
            expect(() => new MatchScorer({
                keywordCoverage: 0.5,
                qualificationCoverage: 0.5,
                structuralCompliance: 0.5,
                semanticFit: 0
            })).toThrow('Score weights must sum to 1.0');
        });

        it('should give full keyword coverage when the posting has no content terms', () => {
            const score = new MatchScorer().score(
                tailoredResume(),
                buildRole({ jobDescription: 'We are looking for the ideal candidate' }),
                REFERENCE_DATE
            );

            expect(score.subScores.keywordCoverage).toBe(100);
            expect(score.missingKeywords).toEqual([]);
        });

        it('should be deterministic', () => {
            const scorer = new MatchScorer();
            expect(scorer.score(tailoredResume(), role, REFERENCE_DATE)).toEqual(scorer.score(tailoredResume(), role, REFERENCE_DATE));
        });
    });

    describe('qualifications', () => {
        const scoreWith = (requiredQualifications: string[]) =>
            new MatchScorer().score({ ...tailoredResume(), requiredQualifications }, role, REFERENCE_DATE);

        it('should check years of experience against the dated roles', () => {
            expect(scoreWith(['4+ years of experience']).subScores.qualificationCoverage).toBe(100);
            expect(scoreWith(['5+ years of experience']).gaps).toEqual(['Missing required qualification: 5+ years of experience']);
        });

        it('should count a current role up to the reference date', () => {
            const resume = tailoredResume({
                experience: [{
                    title: 'Data Engineer',
                    company: 'Acme Analytics',
                    startDate: '2015-01',
                    current: true,
                    bullets: ['Built Python ETL pipelines processing 2M rows daily']
                }],
                education: []
            });

            const score = new MatchScorer().score(
                { ...resume, requiredQualifications: ['3+ years of experience'] },
                role,
                new Date('2026-10-19T00:00:00Z')
            );

            expect(score.subScores.qualificationCoverage).toBe(100);
            expect(score.gaps).toEqual([]);
            expect(score.referenceDate).toBe('2026-10-19');
        });

        it('should compare degree levels', () => {
            expect(scoreWith(["Bachelor's degree"]).subScores.qualificationCoverage).toBe(100);
            expect(scoreWith(["Master's degree"]).subScores.qualificationCoverage).toBe(0);
        });

        it('should accept free-text qualifications whose content words all appear', () => {
            expect(scoreWith(['Computer Science']).subScores.qualificationCoverage).toBe(100);
            expect(scoreWith(['regional dashboards', 'Kubernetes']).subScores.qualificationCoverage).toBe(50);
        });

        it('should give full coverage when nothing is required', () => {
            expect(scoreWith([]).subScores.qualificationCoverage).toBe(100);
        });
    });

    describe('placeholder summary', () => {
        it('should not credit keywords from a summary written from the role', () => {
            const empty = tailoredResume({ summary: '', skills: [], experience: [], education: [], projects: [] });

            const score = new MatchScorer().score(
                empty,
                buildRole({ jobDescription: 'Data Engineer at Globex' }),
                REFERENCE_DATE
            );

            expect(empty.summary).toBe('Data Engineer candidate for Globex.');
            expect(empty.summarySource).toBe('placeholder');
            expect(score.subScores.keywordCoverage).toBe(0);
            expect(score.subScores.structuralCompliance).toBe(0);
        });
    });

    describe('structural compliance', () => {
        it('should pass every check for a complete resume of reasonable length', () => {
            const resume = { ...tailoredResume(), summary: Array(100).fill('pipeline').join(' ') };
            expect(new MatchScorer().score(resume, role, REFERENCE_DATE).subScores.structuralCompliance).toBe(100);
        });

        it('should fail the bullet check for very short bullets', () => {
            const base = tailoredResume();
            const resume = {
                ...base,
                summary: Array(100).fill('pipeline').join(' '),
                experience: base.experience.map(entry => ({ ...entry, bullets: ['Too short'] }))
            };
            expect(new MatchScorer().score(resume, role, REFERENCE_DATE).subScores.structuralCompliance).toBe(86);
        });

        it('should score an empty resume low but not zero', () => {
            const resume: SynthesizedResume = {
                ...tailoredResume(),
                skills: [],
                experience: [],
                education: [],
                projects: []
            };
            // Only the summary check passes.
            expect(new MatchScorer().score(resume, role, REFERENCE_DATE).subScores.structuralCompliance).toBe(14);
        });
    });

    describe('helpers', () => {
        it('should clamp and round scores', () => {
            expect(clampScore(-3)).toBe(0);
            expect(clampScore(104)).toBe(100);
            expect(clampScore(66.6)).toBe(67);
        });

        it('should compute the weighted overall', () => {
            expect(computeOverall(
                { keywordCoverage: 50, qualificationCoverage: 80, structuralCompliance: 100, semanticFit: 60 },
                DEFAULT_SCORE_WEIGHTS
            )).toBe(66);
            expect(computeOverall(
                { keywordCoverage: 100, qualificationCoverage: 100, structuralCompliance: 100, semanticFit: 100 },
                DEFAULT_SCORE_WEIGHTS
            )).toBe(100);
        });

        it('should sum dated roles in whole years, ending current roles at the reference date', () => {
            expect(experienceYears(tailoredResume(), REFERENCE_DATE)).toBe(4);
            expect(experienceYears(tailoredResume(), new Date('2026-10-19T00:00:00Z'))).toBe(10);
        });

        it('should skip roles without a start year', () => {
            const resume = tailoredResume({
                experience: [{ title: 'Consultant', company: 'Initech', current: true, bullets: [] }]
            });
            expect(experienceYears(resume, REFERENCE_DATE)).toBe(0);
        });

        it('should rank degrees', () => {
            expect(degreeRank('Associate of Arts')).toBe(1);
            expect(degreeRank("Bachelor's degree")).toBe(2);
            expect(degreeRank('MBA')).toBe(3);
            expect(degreeRank('PhD in Physics')).toBe(4);
            expect(degreeRank('Kafka')).toBe(0);
        });
    });
});
