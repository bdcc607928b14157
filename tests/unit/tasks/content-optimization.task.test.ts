import { describe, it, expect } from 'vitest';
import { optimizeContentFallback } from '../../../src/tasks/content-optimization.task';
import { analyzeJobFallback } from '../../../src/tasks/job-analysis.task';
import { buildProfile, buildRole } from '../../fixtures';

describe('Content Optimization Task', () => {
    const role = buildRole();
    const job = analyzeJobFallback(role);

    it('should put posting skills first and add one evidenced skill to the summary', () => {
        expect(optimizeContentFallback(buildProfile(), job)).toEqual({
            optimizedSummary: 'Data engineer building reliable pipelines. Experienced with Python.',
            prioritizedSkills: ['Python', 'SQL', 'Docker'],
            skillsToAdd: ['AWS'],
            skillsToEmphasize: ['Python', 'SQL'],
            optimizedBullets: [],
            suggestions: [
                'If you have them, add these skills from the posting: AWS.',
                'Emphasize Python, SQL in your experience bullets.'
            ]
        });
    });

    it('should never add an unevidenced skill to the summary', () => {
        const output = optimizeContentFallback(buildProfile(), job);
        expect(output.optimizedSummary).not.toContain('AWS');
    });

    it('should keep a summary that already names the evidenced skills', () => {
        const profile = buildProfile({ summary: 'Data engineer fluent in Python and SQL' });

        expect(optimizeContentFallback(profile, job).optimizedSummary).toBe('Data engineer fluent in Python and SQL');
    });

    it('should build a summary from the latest title when none is given', () => {
        const profile = buildProfile({ summary: '' });

        expect(optimizeContentFallback(profile, job).optimizedSummary).toBe('Data Engineer with experience in Python, SQL.');
    });

    it('should leave the summary to the synthesizer for an empty profile', () => {
        const profile = buildProfile({ summary: '', skills: [], experience: [], education: [] });
        const output = optimizeContentFallback(profile, job);

        expect(output.optimizedSummary).toBeUndefined();
        expect(output.prioritizedSkills).toEqual([]);
        expect(output.skillsToAdd).toEqual(['Python', 'SQL', 'AWS']);
        expect(output.suggestions).toEqual(['If you have them, add these skills from the posting: Python, SQL, AWS.']);
    });
});
