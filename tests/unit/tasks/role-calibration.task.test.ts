import { describe, it, expect } from 'vitest';
import { calibrateRoleFallback, detectWritingLevel } from '../../../src/tasks/role-calibration.task';
import { buildProfile } from '../../fixtures';

function profileWithBullets(bullets: string[]) {
    return buildProfile({
        summary: '',
        experience: [{ title: 'Engineer', company: 'Initech', current: true, bullets }]
    });
}

describe('Role Calibration Task', () => {
    describe('detectWritingLevel', () => {
        it('should detect senior language from two or more senior verbs', () => {
            const profile = profileWithBullets(['Led the platform group', 'Mentored four engineers', 'Architected billing']);
            expect(detectWritingLevel(profile)).toBe('senior');
        });

        it('should prefer the lower level when several qualify', () => {
            const profile = profileWithBullets(['Assisted with audits', 'Helped onboard users', 'Led a migration', 'Designed the schema']);
            expect(detectWritingLevel(profile)).toBe('junior');
        });

        it('should default to mid', () => {
            expect(detectWritingLevel(buildProfile())).toBe('mid');
        });
    });

    describe('calibrateRoleFallback', () => {
        it('should report alignment when levels match', () => {
            expect(calibrateRoleFallback(buildProfile(), 'mid')).toEqual({
                currentLevel: 'mid',
                targetLevel: 'mid',
                alignmentScore: 100,
                issues: [],
                suggestedVerbs: ['developed', 'implemented', 'delivered', 'improved', 'built', 'created'],
                toneShift: 'Shift from collaborative to ownership language'
            });
        });

        it('should flag a mismatch and suggest target-level verbs', () => {
            const profile = profileWithBullets(['Led the platform group', 'Mentored four engineers']);
            const output = calibrateRoleFallback(profile, 'executive');

            expect(output.currentLevel).toBe('senior');
            expect(output.alignmentScore).toBe(60);
            expect(output.issues).toEqual([
                'Language reads as senior level; the role targets executive. Prefer verbs such as directed, transformed, established.'
            ]);
            expect(output.toneShift).toBe('Focus on strategic impact');
        });

        it('should use learning-oriented tone for junior targets', () => {
            expect(calibrateRoleFallback(buildProfile(), 'junior').toneShift).toBe('Highlight learning and contribution');
        });
    });
});
