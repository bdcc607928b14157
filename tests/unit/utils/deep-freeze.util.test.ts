import { describe, it, expect } from 'vitest';
import { deepFreeze, frozenCopy } from '../../../src/utils/deep-freeze.util';

describe('Deep Freeze Utility', () => {
    it('should freeze nested objects and arrays in place', () => {
        const value = { name: 'Jordan', skills: [{ name: 'SQL' }], meta: { tags: ['a'] } };
        const frozen = deepFreeze(value);

        expect(frozen).toBe(value);
        expect(Object.isFrozen(value)).toBe(true);
        expect(Object.isFrozen(value.skills)).toBe(true);
        expect(Object.isFrozen(value.skills[0])).toBe(true);
        expect(Object.isFrozen(value.meta.tags)).toBe(true);
    });

    it('should pass primitives and null through', () => {
        expect(deepFreeze(3)).toBe(3);
        expect(deepFreeze(null)).toBeNull();
    });

    it('should leave the source untouched when copying', () => {
        const source = { bullets: ['Shipped v2'] };
        const copy = frozenCopy(source);

        expect(copy).toEqual(source);
        expect(copy).not.toBe(source);
        expect(Object.isFrozen(copy.bullets)).toBe(true);
        expect(Object.isFrozen(source)).toBe(false);
        source.bullets.push('Added later');
        expect(copy.bullets).toEqual(['Shipped v2']);
    });
});
