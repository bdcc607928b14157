import skillLexicon from '../data/skill-lexicon.json';
import { TextIndex, tokenize } from '../utils/text-analysis.util';

export interface LexiconEntry {
    name: string;
    /** Each pattern is a token sequence. */
    patterns: readonly (readonly string[])[];
}

export interface LexiconMatch {
    name: string;
    position: number;
}

function compile(entries: readonly { name: string; patterns: readonly string[] }[]): LexiconEntry[] {
    return entries.map(entry => ({
        name: entry.name,
        patterns: entry.patterns
            .map(pattern => tokenize(pattern))
            .filter(tokens => tokens.length > 0)
    }));
}

export const HARD_SKILLS: readonly LexiconEntry[] = compile(skillLexicon);

export const SOFT_SKILLS: readonly LexiconEntry[] = compile([
    { name: 'Leadership', patterns: ['leadership'] },
    { name: 'Communication', patterns: ['communication', 'communicate'] },
    { name: 'Collaboration', patterns: ['collaboration', 'collaborate', 'collaborative'] },
    { name: 'Teamwork', patterns: ['teamwork'] },
    { name: 'Problem Solving', patterns: ['problem-solving', 'problem solving'] },
    { name: 'Analytical Thinking', patterns: ['analytical'] },
    { name: 'Creativity', patterns: ['creative', 'creativity'] },
    { name: 'Organization', patterns: ['organized', 'organizational'] },
    { name: 'Mentoring', patterns: ['mentoring', 'mentorship'] },
    { name: 'Ownership', patterns: ['ownership'] }
]);

/**
 * Lexicon entries found in the text, ordered by first occurrence.
 * Ties keep lexicon order.
 */
export function findMatches(index: TextIndex, lexicon: readonly LexiconEntry[]): LexiconMatch[] {
    const matches: LexiconMatch[] = [];
    for (const entry of lexicon) {
        const positions = entry.patterns
            .map(pattern => index.firstPosition(pattern))
            .filter(position => position >= 0);
        if (positions.length > 0) {
            matches.push({ name: entry.name, position: Math.min(...positions) });
        }
    }
    return matches
        .map((match, order) => ({ match, order }))
        .sort((a, b) => a.match.position - b.match.position || a.order - b.order)
        .map(({ match }) => match);
}

/**
 * Whether the text mentions a skill, by its own words or by any lexicon
 * pattern registered under the same name.
 */
export function mentionsSkill(index: TextIndex, skill: string): boolean {
    const own = tokenize(skill);
    if (own.length > 0 && index.firstPosition(own) >= 0) {
        return true;
    }
    const key = skill.toLowerCase();
    const entry = [...HARD_SKILLS, ...SOFT_SKILLS].find(candidate => candidate.name.toLowerCase() === key);
    return entry !== undefined && entry.patterns.some(pattern => index.firstPosition(pattern) >= 0);
}
