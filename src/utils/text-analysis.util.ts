import stopWordList from '../data/stop-words.json';

/**
 * Text Analysis Utility
 *
 * Deterministic tokenization shared by the fallbacks and the match scorer.
 * Text is lower-cased and split into phrase segments at punctuation, so an
 * n-gram never spans a comma or a sentence boundary.
 */

export const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

const SEGMENT_BREAK = /[,;:!?()[\]{}<>"|•·\n\r\t]+|\.(?=\s|$)|\s[-–—]\s/;
const TOKEN = /[a-z0-9+#][a-z0-9+#.'-]*/g;

export function normalizeText(text: string): string {
    return text.toLowerCase().replace(/[‘’]/g, "'");
}

function cleanToken(token: string): string {
    return token.replace(/'s$/, '').replace(/[.'-]+$/, '');
}

export function tokenize(text: string): string[] {
    const matches = normalizeText(text).match(TOKEN) ?? [];
    return matches.map(cleanToken).filter(token => token.length > 0);
}

export function segmentTokens(text: string): string[][] {
    return normalizeText(text)
        .split(SEGMENT_BREAK)
        .map(segment => tokenize(segment))
        .filter(tokens => tokens.length > 0);
}

export function isContentToken(token: string, stopWords: ReadonlySet<string> = DEFAULT_STOP_WORDS): boolean {
    return token.length > 1 && /[a-z]/.test(token) && !stopWords.has(token);
}

/**
 * Unigrams and bigrams of content tokens, in order of first appearance.
 * A bigram is two adjacent content tokens within one segment; stop words
 * are elided, never bridged.
 */
export function extractTerms(text: string, stopWords: ReadonlySet<string> = DEFAULT_STOP_WORDS): string[] {
    const terms: string[] = [];
    const seen = new Set<string>();
    const add = (term: string) => {
        if (!seen.has(term)) {
            seen.add(term);
            terms.push(term);
        }
    };

    for (const tokens of segmentTokens(text)) {
        tokens.forEach((token, index) => {
            if (!isContentToken(token, stopWords)) {
                return;
            }
            add(token);
            const next = tokens[index + 1];
            if (next !== undefined && isContentToken(next, stopWords)) {
                add(`${token} ${next}`);
            }
        });
    }
    return terms;
}

/**
 * Sentences with their original casing, split at terminal punctuation,
 * line breaks and bullet glyphs.
 */
export function splitSentences(text: string): string[] {
    return text
        .split(/(?<=[.!?])\s+|[\r\n]+|[•·]/)
        .map(sentence => sentence.replace(/^[\s*-]+/, '').trim())
        .filter(sentence => sentence.length > 0);
}

/**
 * Searchable view of a body of text: token and adjacent-pair lookups plus
 * phrase positions.
 */
export class TextIndex {
    private readonly segments: string[][];
    private readonly tokens = new Set<string>();
    private readonly bigrams = new Set<string>();

    constructor(text: string) {
        this.segments = segmentTokens(text);
        for (const segment of this.segments) {
            segment.forEach((token, index) => {
                this.tokens.add(token);
                const next = segment[index + 1];
                if (next !== undefined) {
                    this.bigrams.add(`${token} ${next}`);
                }
            });
        }
    }

    hasToken(token: string): boolean {
        return this.tokens.has(token);
    }

    /** True when the space-separated term occurs as a token sequence. */
    hasTerm(term: string): boolean {
        const parts = term.split(' ').filter(part => part.length > 0);
        if (parts.length === 1) {
            return this.tokens.has(parts[0]);
        }
        if (parts.length === 2) {
            return this.bigrams.has(term);
        }
        return this.firstPosition(parts) >= 0;
    }

    /** Global token position of the first occurrence of a phrase, or -1. */
    firstPosition(phrase: readonly string[]): number {
        if (phrase.length === 0) {
            return -1;
        }
        let offset = 0;
        for (const segment of this.segments) {
            for (let start = 0; start + phrase.length <= segment.length; start++) {
                if (phrase.every((part, i) => segment[start + i] === part)) {
                    return offset + start;
                }
            }
            offset += segment.length;
        }
        return -1;
    }
}
