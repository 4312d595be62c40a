import lexicon from './lexicon.json';

const STOP_WORDS: ReadonlySet<string> = new Set(lexicon.stopWords);
const MIN_KEYWORD_LENGTH = 3;

/**
 * Splits text into lower-cased word tokens.
 */
export function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .split(/[^\p{L}\p{N}]+/u)
        .filter((token) => token.length > 0);
}

/**
 * Extracts distinct content words (no stop words, at least three characters)
 * in order of first appearance.
 */
export function extractKeywords(...texts: Array<string | undefined>): string[] {
    const keywords: string[] = [];
    for (const text of texts) {
        if (!text) continue;
        for (const token of tokenize(text)) {
            if (token.length >= MIN_KEYWORD_LENGTH && !STOP_WORDS.has(token) && !keywords.includes(token)) {
                keywords.push(token);
            }
        }
    }
    return keywords;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Builds a case-insensitive whole-word matcher; spaces in a phrase match any whitespace.
 */
export function termPattern(term: string): RegExp {
    const body = term
        .trim()
        .split(/\s+/)
        .map(escapeRegExp)
        .join('\\s+');
    return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, 'iu');
}

/**
 * Returns the terms that occur in the text, in the order of the term list.
 */
export function findTerms(text: string, terms: readonly string[]): string[] {
    if (!text.trim()) {
        return [];
    }
    return terms.filter((term) => term.trim().length > 0 && termPattern(term).test(text));
}
