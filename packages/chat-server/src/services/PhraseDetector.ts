import type { TextDetector } from '../types/Workflow.js';

export function normalizeForMatching(text: string): string {
    return text
        .toLowerCase()
        .replace(/[‘’ʼ]/g, "'")
        .replace(/\s+/g, ' ')
        .trim();
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-phrase matcher over a fixed lexicon. Matching is case-insensitive,
 * tolerant of curly apostrophes and runs of whitespace, and never matches
 * inside a longer word.
 */
export class PhraseDetector implements TextDetector {
    private patterns: Array<{ phrase: string; regex: RegExp }>;

    constructor(phrases: readonly string[]) {
        this.patterns = phrases
            .map(phrase => normalizeForMatching(phrase))
            .filter(phrase => phrase.length > 0)
            .map(phrase => ({
                phrase,
                regex: new RegExp(`(?:^|[^a-z0-9'])${escapeRegExp(phrase)}(?=$|[^a-z0-9'])`)
            }));
    }

    detect(text: string): boolean {
        return this.match(text) !== null;
    }

    match(text: string): string | null {
        const normalized = normalizeForMatching(text);
        if (!normalized) return null;

        for (const { phrase, regex } of this.patterns) {
            if (regex.test(normalized)) {
                return phrase;
            }
        }
        return null;
    }
}
