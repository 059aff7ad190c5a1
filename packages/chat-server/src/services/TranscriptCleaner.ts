import nlp from 'compromise';

// Bracketed captions emitted by speech models: [music], (inaudible), <noise>, ♪
const NON_SPEECH_MARKERS = /\[[^\]]*\]|\([^)]*\)|<[^>]*>|♪+/g;

// compromise tags these as #Expression alongside real interjections, so match them by word.
export const FILLER_WORDS = ['um', 'umm', 'uh', 'uhh', 'uhm', 'erm', 'hmm', 'hmmm'] as const;

const FILLER_MATCH = `(${FILLER_WORDS.join('|')})`;

export class TranscriptCleaner {
    clean(rawTranscript: string): string {
        const withoutMarkers = rawTranscript.replace(NON_SPEECH_MARKERS, ' ');
        if (!withoutMarkers.trim()) return '';

        const doc = nlp(withoutMarkers);
        doc.remove(FILLER_MATCH);

        return doc.text()
            .replace(/\s+([,.!?;:])/g, '$1')
            .replace(/^[\s,;:]+/, '')
            .replace(/\s+/g, ' ')
            .trim();
    }
}
