import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { RecordMatch } from '@careline/shared';
import { PatientRecordRetriever, formatRecords, type RecordSearch } from './PatientRecordRetriever.js';
import { silenceConsole } from '../testing/fakes.js';

function match(pageContent: string, metadata: Record<string, unknown>, score: number): RecordMatch {
    return { pageContent, metadata, score };
}

describe('formatRecords', () => {
    it('numbers records and lists their sources', () => {
        expect(formatRecords([
            match(' HbA1c 6.1%. ', { patientId: 'P-1', recordId: 'lab-1', recordedAt: '2024-03-02' }, 0.9),
            match('Penicillin allergy.', { patientId: 'P-1' }, 0.8),
        ])).toEqual({
            groundingText: '1. [lab-1] (2024-03-02) HbA1c 6.1%.\n2. [record-2] Penicillin allergy.',
            sourceIds: ['lab-1', 'record-2']
        });
    });

    it('returns an empty context for no matches', () => {
        expect(formatRecords([])).toEqual({ groundingText: '', sourceIds: [] });
    });
});

describe('PatientRecordRetriever', () => {
    beforeEach(() => {
        vi.restoreAllMocks();
        silenceConsole();
    });

    it('keeps only records of the requesting patient above the score floor', async () => {
        const search: RecordSearch = {
            searchRecords: vi.fn(async () => [
                match('Metformin 500 mg.', { patientId: 'P-1', recordId: 'med-1' }, 0.82),
                match('Someone else.', { patientId: 'P-2', recordId: 'med-9' }, 0.95),
                match('Old note.', { patientId: 'P-1', recordId: 'note-3' }, 0.1),
            ])
        };
        const retriever = new PatientRecordRetriever(search, { minScore: 0.3 });

        const context = await retriever.retrieve('P-1', 'what are my medications', 3);

        expect(search.searchRecords).toHaveBeenCalledWith('what are my medications', 'P-1', 3);
        expect(context).toEqual({ groundingText: '1. [med-1] Metformin 500 mg.', sourceIds: ['med-1'] });
    });
});
