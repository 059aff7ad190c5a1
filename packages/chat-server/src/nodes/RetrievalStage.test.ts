import { beforeEach, describe, expect, it, vi } from 'vitest';
import { RetrievalStage } from './RetrievalStage.js';
import type { RecordRetriever } from '../types/Workflow.js';
import { BLOOD_TEST_CONTEXT, FakeRecordRetriever, silenceConsole, stateWith } from '../testing/fakes.js';

describe('RetrievalStage', () => {
    beforeEach(() => {
        vi.restoreAllMocks();
        silenceConsole();
    });

    it('retrieves records for the current patient and returns to reasoning', async () => {
        const retriever = new FakeRecordRetriever();
        const update = await new RetrievalStage(retriever, 3, 1000).run(
            stateWith({ patientId: 'P-1', rawText: 'What were my last blood test results?' })
        );

        expect(retriever.calls).toEqual([{ patientId: 'P-1', queryText: 'What were my last blood test results?', topK: 3 }]);
        expect(update).toEqual({
            retrievalContext: BLOOD_TEST_CONTEXT,
            retrievalCount: 1,
            toolsUsed: ['patient_records'],
            nextStage: 'reason'
        });
    });

    it('searches with the transcript for spoken questions', async () => {
        const retriever = new FakeRecordRetriever();
        await new RetrievalStage(retriever, 5, 1000).run(stateWith({ transcript: 'what are my allergies' }));

        expect(retriever.calls[0].queryText).toBe('what are my allergies');
        expect(retriever.calls[0].topK).toBe(5);
    });

    it('continues with an empty context when the store fails', async () => {
        const broken: RecordRetriever = { retrieve: () => Promise.reject(new Error('qdrant down')) };
        const update = await new RetrievalStage(broken, 3, 1000).run(stateWith({ rawText: 'my records' }));

        expect(update.retrievalContext).toEqual({ groundingText: '', sourceIds: [] });
        expect(update.retrievalCount).toBe(1);
    });
});
