import type { RecordMatch, VectorStoreClient } from '@careline/shared';
import type { RecordRetriever, RetrievalContext } from '../types/Workflow.js';

export type RecordSearch = Pick<VectorStoreClient, 'searchRecords'>;

interface RecordRetrieverConfig {
    minScore: number;
}

export class PatientRecordRetriever implements RecordRetriever {
    private vectorStore: RecordSearch;
    private config: RecordRetrieverConfig;

    constructor(vectorStore: RecordSearch, config: Partial<RecordRetrieverConfig> = {}) {
        this.vectorStore = vectorStore;
        this.config = {
            minScore: config.minScore ?? 0
        };
    }

    async retrieve(patientId: string, queryText: string, topK: number): Promise<RetrievalContext> {
        console.log('[PatientRecordRetriever] Retrieving records:', { patientId, topK });

        const matches = await this.vectorStore.searchRecords(queryText, patientId, topK);

        // The store filters by patient already; anything attributed elsewhere is dropped.
        const scoped = matches
            .filter(match => match.metadata.patientId === patientId)
            .filter(match => match.score >= this.config.minScore)
            .slice(0, topK);

        if (scoped.length < matches.length) {
            console.warn('[PatientRecordRetriever] Discarded out-of-scope or low-score records:', matches.length - scoped.length);
        }

        return formatRecords(scoped);
    }
}

export function formatRecords(matches: RecordMatch[]): RetrievalContext {
    const sourceIds: string[] = [];
    const lines: string[] = [];

    matches.forEach((match, index) => {
        const recordId = typeof match.metadata.recordId === 'string' ? match.metadata.recordId : `record-${index + 1}`;
        const recordedAt = typeof match.metadata.recordedAt === 'string' ? ` (${match.metadata.recordedAt})` : '';
        sourceIds.push(recordId);
        lines.push(`${index + 1}. [${recordId}]${recordedAt} ${match.pageContent.trim()}`);
    });

    return {
        groundingText: lines.join('\n'),
        sourceIds
    };
}
