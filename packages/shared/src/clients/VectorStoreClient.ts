import { QdrantVectorStore } from "@langchain/qdrant";
import type { EmbeddingsInterface } from "@langchain/core/embeddings";

export interface VectorStoreConfigs {
    baseUrl: string;
    apiKey?: string;
    collectionName: string;
}

export interface PatientRecord {
    recordId: string;
    text: string;
    recordType?: string;
    recordedAt?: string;
}

export interface RecordMatch {
    pageContent: string;
    metadata: Record<string, unknown>;
    score: number;
}

export class VectorStoreClient {
    private vectorStore: QdrantVectorStore;

    constructor(config: VectorStoreConfigs, embeddingModel: EmbeddingsInterface) {
        this.vectorStore = new QdrantVectorStore(embeddingModel, {
            url: config.baseUrl,
            apiKey: config.apiKey,
            collectionName: config.collectionName
        });
    }

    // LangChain stores document metadata under the `metadata` payload key.
    private patientFilter(patientId: string) {
        return { must: [{ key: "metadata.patientId", match: { value: patientId } }] };
    }

    async searchRecords(query: string, patientId: string, k: number = 3): Promise<RecordMatch[]> {
        const results = await this.vectorStore.similaritySearchWithScore(
            query,
            k,
            this.patientFilter(patientId)
        );

        return results.map(([doc, score]) => ({
            pageContent: doc.pageContent,
            metadata: doc.metadata,
            score
        }));
    }

    async addRecords(patientId: string, records: PatientRecord[]): Promise<void> {
        const documents = records.map(record => ({
            pageContent: record.text,
            metadata: {
                patientId,
                recordId: record.recordId,
                recordType: record.recordType ?? 'note',
                recordedAt: record.recordedAt
            }
        }));

        await this.vectorStore.addDocuments(documents);
    }
}
