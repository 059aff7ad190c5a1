import 'dotenv/config';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { OpenAIClient, VectorStoreClient } from '@careline/shared';
import { loadSettings } from '../config/Settings.js';

const SeedFileSchema = z.array(z.object({
    patientId: z.string().min(1),
    records: z.array(z.object({
        recordId: z.string().min(1),
        text: z.string().min(1),
        recordType: z.string().optional(),
        recordedAt: z.string().optional()
    }))
}));

async function seedRecords(filePath: string) {
    const settings = loadSettings();
    const openAIClient = new OpenAIClient({
        apiKey: settings.OPENAI_API_KEY,
        baseUrl: settings.OPENAI_BASE_URL,
        embeddingModel: settings.EMBEDDING_MODEL
    });

    const vectorStore = new VectorStoreClient({
        baseUrl: settings.QDRANT_URL,
        apiKey: settings.QDRANT_API_KEY,
        collectionName: settings.QDRANT_COLLECTION
    }, openAIClient.returnEmbeddingModel());

    const raw: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    const patients = SeedFileSchema.parse(raw);

    console.log('=== Seeding Patient Records ===\n');
    console.log(`Found ${patients.length} patients in ${filePath}`);

    let failures = 0;
    for (const [i, patient] of patients.entries()) {
        try {
            await vectorStore.addRecords(patient.patientId, patient.records);
            console.log(`  [${i + 1}/${patients.length}] ${patient.patientId}: ${patient.records.length} records`);
        } catch (error) {
            failures++;
            console.error(`  ERROR with patient ${patient.patientId}:`, error instanceof Error ? error.message : error);
        }
    }

    console.log(`\n=== Seeding Complete (${failures} failed) ===`);
    if (failures > 0) {
        process.exitCode = 1;
    }
}

const [filePath = 'packages/chat-server/fixtures/sample-records.json'] = process.argv.slice(2);

seedRecords(filePath).catch(error => {
    console.error('[Seed] Failed:', error);
    process.exitCode = 1;
});
