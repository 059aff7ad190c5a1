import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalString = z.string().trim().min(1).optional().catch(undefined);

export const SettingsSchema = z.object({
    PORT: positiveInt(3001),
    OPENAI_API_KEY: z.string().trim().min(1, 'OPENAI_API_KEY is required'),
    OPENAI_BASE_URL: optionalString,
    CHAT_MODEL: z.string().default('gpt-4o-mini'),
    TRANSCRIPTION_MODEL: z.string().default('whisper-1'),
    EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    QDRANT_URL: z.string().url().default('http://localhost:6333'),
    QDRANT_API_KEY: optionalString,
    QDRANT_COLLECTION: z.string().default('patient_records'),
    IMAGE_CLASSIFIER_URL: z.string().url().default('http://localhost:8500'),
    REDIS_URL: optionalString,
    UPLOAD_DIR: z.string().default('uploads'),
    HISTORY_WINDOW: positiveInt(5),
    RETRIEVAL_TOP_K: positiveInt(3),
    MAX_WORKFLOW_STEPS: positiveInt(10),
    COLLABORATOR_TIMEOUT_MS: positiveInt(30_000),
    SESSION_IDLE_MINUTES: positiveInt(60),
    SESSION_STORE_MAX_ENTRIES: positiveInt(200),
    UPLOAD_RETENTION_DAYS: positiveInt(7),
    RATE_LIMIT_PER_MINUTE: positiveInt(20),
    RATE_LIMIT_PER_HOUR: positiveInt(100),
});

export type Settings = z.infer<typeof SettingsSchema>;

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const parsed = SettingsSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`[Settings] Invalid configuration: ${problems}`);
    }
    return parsed.data;
}
