import axios, { AxiosInstance } from 'axios';
import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

export interface ImageClassifierConfig {
    baseUrl: string;
    timeoutMs?: number;
}

export interface ClassifierPrediction {
    label: string;
    score: number;
}

const ClassifierResponseSchema = z.object({
    predictions: z.array(z.object({
        label: z.string(),
        score: z.number()
    }))
});

/**
 * HTTP client for the skin-condition classifier service. The service takes a
 * base64 image and answers with one score per label it knows about.
 */
export class ImageClassifierClient {
    private client: AxiosInstance;

    constructor(config: ImageClassifierConfig) {
        this.client = axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeoutMs ?? 30000,
            headers: { 'Content-Type': 'application/json' }
        });
    }

    async classifyImage(filePath: string): Promise<ClassifierPrediction[]> {
        const image = await readFile(filePath);

        const response = await this.client.post('/classify', {
            filename: path.basename(filePath),
            image: image.toString('base64')
        });

        const parsed = ClassifierResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            console.warn('[ImageClassifierClient] Unexpected response format from classifier');
            throw new Error('[ImageClassifierClient] Classifier returned an invalid payload');
        }

        return parsed.data.predictions;
    }

    async isHealthy(): Promise<boolean> {
        try {
            const response = await this.client.get('/health');
            return response.status === 200;
        } catch (error) {
            console.error('[ImageClassifierClient] Health check failed:', error);
            return false;
        }
    }
}
