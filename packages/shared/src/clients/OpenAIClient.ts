import OpenAI from 'openai';
import fs from 'fs';
import { ChatOpenAI, OpenAIEmbeddings } from '@langchain/openai';

export interface OpenAIConfigs {
    apiKey: string;
    baseUrl?: string;
    chatModel?: string;
    transcriptionModel?: string;
    embeddingModel?: string;
}

export class OpenAIClient {
    private openai: OpenAI;
    private configs: OpenAIConfigs;

    constructor(configs: OpenAIConfigs) {
        this.configs = configs;
        this.openai = new OpenAI({
            apiKey: configs.apiKey,
            baseURL: configs.baseUrl
        });
    }

    get chatModelName(): string {
        return this.configs.chatModel ?? 'gpt-4o-mini';
    }

    returnChatModel(temperature: number = 0.3): ChatOpenAI {
        return new ChatOpenAI({
            apiKey: this.configs.apiKey,
            model: this.chatModelName,
            temperature,
            configuration: { baseURL: this.configs.baseUrl }
        });
    }

    returnEmbeddingModel(): OpenAIEmbeddings {
        return new OpenAIEmbeddings({
            apiKey: this.configs.apiKey,
            model: this.configs.embeddingModel ?? 'text-embedding-3-small',
            configuration: { baseURL: this.configs.baseUrl }
        });
    }

    async transcribeAudio(filePath: string): Promise<string> {
        try {
            const transcription = await this.openai.audio.transcriptions.create({
                file: fs.createReadStream(filePath),
                model: this.configs.transcriptionModel ?? 'whisper-1'
            });
            return transcription.text;
        } catch (error) {
            console.error('[OpenAI] Failed to transcribe audio:', error);
            throw new Error('[OpenAI] Call to api for transcription failed');
        }
    }

    getClient(): OpenAI {
        return this.openai;
    }
}
