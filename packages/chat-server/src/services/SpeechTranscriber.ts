import type { OpenAIClient } from '@careline/shared';
import type { AttachmentRef, Transcriber } from '../types/Workflow.js';

export class SpeechTranscriber implements Transcriber {
    constructor(private openAIClient: Pick<OpenAIClient, 'transcribeAudio'>) {}

    async transcribe(audio: AttachmentRef): Promise<string> {
        console.log('[SpeechTranscriber] Transcribing audio:', {
            filename: audio.filename ?? audio.path,
            sizeBytes: audio.sizeBytes
        });
        return await this.openAIClient.transcribeAudio(audio.path);
    }
}
