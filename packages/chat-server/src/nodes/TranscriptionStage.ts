import { withTimeout } from '@careline/shared';
import type { ConversationStateType, ConversationUpdate } from '../states/ConversationState.js';
import type { Transcriber } from '../types/Workflow.js';
import { TranscriptCleaner } from '../services/TranscriptCleaner.js';
import { failWith, type Stage } from './Stage.js';

export class TranscriptionStage implements Stage {
    constructor(
        private transcriber: Transcriber,
        private timeoutMs: number,
        private cleaner: TranscriptCleaner = new TranscriptCleaner()
    ) {}

    async run(state: ConversationStateType): Promise<ConversationUpdate> {
        const audio = state.audioRef;
        if (!audio) {
            console.error('[TranscriptionStage] Reached without an audio attachment');
            return failWith('TranscriptionFailed');
        }

        let rawTranscript: string;
        try {
            rawTranscript = await withTimeout(this.transcriber.transcribe(audio), this.timeoutMs, 'Transcription');
        } catch (error) {
            console.error('[TranscriptionStage] Transcription failed:', error);
            return failWith('TranscriptionFailed');
        }

        const transcript = this.cleaner.clean(rawTranscript);
        if (!transcript) {
            console.warn('[TranscriptionStage] Transcript was empty after cleanup');
            return failWith('TranscriptionFailed');
        }

        console.log('[TranscriptionStage] Transcribed audio:', {
            sessionId: state.sessionId,
            transcriptLength: transcript.length
        });

        return {
            transcript,
            toolsUsed: ['speech_to_text'],
            nextStage: state.imageRef ? 'analyze_image' : 'reason'
        };
    }
}
