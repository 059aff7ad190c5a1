import { withTimeout } from '@careline/shared';
import type { ConversationStateType, ConversationUpdate } from '../states/ConversationState.js';
import type { ResponseGenerator, TextDetector } from '../types/Workflow.js';
import { EMERGENCY_PHRASES, RECORD_INTENT_PHRASES } from '../services/lexicons.js';
import { PhraseDetector } from '../services/PhraseDetector.js';
import { MEDICAL_SYSTEM_PROMPT, buildContextBundle, effectiveQuery } from '../services/PromptBuilder.js';
import { failWith, type Stage } from './Stage.js';

export const EMERGENCY_RESPONSE =
    'This may be a medical emergency. Please call your local emergency number (such as 911) ' +
    'or go to the nearest emergency department immediately. Do not wait for an online response.';

export type ReasoningOutcome = 'emergency' | 'awaiting_retrieval' | 'generated' | 'failed';

export interface ReasoningStageOptions {
    generator: ResponseGenerator;
    timeoutMs: number;
    emergencyDetector?: TextDetector;
    recordIntentDetector?: TextDetector;
    systemPrompt?: string;
}

/**
 * Start -> EmergencyShortCircuit | AwaitingRetrieval | Generated.
 * The emergency scan always runs first and nothing downstream can suppress it.
 */
export class ReasoningStage implements Stage {
    private generator: ResponseGenerator;
    private timeoutMs: number;
    private emergencyDetector: TextDetector;
    private recordIntentDetector: TextDetector;
    private systemPrompt: string;

    constructor(options: ReasoningStageOptions) {
        this.generator = options.generator;
        this.timeoutMs = options.timeoutMs;
        this.emergencyDetector = options.emergencyDetector ?? new PhraseDetector(EMERGENCY_PHRASES);
        this.recordIntentDetector = options.recordIntentDetector ?? new PhraseDetector(RECORD_INTENT_PHRASES);
        this.systemPrompt = options.systemPrompt ?? MEDICAL_SYSTEM_PROMPT;
    }

    async run(state: ConversationStateType): Promise<ConversationUpdate> {
        const query = effectiveQuery(state);

        if (this.emergencyDetector.detect(query)) {
            console.warn('[ReasoningStage] Emergency detected, skipping generation:', { sessionId: state.sessionId });
            return {
                emergencyFlag: true,
                draftResponse: EMERGENCY_RESPONSE,
                toolsUsed: ['emergency_detection'],
                nextStage: 'safety_check'
            };
        }

        if (this.shouldRequestRetrieval(state, query)) {
            console.log('[ReasoningStage] Personal history requested, routing to retrieval:', { sessionId: state.sessionId });
            return {
                retrievalRequested: true,
                nextStage: 'retrieve_records'
            };
        }

        try {
            const draft = await withTimeout(
                this.generator.generate(this.systemPrompt, buildContextBundle(state), state.messageHistory),
                this.timeoutMs,
                'Response generation'
            );

            if (!draft.trim()) {
                console.error('[ReasoningStage] Language model returned an empty response');
                return failWith('GenerationFailed');
            }

            return {
                draftResponse: draft,
                toolsUsed: ['language_model'],
                nextStage: 'safety_check'
            };
        } catch (error) {
            console.error('[ReasoningStage] Generation failed:', error);
            return failWith('GenerationFailed');
        }
    }

    private shouldRequestRetrieval(state: ConversationStateType, query: string): boolean {
        return state.retrievalContext === null
            && !state.retrievalRequested
            && state.retrievalCount === 0
            && this.recordIntentDetector.detect(query);
    }
}
