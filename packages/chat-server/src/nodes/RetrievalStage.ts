import { withTimeout } from '@careline/shared';
import type { ConversationStateType, ConversationUpdate } from '../states/ConversationState.js';
import type { RecordRetriever, RetrievalContext } from '../types/Workflow.js';
import { effectiveQuery } from '../services/PromptBuilder.js';
import type { Stage } from './Stage.js';

export const EMPTY_RETRIEVAL_CONTEXT: RetrievalContext = { groundingText: '', sourceIds: [] };

export class RetrievalStage implements Stage {
    constructor(private retriever: RecordRetriever, private topK: number, private timeoutMs: number) {}

    async run(state: ConversationStateType): Promise<ConversationUpdate> {
        let context: RetrievalContext;

        try {
            context = await withTimeout(
                this.retriever.retrieve(state.patientId, effectiveQuery(state), this.topK),
                this.timeoutMs,
                'Record retrieval'
            );
            console.log('[RetrievalStage] Retrieved records:', {
                sessionId: state.sessionId,
                sources: context.sourceIds.length
            });
        } catch (error) {
            console.warn('[RetrievalStage] Retrieval failed, continuing without records:', error);
            context = { ...EMPTY_RETRIEVAL_CONTEXT, sourceIds: [] };
        }

        return {
            retrievalContext: context,
            retrievalCount: 1,
            toolsUsed: ['patient_records'],
            nextStage: 'reason'
        };
    }
}
