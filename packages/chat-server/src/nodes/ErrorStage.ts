import type { ConversationStateType, ConversationUpdate } from '../states/ConversationState.js';
import type { ErrorKind } from '../types/Workflow.js';
import { isTerminalStage, resolveRoute } from '../graphs/Routing.js';
import type { Stage } from './Stage.js';

export const GENERIC_ERROR_MESSAGE =
    "I apologize, but I'm having trouble processing your request. Please try again in a moment.";

export class ErrorStage implements Stage {
    constructor(private readonly maxSteps: number) {}

    run(state: ConversationStateType): ConversationUpdate {
        const errorKind = state.errorKind ?? this.routingViolation(state) ?? 'Unclassified';

        console.error('[ErrorStage] Turn failed:', {
            sessionId: state.sessionId,
            errorKind,
            failedAfter: state.currentStage,
            stepCount: state.stepCount
        });

        return {
            errorKind,
            finalResponse: GENERIC_ERROR_MESSAGE,
            safetyPassed: false,
            nextStage: null
        };
    }

    /** Recovers the reason the executor forced this route, when no stage recorded one. */
    private routingViolation(state: ConversationStateType): ErrorKind | undefined {
        const from = state.currentStage;
        if (from === null || isTerminalStage(from)) return undefined;
        return resolveRoute(from, state, this.maxSteps).violation;
    }
}
