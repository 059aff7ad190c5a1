import { STAGES, type ErrorKind, type StageName } from "../types/Workflow.js";
import type { ConversationStateType } from "../states/ConversationState.js";

export type TerminalStage = 'safety_check' | 'handle_error';
export type RoutableStage = Exclude<StageName, TerminalStage>;

/**
 * Every legal transition in the workflow. `handle_error` is reachable from
 * any routable stage and is therefore not listed. The only cycle is
 * reason -> retrieve_records -> reason, bounded by the retrieval guard.
 */
export const EDGE_TABLE: Readonly<Record<RoutableStage, readonly StageName[]>> = {
    classify_input:   ['transcribe_audio', 'analyze_image', 'reason'],
    transcribe_audio: ['analyze_image', 'reason'],
    analyze_image:    ['reason'],
    retrieve_records: ['reason'],
    reason:           ['retrieve_records', 'safety_check'],
};

export const MAX_RETRIEVALS_PER_TURN = 1;

export interface RouteDecision {
    target: StageName;
    /** Set when the executor itself forced the error route. */
    violation?: ErrorKind;
}

export function isStageName(value: unknown): value is StageName {
    return STAGES.some(stage => stage === value);
}

export function isTerminalStage(stage: StageName): stage is TerminalStage {
    return stage === 'safety_check' || stage === 'handle_error';
}

export function allowedTargets(from: RoutableStage): StageName[] {
    return [...EDGE_TABLE[from], 'handle_error'];
}

type RoutingView = Pick<ConversationStateType, 'nextStage' | 'currentStage' | 'stepCount' | 'retrievalCount'>;

export function resolveRoute(from: RoutableStage, state: RoutingView, maxSteps: number): RouteDecision {
    const next = state.nextStage;

    if (state.currentStage !== from) {
        return { target: 'handle_error', violation: 'Unclassified' };
    }

    if (next === 'handle_error') {
        return { target: 'handle_error' };
    }

    if (state.stepCount >= maxSteps) {
        return { target: 'handle_error', violation: 'WorkflowExceeded' };
    }

    if (!isStageName(next) || !EDGE_TABLE[from].includes(next)) {
        return { target: 'handle_error', violation: 'Unclassified' };
    }

    if (next === 'retrieve_records' && state.retrievalCount >= MAX_RETRIEVALS_PER_TURN) {
        return { target: 'handle_error', violation: 'WorkflowExceeded' };
    }

    return { target: next };
}
