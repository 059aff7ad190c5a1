import { StateGraph, START, END, GraphRecursionError } from "@langchain/langgraph";
import { HistoryWindow, withTimeout, type ChatTurn, type SessionStore } from "@careline/shared";
import { ConversationState, type ConversationStateType, type ConversationUpdate } from "../states/ConversationState.js";
import type {
    ErrorKind,
    ImageClassifier,
    RecordRetriever,
    ResponseGenerator,
    StageName,
    TextDetector,
    Transcriber,
    TurnAudit,
    TurnObserver,
    TurnRequest,
    TurnResult
} from "../types/Workflow.js";
import { allowedTargets, resolveRoute, type RoutableStage } from "./Routing.js";
import type { Stage } from "../nodes/Stage.js";
import { InputClassifier, DEFAULT_PATIENT_ID_PATTERN } from "../nodes/InputClassifier.js";
import { TranscriptionStage } from "../nodes/TranscriptionStage.js";
import { ImageAnalysisStage } from "../nodes/ImageAnalysisStage.js";
import { RetrievalStage } from "../nodes/RetrievalStage.js";
import { ReasoningStage } from "../nodes/ReasoningStage.js";
import { SafetyStage } from "../nodes/SafetyStage.js";
import { ErrorStage, GENERIC_ERROR_MESSAGE } from "../nodes/ErrorStage.js";
import { SessionTracker } from "../services/SessionTracker.js";
import { TurnCancelledError } from "../errors/WorkflowErrors.js";

export interface MedicalChatDependencies {
    transcriber: Transcriber;
    imageClassifier: ImageClassifier;
    recordRetriever: RecordRetriever;
    responseGenerator: ResponseGenerator;
    sessionStore: SessionStore;
    emergencyDetector?: TextDetector;
    recordIntentDetector?: TextDetector;
    observer?: TurnObserver;
    /** Activity bookkeeping only; session ownership lives in the session store. */
    sessionTracker?: SessionTracker;
    /** Replaces individual stages; mostly useful in tests. */
    stages?: Partial<Record<StageName, Stage>>;
}

export interface MedicalChatOptions {
    historyLimit?: number;
    topK?: number;
    maxSteps?: number;
    timeoutMs?: number;
    patientIdPattern?: RegExp;
}

type SessionOwnership = 'owned' | 'foreign' | 'unverified';

export interface RunTurnOptions {
    signal?: AbortSignal;
}

export const DEFAULT_WORKFLOW_OPTIONS = {
    historyLimit: 5,
    topK: 3,
    maxSteps: 10,
    timeoutMs: 30_000,
} as const;

export class ConsoleTurnObserver implements TurnObserver {
    onTurnComplete(audit: TurnAudit): void {
        const log = audit.errorKind ? console.warn : console.log;
        log('[MedicalChatGraph] Turn complete:', audit);
    }
}

function buildWorkflow(stages: Record<StageName, Stage>, maxSteps: number) {
    const runStage = (name: StageName) => async (state: ConversationStateType): Promise<ConversationUpdate> => {
        const bookkeeping = { currentStage: name, stepCount: 1, visitedStages: [name] };
        try {
            const update = await stages[name].run(state);
            return { ...update, ...bookkeeping, nextStage: update.nextStage ?? null };
        } catch (error) {
            console.error(`[MedicalChatGraph] Stage ${name} threw:`, error);
            return { ...bookkeeping, errorKind: 'Unclassified', nextStage: 'handle_error' };
        }
    };

    const routeFrom = (from: RoutableStage) => (state: ConversationStateType): StageName => {
        const decision = resolveRoute(from, state, maxSteps);
        if (decision.violation) {
            console.warn('[MedicalChatGraph] Route rejected:', {
                from,
                requested: state.nextStage,
                violation: decision.violation,
                stepCount: state.stepCount
            });
        }
        return decision.target;
    };

    return new StateGraph(ConversationState)
        .addNode("classify_input", runStage("classify_input"))
        .addNode("transcribe_audio", runStage("transcribe_audio"))
        .addNode("analyze_image", runStage("analyze_image"))
        .addNode("retrieve_records", runStage("retrieve_records"))
        .addNode("reason", runStage("reason"))
        .addNode("safety_check", runStage("safety_check"))
        .addNode("handle_error", runStage("handle_error"))
        .addEdge(START, "classify_input")
        .addConditionalEdges("classify_input", routeFrom("classify_input"), allowedTargets("classify_input"))
        .addConditionalEdges("transcribe_audio", routeFrom("transcribe_audio"), allowedTargets("transcribe_audio"))
        .addConditionalEdges("analyze_image", routeFrom("analyze_image"), allowedTargets("analyze_image"))
        .addConditionalEdges("retrieve_records", routeFrom("retrieve_records"), allowedTargets("retrieve_records"))
        .addConditionalEdges("reason", routeFrom("reason"), allowedTargets("reason"))
        .addEdge("safety_check", END)
        .addEdge("handle_error", END)
        .compile();
}

type CompiledWorkflow = ReturnType<typeof buildWorkflow>;

/**
 * Runs one patient message through the staged workflow:
 * classify -> (transcribe) -> (analyze image) -> reason <-> (retrieve once) -> safety,
 * with every failure path ending in the generic error stage.
 */
export class MedicalChatGraph {
    private workflow: CompiledWorkflow;
    private sessionStore: SessionStore;
    private observer: TurnObserver;
    private sessionTracker: SessionTracker | null;
    private patientIdPattern: RegExp;
    private historyLimit: number;
    private maxSteps: number;
    private timeoutMs: number;

    constructor(deps: MedicalChatDependencies, options: MedicalChatOptions = {}) {
        this.historyLimit = options.historyLimit ?? DEFAULT_WORKFLOW_OPTIONS.historyLimit;
        this.maxSteps = options.maxSteps ?? DEFAULT_WORKFLOW_OPTIONS.maxSteps;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_WORKFLOW_OPTIONS.timeoutMs;
        const topK = options.topK ?? DEFAULT_WORKFLOW_OPTIONS.topK;
        this.patientIdPattern = options.patientIdPattern ?? DEFAULT_PATIENT_ID_PATTERN;

        this.sessionStore = deps.sessionStore;
        this.observer = deps.observer ?? new ConsoleTurnObserver();
        this.sessionTracker = deps.sessionTracker ?? null;

        const stages: Record<StageName, Stage> = {
            classify_input: new InputClassifier(this.patientIdPattern),
            transcribe_audio: new TranscriptionStage(deps.transcriber, this.timeoutMs),
            analyze_image: new ImageAnalysisStage(deps.imageClassifier, this.timeoutMs),
            retrieve_records: new RetrievalStage(deps.recordRetriever, topK, this.timeoutMs),
            reason: new ReasoningStage({
                generator: deps.responseGenerator,
                timeoutMs: this.timeoutMs,
                emergencyDetector: deps.emergencyDetector,
                recordIntentDetector: deps.recordIntentDetector
            }),
            safety_check: new SafetyStage(),
            handle_error: new ErrorStage(this.maxSteps),
            ...deps.stages
        };

        this.workflow = buildWorkflow(stages, this.maxSteps);
    }

    async runTurn(request: TurnRequest, options: RunTurnOptions = {}): Promise<TurnResult> {
        const startedAt = Date.now();
        const { signal } = options;
        this.throwIfCancelled(request.sessionId, signal);

        // Malformed ids never claim a session; the classifier rejects them inside the workflow.
        let ownership: SessionOwnership = 'unverified';
        if (this.patientIdPattern.test(request.patientId)) {
            ownership = await this.claimSession(request);
            if (ownership === 'foreign') {
                return this.rejectTurn(request, 'InvalidIdentifier', startedAt);
            }
            this.sessionTracker?.touch(request.sessionId, request.patientId);
        }

        const history = ownership === 'owned' ? await this.loadHistory(request.sessionId, request.patientId) : [];

        let finalState: ConversationStateType;
        try {
            finalState = await this.workflow.invoke(
                {
                    patientId: request.patientId,
                    sessionId: request.sessionId,
                    messageHistory: history,
                    rawText: request.rawText ?? '',
                    audioRef: request.audioRef ?? null,
                    imageRef: request.imageRef ?? null
                },
                { recursionLimit: this.maxSteps + 5, signal }
            );
        } catch (error) {
            this.throwIfCancelled(request.sessionId, signal);
            const errorKind: ErrorKind = error instanceof GraphRecursionError ? 'WorkflowExceeded' : 'Unclassified';
            console.error('[MedicalChatGraph] Workflow aborted:', { sessionId: request.sessionId, errorKind, error });
            return this.rejectTurn(request, errorKind, startedAt);
        }

        this.throwIfCancelled(request.sessionId, signal);

        const finalResponse = finalState.finalResponse ?? GENERIC_ERROR_MESSAGE;
        const timestamp = new Date().toISOString();

        if (ownership === 'owned' && finalState.errorKind !== 'InvalidIdentifier') {
            await this.persistTurn(request, finalState, finalResponse, timestamp);
            this.sessionTracker?.recordMessage(request.sessionId);
        }

        this.report({
            patientId: request.patientId,
            sessionId: request.sessionId,
            inputKind: finalState.inputKind,
            errorKind: finalState.errorKind,
            emergencyFlag: finalState.emergencyFlag,
            safetyPassed: finalState.safetyPassed,
            retrievalCount: finalState.retrievalCount,
            stepCount: finalState.stepCount,
            visitedStages: finalState.visitedStages,
            durationMs: Date.now() - startedAt
        });

        return {
            finalResponse,
            metadata: {
                emergencyDetected: finalState.emergencyFlag,
                toolsUsed: finalState.toolsUsed,
                inputKind: finalState.inputKind,
                sessionId: request.sessionId,
                timestamp
            }
        };
    }

    /** Null when the session belongs to another patient. */
    async getHistory(sessionId: string, patientId: string, limit: number): Promise<ChatTurn[] | null> {
        const owner = await this.sessionStore.owner(sessionId);
        if (owner === null) return [];
        if (owner !== patientId) {
            console.warn('[MedicalChatGraph] History requested by a patient that does not own the session:', sessionId);
            return null;
        }
        return this.sessionStore.load(sessionId, limit);
    }

    /** False when the session belongs to another patient. */
    async clearHistory(sessionId: string, patientId: string): Promise<boolean> {
        const owner = await this.sessionStore.owner(sessionId);
        if (owner !== null && owner !== patientId) {
            console.warn('[MedicalChatGraph] Clear requested by a patient that does not own the session:', sessionId);
            return false;
        }

        await this.sessionStore.clear(sessionId);
        this.sessionTracker?.forget(sessionId);
        console.log('[MedicalChatGraph] Cleared session history:', sessionId);
        return true;
    }

    private async claimSession(request: TurnRequest): Promise<SessionOwnership> {
        try {
            const owner = await withTimeout(
                this.sessionStore.claim(request.sessionId, request.patientId),
                this.timeoutMs,
                'Session claim'
            );
            if (owner === request.patientId) return 'owned';

            console.warn('[MedicalChatGraph] Session is bound to a different patient:', request.sessionId);
            return 'foreign';
        } catch (error) {
            console.warn('[MedicalChatGraph] Session ownership unavailable, running without history:', {
                sessionId: request.sessionId,
                error
            });
            return 'unverified';
        }
    }

    private async loadHistory(sessionId: string, patientId: string): Promise<ChatTurn[]> {
        try {
            const owner = await withTimeout(this.sessionStore.owner(sessionId), this.timeoutMs, 'Session owner');
            if (owner !== patientId) {
                console.warn('[MedicalChatGraph] Refusing history owned by another patient:', sessionId);
                return [];
            }

            const turns = await withTimeout(
                this.sessionStore.load(sessionId, this.historyLimit),
                this.timeoutMs,
                'History load'
            );
            return new HistoryWindow(Math.max(this.historyLimit, 1), turns).latest(this.historyLimit);
        } catch (error) {
            console.warn('[MedicalChatGraph] History unavailable, continuing without it:', { sessionId, error });
            return [];
        }
    }

    private async persistTurn(
        request: TurnRequest,
        state: ConversationStateType,
        finalResponse: string,
        timestamp: string
    ): Promise<void> {
        const userTurn: ChatTurn = { role: 'user', text: describeUserMessage(request, state), timestamp };
        const assistantTurn: ChatTurn = { role: 'assistant', text: finalResponse, timestamp };

        try {
            await withTimeout(
                this.sessionStore.append(request.sessionId, [userTurn, assistantTurn]),
                this.timeoutMs,
                'History append'
            );
        } catch (error) {
            console.error('[MedicalChatGraph] Failed to persist turn:', { sessionId: request.sessionId, error });
        }
    }

    private rejectTurn(request: TurnRequest, errorKind: ErrorKind, startedAt: number): TurnResult {
        this.report({
            patientId: request.patientId,
            sessionId: request.sessionId,
            inputKind: null,
            errorKind,
            emergencyFlag: false,
            safetyPassed: false,
            retrievalCount: 0,
            stepCount: 0,
            visitedStages: [],
            durationMs: Date.now() - startedAt
        });

        return {
            finalResponse: GENERIC_ERROR_MESSAGE,
            metadata: {
                emergencyDetected: false,
                toolsUsed: [],
                inputKind: null,
                sessionId: request.sessionId,
                timestamp: new Date().toISOString()
            }
        };
    }

    private report(audit: TurnAudit): void {
        try {
            this.observer.onTurnComplete(audit);
        } catch (error) {
            console.error('[MedicalChatGraph] Turn observer failed:', error);
        }
    }

    private throwIfCancelled(sessionId: string, signal: AbortSignal | undefined): void {
        if (signal?.aborted) {
            console.log('[MedicalChatGraph] Turn cancelled:', sessionId);
            throw new TurnCancelledError(sessionId);
        }
    }
}

function describeUserMessage(request: TurnRequest, state: ConversationStateType): string {
    const text = state.rawText.trim() || state.transcript.trim();
    if (text) return text;
    if (request.imageRef) return `[Image: ${request.imageRef.filename ?? 'upload'}]`;
    if (request.audioRef) return `[Audio: ${request.audioRef.filename ?? 'upload'}]`;
    return '';
}
