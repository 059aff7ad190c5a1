import { vi } from 'vitest';
import { InMemorySessionStore, type ChatTurn } from '@careline/shared';
import type {
    AttachmentRef,
    ContextBundle,
    ImageClassifier,
    ImageFinding,
    RecordRetriever,
    ResponseGenerator,
    RetrievalContext,
    Transcriber,
    TurnAudit,
    TurnObserver
} from '../types/Workflow.js';
import type { MedicalChatDependencies } from '../graphs/MedicalChatGraph.js';
import type { ConversationStateType } from '../states/ConversationState.js';
import { findingFromScores } from '../services/SkinFindings.js';

export const ECZEMA_FINDING: ImageFinding = findingFromScores([
    { label: 'Eczema', score: 0.7 },
    { label: 'Dermatitis', score: 0.2 },
]);

export const BLOOD_TEST_CONTEXT: RetrievalContext = {
    groundingText: '1. [lab-0001] (2024-03-02) HbA1c 6.1%, fasting glucose 108 mg/dL.',
    sourceIds: ['lab-0001'],
};

export class FakeTranscriber implements Transcriber {
    calls: AttachmentRef[] = [];
    constructor(private transcript: string = 'What is this rash on my arm?') {}

    async transcribe(audio: AttachmentRef): Promise<string> {
        this.calls.push(audio);
        return this.transcript;
    }
}

export class FakeImageClassifier implements ImageClassifier {
    calls: AttachmentRef[] = [];
    constructor(private finding: ImageFinding = ECZEMA_FINDING) {}

    async classify(image: AttachmentRef): Promise<ImageFinding> {
        this.calls.push(image);
        return this.finding;
    }
}

export class FakeRecordRetriever implements RecordRetriever {
    calls: Array<{ patientId: string; queryText: string; topK: number }> = [];
    constructor(private context: RetrievalContext = BLOOD_TEST_CONTEXT) {}

    async retrieve(patientId: string, queryText: string, topK: number): Promise<RetrievalContext> {
        this.calls.push({ patientId, queryText, topK });
        return this.context;
    }
}

export class FakeResponseGenerator implements ResponseGenerator {
    calls: Array<{ systemPrompt: string; context: ContextBundle; history: ChatTurn[] }> = [];
    constructor(private reply: string = 'Type 2 diabetes affects how your body uses blood sugar.') {}

    async generate(systemPrompt: string, context: ContextBundle, history: ChatTurn[]): Promise<string> {
        this.calls.push({ systemPrompt, context, history });
        return this.reply;
    }
}

export class RecordingObserver implements TurnObserver {
    audits: TurnAudit[] = [];

    onTurnComplete(audit: TurnAudit): void {
        this.audits.push(audit);
    }

    get last(): TurnAudit | undefined {
        return this.audits[this.audits.length - 1];
    }
}

export interface FakeDependencies extends MedicalChatDependencies {
    transcriber: FakeTranscriber;
    imageClassifier: FakeImageClassifier;
    recordRetriever: FakeRecordRetriever;
    responseGenerator: FakeResponseGenerator;
    sessionStore: InMemorySessionStore;
    observer: RecordingObserver;
}

export function fakeDependencies(overrides: Partial<FakeDependencies> = {}): FakeDependencies {
    return {
        transcriber: new FakeTranscriber(),
        imageClassifier: new FakeImageClassifier(),
        recordRetriever: new FakeRecordRetriever(),
        responseGenerator: new FakeResponseGenerator(),
        sessionStore: new InMemorySessionStore(),
        observer: new RecordingObserver(),
        ...overrides,
    };
}

export function silenceConsole(): void {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
}

export function stateWith(overrides: Partial<ConversationStateType> = {}): ConversationStateType {
    return {
        patientId: 'P-1001',
        sessionId: 'session-test',
        messageHistory: [],
        inputKind: null,
        rawText: '',
        audioRef: null,
        imageRef: null,
        transcript: '',
        imageFinding: null,
        retrievalContext: null,
        retrievalRequested: false,
        retrievalCount: 0,
        nextStage: null,
        currentStage: null,
        draftResponse: '',
        finalResponse: null,
        emergencyFlag: false,
        safetyPassed: false,
        errorKind: null,
        stepCount: 0,
        visitedStages: [],
        toolsUsed: [],
        ...overrides,
    };
}

/** JFIF header followed by padding; enough for magic-number detection. */
export const JPEG_BYTES = Buffer.concat([
    Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46, 0x00, 0x01]),
    Buffer.alloc(52),
]);

/** RIFF/WAVE header followed by padding. */
export const WAV_BYTES = Buffer.concat([
    Buffer.from('RIFF'),
    Buffer.from([0x24, 0x00, 0x00, 0x00]),
    Buffer.from('WAVEfmt '),
    Buffer.alloc(52),
]);
