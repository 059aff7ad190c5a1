import type { ChatTurn } from '@careline/shared';

export const STAGES = [
    'classify_input',
    'transcribe_audio',
    'analyze_image',
    'retrieve_records',
    'reason',
    'safety_check',
    'handle_error'
] as const;

export type StageName = typeof STAGES[number];

export type InputKind = 'text' | 'speech' | 'image' | 'multimodal';

export type ErrorKind =
    | 'InvalidIdentifier'
    | 'InvalidAttachment'
    | 'EmptyInput'
    | 'TranscriptionFailed'
    | 'GenerationFailed'
    | 'WorkflowExceeded'
    | 'Unclassified';

export type ToolName = 'speech_to_text' | 'image_analysis' | 'patient_records' | 'emergency_detection' | 'language_model';

export interface AttachmentRef {
    path: string;
    filename?: string;
    sizeBytes: number;
}

export const SKIN_CONDITION_LABELS = [
    'Acne',
    'Actinic Keratosis',
    'Basal Cell Carcinoma',
    'Dermatitis',
    'Eczema',
    'Melanoma',
    'Psoriasis',
    'Rosacea'
] as const;

export type SkinConditionLabel = typeof SKIN_CONDITION_LABELS[number];

export type LabelDistribution = Record<SkinConditionLabel, number>;

export interface ImageFinding {
    label: SkinConditionLabel | '';
    confidence: number;
    note: string;
    distribution: LabelDistribution;
    degraded: boolean;
}

export interface RetrievalContext {
    groundingText: string;
    sourceIds: string[];
}

export interface ContextBundle {
    query: string;
    inputKind: InputKind | null;
    imageFinding: ImageFinding | null;
    retrievalContext: RetrievalContext | null;
}

// Collaborator contracts. Implementations live in services/.

export interface Transcriber {
    transcribe(audio: AttachmentRef): Promise<string>;
}

export interface ImageClassifier {
    classify(image: AttachmentRef): Promise<ImageFinding>;
}

export interface RecordRetriever {
    retrieve(patientId: string, queryText: string, topK: number): Promise<RetrievalContext>;
}

export interface ResponseGenerator {
    generate(systemPrompt: string, context: ContextBundle, history: ChatTurn[]): Promise<string>;
}

export interface TextDetector {
    detect(text: string): boolean;
}

export interface TurnRequest {
    patientId: string;
    sessionId: string;
    rawText?: string;
    audioRef?: AttachmentRef;
    imageRef?: AttachmentRef;
}

export interface TurnMetadata {
    emergencyDetected: boolean;
    toolsUsed: ToolName[];
    inputKind: InputKind | null;
    sessionId: string;
    timestamp: string;
}

export interface TurnResult {
    finalResponse: string;
    metadata: TurnMetadata;
}

/** Internal record of a finished turn; never sent to the patient. */
export interface TurnAudit {
    patientId: string;
    sessionId: string;
    inputKind: InputKind | null;
    errorKind: ErrorKind | null;
    emergencyFlag: boolean;
    safetyPassed: boolean;
    retrievalCount: number;
    stepCount: number;
    visitedStages: StageName[];
    durationMs: number;
}

export interface TurnObserver {
    onTurnComplete(audit: TurnAudit): void;
}
