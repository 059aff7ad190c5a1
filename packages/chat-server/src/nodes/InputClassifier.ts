import path from 'path';
import type { ConversationStateType, ConversationUpdate } from '../states/ConversationState.js';
import type { AttachmentRef, InputKind } from '../types/Workflow.js';
import { failWith, type Stage } from './Stage.js';

const MIB = 1024 * 1024;

export type AttachmentType = 'image' | 'audio';

export const ATTACHMENT_RULES: Readonly<Record<AttachmentType, { extensions: readonly string[]; maxBytes: number }>> = {
    image: { extensions: ['jpg', 'jpeg', 'png', 'bmp', 'webp'], maxBytes: 10 * MIB },
    audio: { extensions: ['wav', 'mp3', 'ogg', 'm4a', 'webm'], maxBytes: 50 * MIB },
};

/** Synthetic-record ids (Given123_Family456_<uuid>) and short clinic ids (P-17). */
export const DEFAULT_PATIENT_ID_PATTERN = /^(?:[A-Z][a-z]+\d+_[A-Z][a-z]+\d+_[a-f0-9-]{36}|P-\d+)$/;

export const MAX_TEXT_LENGTH = 5000;

const SCRIPT_FRAGMENTS = [
    /<script[^>]*>[\s\S]*?<\/script>/gi,
    /javascript:/gi,
    /on\w+\s*=/gi,
];

export function sanitizeText(text: string, maxLength: number = MAX_TEXT_LENGTH): string {
    let cleaned = text.replace(/\u0000/g, '');
    for (const pattern of SCRIPT_FRAGMENTS) {
        cleaned = cleaned.replace(pattern, '');
    }
    if (cleaned.length > maxLength) {
        console.warn('[InputClassifier] Text truncated to', maxLength, 'characters');
        cleaned = cleaned.slice(0, maxLength);
    }
    return cleaned.trim();
}

/** Read from the stored path; `filename` is client supplied and only used for display. */
export function attachmentExtension(ref: AttachmentRef): string {
    return path.extname(ref.path).slice(1).toLowerCase();
}

export function validateAttachment(ref: AttachmentRef, type: AttachmentType): string | null {
    const rules = ATTACHMENT_RULES[type];
    const extension = attachmentExtension(ref);

    if (!rules.extensions.includes(extension)) {
        return `unsupported ${type} extension "${extension}"`;
    }
    if (!Number.isFinite(ref.sizeBytes) || ref.sizeBytes <= 0) {
        return `${type} file is empty`;
    }
    if (ref.sizeBytes > rules.maxBytes) {
        return `${type} file exceeds ${rules.maxBytes / MIB} MiB`;
    }
    return null;
}

export function classifyInputKind(hasAudio: boolean, hasImage: boolean, hasText: boolean): InputKind | null {
    if (hasAudio && hasImage) return 'multimodal';
    if (hasAudio) return 'speech';
    if (hasImage) return 'image';
    if (hasText) return 'text';
    return null;
}

export class InputClassifier implements Stage {
    constructor(private readonly patientIdPattern: RegExp = DEFAULT_PATIENT_ID_PATTERN) {}

    run(state: ConversationStateType): ConversationUpdate {
        if (!this.patientIdPattern.test(state.patientId)) {
            console.warn('[InputClassifier] Rejected patient identifier');
            return failWith('InvalidIdentifier');
        }

        for (const [ref, type] of [[state.audioRef, 'audio'], [state.imageRef, 'image']] as const) {
            if (!ref) continue;
            const problem = validateAttachment(ref, type);
            if (problem) {
                console.warn('[InputClassifier] Rejected attachment:', { type, problem });
                return failWith('InvalidAttachment');
            }
        }

        const text = sanitizeText(state.rawText);
        const inputKind = classifyInputKind(state.audioRef !== null, state.imageRef !== null, text.length > 0);

        if (inputKind === null) {
            return { rawText: text, ...failWith('EmptyInput') };
        }

        console.log('[InputClassifier] Classified input:', { sessionId: state.sessionId, inputKind });

        if (state.audioRef) {
            return { rawText: text, inputKind, nextStage: 'transcribe_audio' };
        }
        if (state.imageRef) {
            return { rawText: text, inputKind, nextStage: 'analyze_image' };
        }
        return { rawText: text, inputKind, nextStage: 'reason' };
    }
}
