import type { ConversationStateType, ConversationUpdate } from '../states/ConversationState.js';
import type { Stage } from './Stage.js';

export const SAFE_FALLBACK_RESPONSE =
    "I'm not able to give a definitive answer to that. Please consult a qualified healthcare " +
    'professional who can review your situation in detail.';

export const MEDICAL_DISCLAIMER =
    'This information is for general education and is not a substitute for professional medical ' +
    'advice. Please consult a healthcare professional about your situation.';

export const PROHIBITED_PHRASES = [
    'you definitely have',
    'you certainly have',
    'you clearly have',
    'i can confirm you have',
    'i diagnose you',
    'you are diagnosed with',
    'this is definitely cancer',
    'there is no need to see a doctor',
    'no need to see a doctor',
    "you don't need a doctor",
    'you do not need a doctor',
    'stop taking your medication',
    'stop taking your medicine',
    'guaranteed cure',
] as const;

/** Identifier shapes that may appear in generated text. */
export const PATIENT_ID_TOKEN = /\b(?:[A-Z][a-z]+\d+_[A-Z][a-z]+\d+_[a-f0-9-]{36}|P-\d+)\b/g;

const CONTROL_TOKENS = /<\|[^|<>]*\|>|<\/?s>|<(?:start|end)_of_turn>/g;

export type SafetyRejection = 'empty' | 'prohibited_content' | 'foreign_identifier';

export interface SafetyReview {
    response: string;
    passed: boolean;
    rejection: SafetyRejection | null;
}

export function cleanResponse(text: string): string {
    let cleaned = text;
    let previous: string;
    do {
        previous = cleaned;
        cleaned = cleaned.replace(CONTROL_TOKENS, '');
    } while (cleaned !== previous);

    return cleaned
        .replace(/\r\n?/g, '\n')
        .split('\n')
        .map(line => line.replace(/[ \t\f\v]+/g, ' ').trim())
        .join('\n')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

export interface SafetyStageOptions {
    prohibitedPhrases?: readonly string[];
    patientIdToken?: RegExp;
}

export class SafetyStage implements Stage {
    private prohibitedPhrases: readonly string[];
    private patientIdToken: RegExp;

    constructor(options: SafetyStageOptions = {}) {
        this.prohibitedPhrases = (options.prohibitedPhrases ?? PROHIBITED_PHRASES).map(p => p.toLowerCase());
        const token = options.patientIdToken ?? PATIENT_ID_TOKEN;
        this.patientIdToken = new RegExp(token.source, token.flags.includes('g') ? token.flags : `${token.flags}g`);
    }

    run(state: ConversationStateType): ConversationUpdate {
        const review = this.review(state.draftResponse, state.patientId, state.emergencyFlag);

        if (!review.passed) {
            console.warn('[SafetyStage] Draft rejected, using fallback:', {
                sessionId: state.sessionId,
                rejection: review.rejection
            });
        }

        return {
            finalResponse: review.response,
            safetyPassed: review.passed,
            nextStage: null
        };
    }

    review(draft: string, patientId: string, emergency: boolean): SafetyReview {
        const cleaned = cleanResponse(draft);

        const rejection = this.findRejection(cleaned, patientId);
        const body = rejection ? SAFE_FALLBACK_RESPONSE : cleaned;

        return {
            response: this.withDisclaimer(body, emergency),
            passed: rejection === null,
            rejection
        };
    }

    containsProhibitedContent(text: string): boolean {
        const normalized = text.toLowerCase().replace(/[‘’]/g, "'").replace(/\s+/g, ' ');
        return this.prohibitedPhrases.some(phrase => normalized.includes(phrase));
    }

    foreignIdentifiers(text: string, patientId: string): string[] {
        const found = text.match(this.patientIdToken) ?? [];
        return found.filter(token => token !== patientId);
    }

    private findRejection(cleaned: string, patientId: string): SafetyRejection | null {
        if (!cleaned) return 'empty';
        if (this.containsProhibitedContent(cleaned)) return 'prohibited_content';
        if (this.foreignIdentifiers(cleaned, patientId).length > 0) return 'foreign_identifier';
        return null;
    }

    private withDisclaimer(body: string, emergency: boolean): string {
        if (emergency || body.includes(MEDICAL_DISCLAIMER)) {
            return body;
        }
        return `${body}\n\n${MEDICAL_DISCLAIMER}`;
    }
}
