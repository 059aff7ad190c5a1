import type { ContextBundle, ImageFinding, RetrievalContext } from '../types/Workflow.js';
import type { ConversationStateType } from '../states/ConversationState.js';

export const MEDICAL_SYSTEM_PROMPT = `You are a careful medical information assistant talking with a patient.
Give clear, plain-language explanations of symptoms, conditions and treatments.
Never state a definitive diagnosis and never tell the patient to stop or change prescribed treatment.
When patient records are provided, use only those records and mention which ones you relied on.
When an image analysis is provided, treat it as a screening hint, not a diagnosis.
Recommend seeing a healthcare professional whenever symptoms are persistent, worsening or unclear.`;

const IMAGE_ONLY_QUERY = 'Please explain the attached skin image analysis.';

/** Text the turn is about: typed text first, then the transcript. */
export function effectiveQuery(state: Pick<ConversationStateType, 'rawText' | 'transcript'>): string {
    const typed = state.rawText.trim();
    return typed || state.transcript.trim();
}

export function buildContextBundle(state: ConversationStateType): ContextBundle {
    const query = effectiveQuery(state);
    return {
        query: query || (state.imageFinding ? IMAGE_ONLY_QUERY : ''),
        inputKind: state.inputKind,
        imageFinding: state.imageFinding,
        retrievalContext: state.retrievalContext
    };
}

function formatImageFinding(finding: ImageFinding): string {
    if (finding.degraded || !finding.label) {
        return `# SKIN IMAGE ANALYSIS
The image could not be analysed. Do not speculate about its contents.`;
    }

    const distribution = Object.entries(finding.distribution)
        .sort(([, a], [, b]) => b - a)
        .map(([label, probability]) => `- ${label}: ${(probability * 100).toFixed(1)}%`)
        .join('\n');

    return `# SKIN IMAGE ANALYSIS
Most likely: ${finding.label} (${(finding.confidence * 100).toFixed(1)}% confidence)
Note: ${finding.note}
Distribution:
${distribution}`;
}

function formatRetrievalContext(context: RetrievalContext): string {
    if (!context.groundingText.trim()) {
        return `# PATIENT RECORDS
No matching records were found for this patient. Say so rather than guessing.`;
    }

    return `# PATIENT RECORDS
${context.groundingText}
Sources: ${context.sourceIds.join(', ')}`;
}

export function renderContext(bundle: ContextBundle): string {
    const sections: string[] = [];

    if (bundle.imageFinding) {
        sections.push(formatImageFinding(bundle.imageFinding));
    }
    if (bundle.retrievalContext) {
        sections.push(formatRetrievalContext(bundle.retrievalContext));
    }

    return sections.join('\n\n');
}
