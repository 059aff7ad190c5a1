import {
    SKIN_CONDITION_LABELS,
    type ImageFinding,
    type LabelDistribution,
    type SkinConditionLabel
} from '../types/Workflow.js';

export const CLINICAL_NOTES: Readonly<Record<SkinConditionLabel, string>> = {
    'Acne': 'Common inflammatory condition of hair follicles; usually managed with topical treatment.',
    'Actinic Keratosis': 'Rough, sun-damaged patch that can progress to skin cancer; a dermatology review is advisable.',
    'Basal Cell Carcinoma': 'Possible slow-growing skin cancer; prompt dermatology assessment is recommended.',
    'Dermatitis': 'Skin inflammation often triggered by irritants or allergens.',
    'Eczema': 'Chronic itchy, dry skin condition that tends to flare.',
    'Melanoma': 'Possible serious skin cancer; urgent dermatology assessment is recommended.',
    'Psoriasis': 'Chronic immune-mediated condition causing scaly plaques.',
    'Rosacea': 'Chronic facial redness, sometimes with bumps; triggers vary.',
};

export interface LabelScore {
    label: string;
    score: number;
}

export function emptyDistribution(): LabelDistribution {
    return {
        'Acne': 0,
        'Actinic Keratosis': 0,
        'Basal Cell Carcinoma': 0,
        'Dermatitis': 0,
        'Eczema': 0,
        'Melanoma': 0,
        'Psoriasis': 0,
        'Rosacea': 0,
    };
}

export function clampProbability(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.min(1, Math.max(0, value));
}

export function toSkinConditionLabel(label: string): SkinConditionLabel | null {
    const normalized = label.trim().toLowerCase().replace(/[_-]+/g, ' ').replace(/\s+/g, ' ');
    return SKIN_CONDITION_LABELS.find(known => known.toLowerCase() === normalized) ?? null;
}

export function degradedFinding(note: string = 'Image analysis was unavailable for this message.'): ImageFinding {
    return {
        label: '',
        confidence: 0,
        note,
        distribution: emptyDistribution(),
        degraded: true
    };
}

/**
 * Builds a finding from raw classifier scores. Unknown labels are dropped;
 * the top label is the highest score, ties resolved in label order.
 */
export function findingFromScores(scores: LabelScore[]): ImageFinding {
    const distribution = emptyDistribution();
    let recognised = 0;

    for (const { label, score } of scores) {
        const known = toSkinConditionLabel(label);
        if (!known) continue;
        distribution[known] = clampProbability(score);
        recognised++;
    }

    if (recognised === 0) {
        throw new Error('Classifier returned no recognised skin condition labels');
    }

    let top: SkinConditionLabel = SKIN_CONDITION_LABELS[0];
    for (const label of SKIN_CONDITION_LABELS) {
        if (distribution[label] > distribution[top]) {
            top = label;
        }
    }

    return {
        label: top,
        confidence: distribution[top],
        note: CLINICAL_NOTES[top],
        distribution,
        degraded: false
    };
}

/** Re-validates a finding handed back by any classifier implementation. */
export function sanitizeFinding(finding: ImageFinding): ImageFinding {
    const distribution = emptyDistribution();
    for (const label of SKIN_CONDITION_LABELS) {
        distribution[label] = clampProbability(finding.distribution[label] ?? 0);
    }

    return {
        label: finding.label,
        confidence: clampProbability(finding.confidence),
        note: finding.note,
        distribution,
        degraded: finding.degraded
    };
}
