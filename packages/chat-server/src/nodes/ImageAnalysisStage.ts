import { withTimeout } from '@careline/shared';
import type { ConversationStateType, ConversationUpdate } from '../states/ConversationState.js';
import type { ImageClassifier, ImageFinding } from '../types/Workflow.js';
import { degradedFinding, sanitizeFinding } from '../services/SkinFindings.js';
import type { Stage } from './Stage.js';

/** Advisory only: a failed analysis degrades the finding and the turn goes on. */
export class ImageAnalysisStage implements Stage {
    constructor(private classifier: ImageClassifier, private timeoutMs: number) {}

    async run(state: ConversationStateType): Promise<ConversationUpdate> {
        const finding = await this.analyze(state);

        return {
            imageFinding: finding,
            toolsUsed: ['image_analysis'],
            nextStage: 'reason'
        };
    }

    private async analyze(state: ConversationStateType): Promise<ImageFinding> {
        const image = state.imageRef;
        if (!image) {
            console.warn('[ImageAnalysisStage] Reached without an image attachment');
            return degradedFinding();
        }

        try {
            const finding = sanitizeFinding(
                await withTimeout(this.classifier.classify(image), this.timeoutMs, 'Image classification')
            );
            console.log('[ImageAnalysisStage] Image analysed:', {
                sessionId: state.sessionId,
                label: finding.label,
                confidence: finding.confidence
            });
            return finding;
        } catch (error) {
            console.warn('[ImageAnalysisStage] Classifier failed, continuing with degraded finding:', error);
            return degradedFinding();
        }
    }
}
