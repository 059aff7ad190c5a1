import type { ImageClassifierClient } from '@careline/shared';
import type { AttachmentRef, ImageClassifier, ImageFinding } from '../types/Workflow.js';
import { findingFromScores } from './SkinFindings.js';

export class SkinImageClassifier implements ImageClassifier {
    constructor(private classifierClient: Pick<ImageClassifierClient, 'classifyImage'>) {}

    async classify(image: AttachmentRef): Promise<ImageFinding> {
        const predictions = await this.classifierClient.classifyImage(image.path);
        const finding = findingFromScores(predictions);

        console.log('[SkinImageClassifier] Classified image:', {
            label: finding.label,
            confidence: finding.confidence
        });

        return finding;
    }
}
