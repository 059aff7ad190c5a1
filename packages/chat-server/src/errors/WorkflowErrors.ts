export { CollaboratorTimeoutError } from '@careline/shared';

export class TurnCancelledError extends Error {
    constructor(readonly sessionId: string) {
        super(`Turn for session ${sessionId} was cancelled`);
        this.name = 'TurnCancelledError';
    }
}

export class InvalidAttachmentPathError extends Error {
    constructor(readonly requestedPath: string, reason: string) {
        super(`Attachment path rejected: ${reason}`);
        this.name = 'InvalidAttachmentPathError';
    }
}

export class UploadRejectedError extends Error {
    constructor(reason: string) {
        super(`Upload rejected: ${reason}`);
        this.name = 'UploadRejectedError';
    }
}
