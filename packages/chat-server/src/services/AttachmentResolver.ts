import path from 'path';
import { stat } from 'fs/promises';
import type { AttachmentRef } from '../types/Workflow.js';
import { InvalidAttachmentPathError } from '../errors/WorkflowErrors.js';

export interface AttachmentInput {
    path: string;
    filename?: string;
}

/** Turns client-supplied upload paths into sized references confined to the upload directory. */
export class AttachmentResolver {
    private root: string;

    constructor(uploadDir: string) {
        this.root = path.resolve(uploadDir);
    }

    resolvePath(requested: string): string {
        if (requested.includes('\0')) {
            throw new InvalidAttachmentPathError(requested, 'contains a NUL byte');
        }

        const resolved = path.resolve(this.root, requested);
        const relative = path.relative(this.root, resolved);

        if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
            throw new InvalidAttachmentPathError(requested, 'outside the upload directory');
        }
        return resolved;
    }

    async resolve(input: AttachmentInput): Promise<AttachmentRef> {
        const resolved = this.resolvePath(input.path);

        let sizeBytes: number;
        try {
            const info = await stat(resolved);
            if (!info.isFile()) {
                throw new InvalidAttachmentPathError(input.path, 'not a regular file');
            }
            sizeBytes = info.size;
        } catch (error) {
            if (error instanceof InvalidAttachmentPathError) throw error;
            throw new InvalidAttachmentPathError(input.path, 'file not found');
        }

        return {
            path: resolved,
            filename: input.filename ?? path.basename(resolved),
            sizeBytes
        };
    }
}
