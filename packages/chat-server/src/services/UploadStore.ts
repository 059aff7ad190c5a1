import path from 'path';
import { randomUUID } from 'crypto';
import { mkdir, readdir, stat, unlink, writeFile } from 'fs/promises';
import { fileTypeFromBuffer } from 'file-type';
import { ATTACHMENT_RULES, type AttachmentType } from '../nodes/InputClassifier.js';
import { UploadRejectedError } from '../errors/WorkflowErrors.js';
import type { AttachmentResolver } from './AttachmentResolver.js';

const MIB = 1024 * 1024;

// Detected extensions that share a container with an accepted one.
const EXTENSION_ALIASES: Readonly<Record<string, string>> = {
    jpeg: 'jpg',
    opus: 'ogg',
    oga: 'ogg',
};

const STORED_NAME = /^\d+_[0-9a-f-]{36}\.[a-z0-9]+$/;

export interface StoredUpload {
    fileId: string;
    /** Name the client sent; display only. */
    filename: string;
    /** Relative to the upload directory, as the chat route expects it. */
    path: string;
    fileType: AttachmentType;
    mimeType: string;
    sizeBytes: number;
    uploadedAt: string;
}

export interface UploadInfo {
    fileId: string;
    path: string;
    sizeBytes: number;
    modifiedAt: string;
}

/**
 * Stores uploaded images and audio under the upload directory. The stored
 * extension comes from the file's magic number, never from the client.
 */
export class UploadStore {
    constructor(
        private readonly uploadDir: string,
        private readonly resolver: AttachmentResolver,
        private readonly now: () => number = Date.now
    ) {}

    async ensureDirectory(): Promise<void> {
        await mkdir(this.uploadDir, { recursive: true });
    }

    async save(buffer: Buffer, originalName: string, fileType: AttachmentType): Promise<StoredUpload> {
        const rules = ATTACHMENT_RULES[fileType];

        if (buffer.length === 0) {
            throw new UploadRejectedError(`${fileType} file is empty`);
        }
        if (buffer.length > rules.maxBytes) {
            throw new UploadRejectedError(`${fileType} file exceeds ${rules.maxBytes / MIB} MiB`);
        }

        const detected = await fileTypeFromBuffer(buffer);
        if (!detected) {
            throw new UploadRejectedError(`could not detect a supported ${fileType} format`);
        }

        const extension = EXTENSION_ALIASES[detected.ext] ?? detected.ext;
        if (!rules.extensions.includes(extension)) {
            throw new UploadRejectedError(`expected ${fileType} content, got ${detected.mime}`);
        }

        const timestamp = this.now();
        const fileId = `${timestamp}_${randomUUID()}.${extension}`;
        await writeFile(this.resolver.resolvePath(fileId), buffer);

        console.log('[UploadStore] Stored upload:', { fileId, fileType, sizeBytes: buffer.length });

        return {
            fileId,
            filename: path.basename(originalName),
            path: fileId,
            fileType,
            mimeType: detected.mime,
            sizeBytes: buffer.length,
            uploadedAt: new Date(timestamp).toISOString()
        };
    }

    /** Null when the id is not one this store hands out or the file is gone. */
    async info(fileId: string): Promise<UploadInfo | null> {
        if (!STORED_NAME.test(fileId)) return null;

        try {
            const info = await stat(this.resolver.resolvePath(fileId));
            if (!info.isFile()) return null;
            return {
                fileId,
                path: fileId,
                sizeBytes: info.size,
                modifiedAt: info.mtime.toISOString()
            };
        } catch (error) {
            if (isMissing(error)) return null;
            throw error;
        }
    }

    async remove(fileId: string): Promise<boolean> {
        if (!STORED_NAME.test(fileId)) return false;

        try {
            await unlink(this.resolver.resolvePath(fileId));
            console.log('[UploadStore] Deleted upload:', fileId);
            return true;
        } catch (error) {
            if (isMissing(error)) return false;
            throw error;
        }
    }

    /** Deletes stored uploads last modified before the retention window. */
    async removeOlderThan(maxAgeMs: number): Promise<string[]> {
        const cutoff = this.now() - maxAgeMs;
        const removed: string[] = [];

        let entries: string[];
        try {
            entries = await readdir(this.uploadDir);
        } catch (error) {
            if (isMissing(error)) return removed;
            throw error;
        }

        for (const entry of entries) {
            if (!STORED_NAME.test(entry)) continue;

            const filePath = this.resolver.resolvePath(entry);
            const info = await stat(filePath);
            if (info.isFile() && info.mtimeMs < cutoff) {
                await unlink(filePath);
                removed.push(entry);
            }
        }

        if (removed.length > 0) {
            console.log('[UploadStore] Removed expired uploads:', removed.length);
        }
        return removed;
    }
}

function isMissing(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
