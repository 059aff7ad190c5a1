import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import express from 'express';
import type { Server } from 'http';
import { once } from 'events';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { UploadRouter } from './UploadRoute.js';
import { UploadStore } from '../services/UploadStore.js';
import { AttachmentResolver } from '../services/AttachmentResolver.js';
import { ATTACHMENT_RULES } from '../nodes/InputClassifier.js';
import { JPEG_BYTES, WAV_BYTES, silenceConsole } from '../testing/fakes.js';

const StoredUploadBody = z.object({ fileId: z.string(), path: z.string() });
const ErrorBody = z.object({ error: z.object({ message: z.string(), type: z.string() }) });

describe('UploadRouter', () => {
    let server: Server;
    let baseUrl: string;
    let uploadDir: string;

    beforeEach(async () => {
        vi.restoreAllMocks();
        silenceConsole();
        uploadDir = await mkdtemp(path.join(os.tmpdir(), 'careline-upload-route-'));

        const app = express();
        app.use(UploadRouter(new UploadStore(uploadDir, new AttachmentResolver(uploadDir))));
        server = app.listen(0, '127.0.0.1');
        await once(server, 'listening');

        const address = server.address();
        if (!address || typeof address === 'string') {
            throw new Error('Test server has no port');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        await new Promise<void>(resolve => server.close(() => resolve()));
        await rm(uploadDir, { recursive: true, force: true });
    });

    function upload(kind: 'image' | 'audio', bytes: Buffer, filename: string): Promise<Response> {
        const form = new FormData();
        form.append('file', new Blob([bytes]), filename);
        return fetch(`${baseUrl}/v1/uploads/${kind}`, { method: 'POST', body: form });
    }

    it('stores an image and returns a path the chat route accepts', async () => {
        const res = await upload('image', JPEG_BYTES, 'rash.jpg');

        expect(res.status).toBe(201);
        const json = await res.json();
        expect(json).toMatchObject({ filename: 'rash.jpg', fileType: 'image', mimeType: 'image/jpeg', sizeBytes: JPEG_BYTES.length });
        const body = StoredUploadBody.parse(json);
        expect(body.path).toBe(body.fileId);

        const resolved = await new AttachmentResolver(uploadDir).resolve({ path: body.path });
        expect(resolved.sizeBytes).toBe(JPEG_BYTES.length);
    });

    it('rejects audio content posted as an image', async () => {
        const res = await upload('image', WAV_BYTES, 'rash.png');

        expect(res.status).toBe(400);
        const body = ErrorBody.parse(await res.json());
        expect(body.error.type).toBe('invalid_request_error');
        expect(body.error.message).toMatch(/^Upload rejected: expected image content, got /);
    });

    it('requires a file field', async () => {
        const form = new FormData();
        form.append('note', 'no file attached');
        const res = await fetch(`${baseUrl}/v1/uploads/audio`, { method: 'POST', body: form });

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({
            error: { message: 'Upload rejected: expected a multipart "file" field', type: 'invalid_request_error' }
        });
    });

    it('describes and deletes an upload', async () => {
        const { fileId } = StoredUploadBody.parse(await (await upload('audio', WAV_BYTES, 'question.wav')).json());

        const info = await fetch(`${baseUrl}/v1/uploads/${fileId}`);
        expect(info.status).toBe(200);
        expect(await info.json()).toMatchObject({ fileId, sizeBytes: WAV_BYTES.length });

        const deleted = await fetch(`${baseUrl}/v1/uploads/${fileId}`, { method: 'DELETE' });
        expect(await deleted.json()).toEqual({ fileId, deleted: true });

        const again = await fetch(`${baseUrl}/v1/uploads/${fileId}`, { method: 'DELETE' });
        expect(again.status).toBe(404);
    });

    it('publishes upload limits', async () => {
        const res = await fetch(`${baseUrl}/v1/uploads/limits`);
        expect(await res.json()).toEqual(ATTACHMENT_RULES);
    });
});
