import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ATTACHMENT_RULES, type AttachmentType } from '../nodes/InputClassifier.js';
import type { UploadStore } from '../services/UploadStore.js';
import { UploadRejectedError } from '../errors/WorkflowErrors.js';

const MAX_UPLOAD_BYTES = Math.max(ATTACHMENT_RULES.image.maxBytes, ATTACHMENT_RULES.audio.maxBytes);

function uploadError(res: Response, status: number, message: string): void {
    res.status(status).json({
        error: {
            message,
            type: status >= 500 ? 'api_error' : 'invalid_request_error'
        }
    });
}

export function UploadRouter(store: UploadStore): Router {
    const router = Router();
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 }
    });
    const singleFile = upload.single('file');

    const receiveFile = (req: Request, res: Response, next: NextFunction): void => {
        singleFile(req, res, (err: unknown) => {
            if (err instanceof multer.MulterError) {
                console.warn('[Upload Route] Multipart rejected:', err.code);
                uploadError(res, err.code === 'LIMIT_FILE_SIZE' ? 413 : 400, `Upload rejected: ${err.message}`);
                return;
            }
            if (err) {
                next(err);
                return;
            }
            next();
        });
    };

    const handleUpload = (fileType: AttachmentType) => async (req: Request, res: Response) => {
        if (!req.file) {
            uploadError(res, 400, 'Upload rejected: expected a multipart "file" field');
            return;
        }

        console.log('[Upload Route] Upload received:', {
            fileType,
            filename: req.file.originalname,
            sizeBytes: req.file.size
        });

        try {
            const stored = await store.save(req.file.buffer, req.file.originalname, fileType);
            res.status(201).json(stored);
        } catch (error) {
            if (error instanceof UploadRejectedError) {
                console.warn('[Upload Route] Upload rejected:', error.message);
                uploadError(res, 400, error.message);
                return;
            }
            console.error('[Upload Route] Failed to store upload:', error);
            uploadError(res, 500, `Failed to upload ${fileType}`);
        }
    };

    router.post('/v1/uploads/image', receiveFile, handleUpload('image'));
    router.post('/v1/uploads/audio', receiveFile, handleUpload('audio'));

    router.get('/v1/uploads/limits', (req: Request, res: Response) => {
        res.status(200).json(ATTACHMENT_RULES);
    });

    router.get('/v1/uploads/:fileId', async (req: Request, res: Response) => {
        try {
            const info = await store.info(req.params.fileId);
            if (!info) {
                uploadError(res, 404, 'Upload not found');
                return;
            }
            res.status(200).json(info);
        } catch (error) {
            console.error('[Upload Route] Failed to read upload:', error);
            uploadError(res, 500, 'Failed to read upload');
        }
    });

    router.delete('/v1/uploads/:fileId', async (req: Request, res: Response) => {
        try {
            if (!await store.remove(req.params.fileId)) {
                uploadError(res, 404, 'Upload not found');
                return;
            }
            res.status(200).json({ fileId: req.params.fileId, deleted: true });
        } catch (error) {
            console.error('[Upload Route] Failed to delete upload:', error);
            uploadError(res, 500, 'Failed to delete upload');
        }
    });

    return router;
}
