import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { MedicalChatGraph } from '../graphs/MedicalChatGraph.js';
import type { AttachmentRef } from '../types/Workflow.js';
import { AttachmentResolver, type AttachmentInput } from '../services/AttachmentResolver.js';
import { InvalidAttachmentPathError, TurnCancelledError } from '../errors/WorkflowErrors.js';

export type ChatExecutor = Pick<MedicalChatGraph, 'runTurn' | 'getHistory' | 'clearHistory'>;

const AttachmentSchema = z.object({
    path: z.string().min(1),
    filename: z.string().min(1).optional()
});

const PatientIdSchema = z.string().min(1).max(128);
const SessionIdSchema = z.string().uuid();

export const ChatTurnRequestSchema = z.object({
    patientId: PatientIdSchema,
    sessionId: SessionIdSchema,
    message: z.string().optional(),
    audio: AttachmentSchema.optional(),
    image: AttachmentSchema.optional()
});

const HistoryParamsSchema = z.object({
    sessionId: SessionIdSchema
});

const HistoryQuerySchema = z.object({
    patientId: PatientIdSchema,
    limit: z.coerce.number().int().min(1).max(200).default(20)
});

const ClearQuerySchema = HistoryQuerySchema.pick({ patientId: true });

function describeIssues(error: z.ZodError): string {
    return error.issues.map(i => i.path.join('.') || i.message).join(', ');
}

function invalidRequest(res: Response, message: string): void {
    res.status(400).json({
        error: {
            message,
            type: 'invalid_request_error'
        }
    });
}

function notSessionOwner(res: Response): void {
    res.status(403).json({
        error: {
            message: 'Session does not belong to this patient',
            type: 'permission_error'
        }
    });
}

export function ChatRouter(executor: ChatExecutor, resolver: AttachmentResolver): Router {
    const router = Router();

    const resolveOptional = async (input: AttachmentInput | undefined): Promise<AttachmentRef | undefined> =>
        input ? resolver.resolve(input) : undefined;

    router.post('/v1/chat/turns', async (req: Request, res: Response) => {
        const parsed = ChatTurnRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            invalidRequest(res, `Invalid request body: ${describeIssues(parsed.error)}`);
            return;
        }

        const body = parsed.data;
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableEnded) {
                controller.abort();
            }
        });

        try {
            const [audioRef, imageRef] = await Promise.all([
                resolveOptional(body.audio),
                resolveOptional(body.image)
            ]);

            console.log('[Chat Route] Turn received:', {
                sessionId: body.sessionId,
                hasText: Boolean(body.message?.trim()),
                hasAudio: Boolean(audioRef),
                hasImage: Boolean(imageRef)
            });

            const result = await executor.runTurn(
                {
                    patientId: body.patientId,
                    sessionId: body.sessionId,
                    rawText: body.message,
                    audioRef,
                    imageRef
                },
                { signal: controller.signal }
            );

            res.status(200).json({
                response: result.finalResponse,
                sessionId: result.metadata.sessionId,
                timestamp: result.metadata.timestamp,
                metadata: result.metadata
            });
        } catch (error) {
            if (error instanceof InvalidAttachmentPathError) {
                console.warn('[Chat Route] Attachment rejected:', error.message);
                invalidRequest(res, error.message);
                return;
            }
            if (error instanceof TurnCancelledError) {
                console.log('[Chat Route] Client disconnected before the turn finished:', body.sessionId);
                return;
            }

            console.error('[Chat Route] Turn failed:', error);
            res.status(500).json({
                error: {
                    message: 'Failed to process chat turn',
                    type: 'api_error'
                }
            });
        }
    });

    router.get('/v1/chat/history/:sessionId', async (req: Request, res: Response) => {
        const params = HistoryParamsSchema.safeParse(req.params);
        const query = HistoryQuerySchema.safeParse(req.query);
        if (!params.success || !query.success) {
            const issues = [params, query].flatMap((result): string[] => result.success ? [] : [describeIssues(result.error)]);
            invalidRequest(res, `Invalid history request: ${issues.join(', ')}`);
            return;
        }

        const { sessionId } = params.data;
        try {
            const turns = await executor.getHistory(sessionId, query.data.patientId, query.data.limit);
            if (turns === null) {
                notSessionOwner(res);
                return;
            }
            res.status(200).json({ sessionId, turns });
        } catch (error) {
            console.error('[Chat Route] Failed to load history:', error);
            res.status(500).json({ error: { message: 'Failed to load history', type: 'api_error' } });
        }
    });

    router.delete('/v1/chat/history/:sessionId', async (req: Request, res: Response) => {
        const params = HistoryParamsSchema.safeParse(req.params);
        const query = ClearQuerySchema.safeParse(req.query);
        if (!params.success || !query.success) {
            const issues = [params, query].flatMap((result): string[] => result.success ? [] : [describeIssues(result.error)]);
            invalidRequest(res, `Invalid history request: ${issues.join(', ')}`);
            return;
        }

        const { sessionId } = params.data;
        try {
            if (!await executor.clearHistory(sessionId, query.data.patientId)) {
                notSessionOwner(res);
                return;
            }
            res.status(200).json({ sessionId, cleared: true });
        } catch (error) {
            console.error('[Chat Route] Failed to clear history:', error);
            res.status(500).json({ error: { message: 'Failed to clear history', type: 'api_error' } });
        }
    });

    return router;
}
