import { z } from 'zod';

export const ChatTurnSchema = z.object({
    role: z.enum(['user', 'assistant']),
    text: z.string(),
    timestamp: z.string().optional()
});

export type ChatTurn = z.infer<typeof ChatTurnSchema>;
export type ChatRole = ChatTurn['role'];

/**
 * Append-only history per session. Every session belongs to the patient that
 * first claimed it; `load` returns the most recent `limit` turns, oldest first.
 */
export interface SessionStore {
    /** Binds the session to `patientId` unless it is already bound. Resolves to the owning patient. */
    claim(sessionId: string, patientId: string): Promise<string>;
    owner(sessionId: string): Promise<string | null>;
    /** Stores the turns together or not at all. */
    append(sessionId: string, turns: ChatTurn[]): Promise<void>;
    load(sessionId: string, limit: number): Promise<ChatTurn[]>;
    clear(sessionId: string): Promise<void>;
}
