import type { ChatTurn, SessionStore } from '../types/conversation.js';
import { HistoryWindow } from '../utils/HistoryWindow.js';

/** Process-local history, used when no Redis URL is configured. */
export class InMemorySessionStore implements SessionStore {
    private sessions = new Map<string, HistoryWindow<ChatTurn>>();
    private owners = new Map<string, string>();

    constructor(private readonly maxEntries: number = 200) {}

    async claim(sessionId: string, patientId: string): Promise<string> {
        const existing = this.owners.get(sessionId);
        if (existing !== undefined) return existing;

        this.owners.set(sessionId, patientId);
        return patientId;
    }

    async owner(sessionId: string): Promise<string | null> {
        return this.owners.get(sessionId) ?? null;
    }

    async append(sessionId: string, turns: ChatTurn[]): Promise<void> {
        let window = this.sessions.get(sessionId);
        if (!window) {
            window = new HistoryWindow<ChatTurn>(this.maxEntries);
            this.sessions.set(sessionId, window);
        }
        for (const turn of turns) {
            window.push({ ...turn });
        }
    }

    async load(sessionId: string, limit: number): Promise<ChatTurn[]> {
        const window = this.sessions.get(sessionId);
        if (!window || limit <= 0) return [];
        return window.latest(limit).map(turn => ({ ...turn }));
    }

    async clear(sessionId: string): Promise<void> {
        this.sessions.delete(sessionId);
        this.owners.delete(sessionId);
    }
}
