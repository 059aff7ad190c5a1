export interface SessionInfo {
    patientId: string;
    createdAt: number;
    lastActivity: number;
    messageCount: number;
}

/**
 * Activity bookkeeping for live sessions. Ownership is decided by the
 * session store; this only feeds the health endpoint and the idle sweep.
 */
export class SessionTracker {
    private sessions = new Map<string, SessionInfo>();

    constructor(private readonly now: () => number = Date.now) {}

    touch(sessionId: string, patientId: string): void {
        const existing = this.sessions.get(sessionId);
        const now = this.now();

        if (!existing) {
            this.sessions.set(sessionId, { patientId, createdAt: now, lastActivity: now, messageCount: 0 });
            return;
        }

        existing.lastActivity = now;
    }

    recordMessage(sessionId: string): void {
        const session = this.sessions.get(sessionId);
        if (session) {
            session.messageCount++;
        }
    }

    get(sessionId: string): SessionInfo | null {
        const session = this.sessions.get(sessionId);
        return session ? { ...session } : null;
    }

    forget(sessionId: string): void {
        this.sessions.delete(sessionId);
    }

    get activeCount(): number {
        return this.sessions.size;
    }

    cleanupInactive(idleMinutes: number): string[] {
        const cutoff = this.now() - idleMinutes * 60_000;
        const evicted: string[] = [];

        for (const [sessionId, info] of this.sessions) {
            if (info.lastActivity < cutoff) {
                this.sessions.delete(sessionId);
                evicted.push(sessionId);
            }
        }

        if (evicted.length > 0) {
            console.log('[SessionTracker] Cleaned up inactive sessions:', evicted.length);
        }
        return evicted;
    }
}
