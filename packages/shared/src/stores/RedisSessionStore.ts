import { ChatTurnSchema, type ChatTurn, type SessionStore } from '../types/conversation.js';

const SESSION_TTL_SECONDS = 7 * 24 * 3600;

/** The slice of RedisClient the store relies on. */
export interface CappedListClient {
    pushCappedJSON<T>(key: string, values: T[], maxLength: number, ttlSeconds?: number, relatedKeys?: string[]): Promise<void>;
    getList(key: string, start: number, stop: number): Promise<string[]>;
    setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean>;
    getString(key: string): Promise<string | null>;
    delete(...keys: string[]): Promise<void>;
}

export interface RedisSessionStoreOptions {
    keyPrefix?: string;
    ownerKeyPrefix?: string;
    maxEntries?: number;
    ttlSeconds?: number;
}

export class RedisSessionStore implements SessionStore {
    private redisClient: CappedListClient;
    private keyPrefix: string;
    private ownerKeyPrefix: string;
    private maxEntries: number;
    private ttlSeconds: number;

    constructor(redisClient: CappedListClient, options: RedisSessionStoreOptions = {}) {
        this.redisClient = redisClient;
        this.keyPrefix = options.keyPrefix ?? 'chat_history:';
        this.ownerKeyPrefix = options.ownerKeyPrefix ?? 'chat_owner:';
        this.maxEntries = options.maxEntries ?? 200;
        this.ttlSeconds = options.ttlSeconds ?? SESSION_TTL_SECONDS;
    }

    private prefixedKey(sessionId: string): string {
        return `${this.keyPrefix}${sessionId}`;
    }

    private ownerKey(sessionId: string): string {
        return `${this.ownerKeyPrefix}${sessionId}`;
    }

    async claim(sessionId: string, patientId: string): Promise<string> {
        const key = this.ownerKey(sessionId);
        if (await this.redisClient.setIfAbsent(key, patientId, this.ttlSeconds)) {
            return patientId;
        }

        const owner = await this.redisClient.getString(key);
        if (owner !== null) return owner;

        // Expired between the two calls.
        await this.redisClient.setIfAbsent(key, patientId, this.ttlSeconds);
        return (await this.redisClient.getString(key)) ?? patientId;
    }

    async owner(sessionId: string): Promise<string | null> {
        return this.redisClient.getString(this.ownerKey(sessionId));
    }

    async append(sessionId: string, turns: ChatTurn[]): Promise<void> {
        await this.redisClient.pushCappedJSON(
            this.prefixedKey(sessionId),
            turns,
            this.maxEntries,
            this.ttlSeconds,
            [this.ownerKey(sessionId)]
        );
    }

    async load(sessionId: string, limit: number): Promise<ChatTurn[]> {
        if (limit <= 0) return [];

        const entries = await this.redisClient.getList(this.prefixedKey(sessionId), -limit, -1);
        const turns: ChatTurn[] = [];

        for (const entry of entries) {
            const parsed = ChatTurnSchema.safeParse(parseJSON(entry));
            if (parsed.success) {
                turns.push(parsed.data);
            } else {
                console.warn('[RedisSessionStore] Skipping malformed history entry for session:', sessionId);
            }
        }

        return turns;
    }

    async clear(sessionId: string): Promise<void> {
        await this.redisClient.delete(this.prefixedKey(sessionId), this.ownerKey(sessionId));
    }
}

function parseJSON(entry: string): unknown {
    try {
        return JSON.parse(entry);
    } catch {
        return undefined;
    }
}
