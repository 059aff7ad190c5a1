import { createClient } from 'redis';

type RedisConnection = ReturnType<typeof createClient>;

class RedisClient {
    private static instance: RedisClient | undefined;
    private client: RedisConnection;
    private isConnected = false;

    private constructor(url: string) {
        this.client = createClient({
            url
        });
        this.setupEventHandlers();
    }

    static getInstance(url?: string): RedisClient {
        if (!RedisClient.instance) {
            RedisClient.instance = new RedisClient(url ?? process.env.REDIS_URL ?? 'redis://localhost:6379');
        }
        return RedisClient.instance;
    }

    private setupEventHandlers(): void {
        this.client.on('error', (err) => {
            console.error('[RedisClient] Client error:', err);
            this.isConnected = false;
        });

        this.client.on('reconnecting', () => {
            console.log('[RedisClient] Reconnecting...');
        });

        this.client.on('ready', () => {
            console.log('[RedisClient] Ready');
            this.isConnected = true;
        });
    }

    async connect(): Promise<void> {
        if (!this.isConnected && !this.client.isOpen) {
            await this.client.connect();
        }
    }

    async disconnect(): Promise<void> {
        if (this.client.isOpen) {
            await this.client.quit();
        }
        this.isConnected = false;
    }

    /** Appends every value in one MULTI, trims to the newest `maxLength` and refreshes expiry on `key` and `relatedKeys`. */
    async pushCappedJSON<T>(
        key: string,
        values: T[],
        maxLength: number,
        ttlSeconds?: number,
        relatedKeys: string[] = []
    ): Promise<void> {
        if (values.length === 0) return;

        const pipeline = this.client.multi()
            .rPush(key, values.map(value => JSON.stringify(value)))
            .lTrim(key, -maxLength, -1);

        if (ttlSeconds) {
            for (const expiring of [key, ...relatedKeys]) {
                pipeline.expire(expiring, ttlSeconds);
            }
        }

        await pipeline.exec();
    }

    /** Raw list entries; callers decide how to treat entries they cannot parse. */
    async getList(key: string, start: number, stop: number): Promise<string[]> {
        return this.client.lRange(key, start, stop);
    }

    async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
        const reply = ttlSeconds
            ? await this.client.set(key, value, { NX: true, EX: ttlSeconds })
            : await this.client.set(key, value, { NX: true });
        return reply === 'OK';
    }

    async getString(key: string): Promise<string | null> {
        return this.client.get(key);
    }

    async delete(...keys: string[]): Promise<void> {
        if (keys.length === 0) return;
        await this.client.del(keys);
    }

    async ping(): Promise<boolean> {
        try {
            return (await this.client.ping()) === 'PONG';
        } catch (error) {
            console.error('[RedisClient] Ping failed:', error);
            return false;
        }
    }
}

export { RedisClient };
