import { beforeEach, describe, expect, it, vi } from 'vitest';
import { RedisSessionStore, type CappedListClient } from './RedisSessionStore.js';

/** Mirrors RPUSH / LTRIM / LRANGE / SET NX index semantics over in-process maps. */
class FakeListClient implements CappedListClient {
    lists = new Map<string, string[]>();
    strings = new Map<string, string>();
    expiries = new Map<string, number>();

    private slice(list: string[], start: number, stop: number): string[] {
        const from = start < 0 ? Math.max(list.length + start, 0) : start;
        const to = stop < 0 ? list.length + stop : stop;
        return list.slice(from, to + 1);
    }

    async pushCappedJSON<T>(key: string, values: T[], maxLength: number, ttlSeconds?: number, relatedKeys: string[] = []): Promise<void> {
        const list = [...(this.lists.get(key) ?? []), ...values.map(value => JSON.stringify(value))];
        this.lists.set(key, this.slice(list, -maxLength, -1));
        if (ttlSeconds) {
            for (const expiring of [key, ...relatedKeys]) this.expiries.set(expiring, ttlSeconds);
        }
    }

    async getList(key: string, start: number, stop: number): Promise<string[]> {
        return this.slice(this.lists.get(key) ?? [], start, stop);
    }

    async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
        if (this.strings.has(key)) return false;
        this.strings.set(key, value);
        if (ttlSeconds) this.expiries.set(key, ttlSeconds);
        return true;
    }

    async getString(key: string): Promise<string | null> {
        return this.strings.get(key) ?? null;
    }

    async delete(...keys: string[]): Promise<void> {
        for (const key of keys) {
            this.lists.delete(key);
            this.strings.delete(key);
        }
    }
}

describe('RedisSessionStore', () => {
    let client: FakeListClient;
    let store: RedisSessionStore;

    beforeEach(() => {
        vi.restoreAllMocks();
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        client = new FakeListClient();
        store = new RedisSessionStore(client, { maxEntries: 3, ttlSeconds: 60 });
    });

    it('appends a whole turn under a prefixed key and refreshes both ttls', async () => {
        await store.append('s1', [{ role: 'user', text: 'Hi' }, { role: 'assistant', text: 'Hello' }]);

        expect(client.lists.get('chat_history:s1')).toEqual([
            '{"role":"user","text":"Hi"}',
            '{"role":"assistant","text":"Hello"}'
        ]);
        expect(client.expiries.get('chat_history:s1')).toBe(60);
        expect(client.expiries.get('chat_owner:s1')).toBe(60);
    });

    it('caps stored history and loads the most recent turns', async () => {
        for (const text of ['one', 'two', 'three', 'four']) {
            await store.append('s1', [{ role: 'user', text }]);
        }

        expect((await store.load('s1', 10)).map(turn => turn.text)).toEqual(['two', 'three', 'four']);
        expect((await store.load('s1', 2)).map(turn => turn.text)).toEqual(['three', 'four']);
        expect(await store.load('s1', 0)).toEqual([]);
    });

    it('skips entries that fail the schema or are not JSON at all', async () => {
        client.lists.set('chat_history:s1', [
            '{"role":"robot","text":"?"}',
            'not json{',
            '{"role":"assistant","text":"Hello"}'
        ]);

        expect(await store.load('s1', 5)).toEqual([{ role: 'assistant', text: 'Hello' }]);
    });

    it('records the first claimant as owner', async () => {
        expect(await store.claim('s1', 'P-1')).toBe('P-1');
        expect(await store.claim('s1', 'P-2')).toBe('P-1');
        expect(await store.owner('s1')).toBe('P-1');
        expect(client.expiries.get('chat_owner:s1')).toBe(60);
    });

    it('clears history and ownership together', async () => {
        await store.claim('s1', 'P-1');
        await store.append('s1', [{ role: 'user', text: 'Hi' }]);
        await store.clear('s1');

        expect(await store.load('s1', 5)).toEqual([]);
        expect(await store.owner('s1')).toBeNull();
    });
});
