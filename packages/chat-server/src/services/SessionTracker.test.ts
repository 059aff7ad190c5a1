import { beforeEach, describe, expect, it, vi } from 'vitest';
import { SessionTracker } from './SessionTracker.js';
import { silenceConsole } from '../testing/fakes.js';

describe('SessionTracker', () => {
    let now: number;
    let tracker: SessionTracker;

    beforeEach(() => {
        vi.restoreAllMocks();
        silenceConsole();
        now = 1_000_000;
        tracker = new SessionTracker(() => now);
    });

    it('remembers the patient that opened a session', () => {
        tracker.touch('s1', 'P-1');
        tracker.touch('s1', 'P-1');
        expect(tracker.get('s1')?.patientId).toBe('P-1');
        expect(tracker.activeCount).toBe(1);
    });

    it('counts messages and refreshes activity', () => {
        tracker.touch('s1', 'P-1');
        tracker.recordMessage('s1');
        now += 5000;
        tracker.touch('s1', 'P-1');
        tracker.recordMessage('s1');

        expect(tracker.get('s1')).toEqual({
            patientId: 'P-1',
            createdAt: 1_000_000,
            lastActivity: 1_005_000,
            messageCount: 2
        });
    });

    it('evicts sessions idle for longer than the limit', () => {
        tracker.touch('old', 'P-1');
        now += 61 * 60_000;
        tracker.touch('fresh', 'P-2');

        expect(tracker.cleanupInactive(60)).toEqual(['old']);
        expect(tracker.activeCount).toBe(1);
        expect(tracker.get('old')).toBeNull();
    });

    it('forgets a session on request', () => {
        tracker.touch('s1', 'P-1');
        tracker.forget('s1');
        expect(tracker.get('s1')).toBeNull();
        expect(tracker.activeCount).toBe(0);
    });
});
