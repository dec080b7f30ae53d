import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DeviceLocationPort, Position, isUsableFix, settleOnce } from '../../src/lib/location';

const NOW = 1_700_000_000_000;

function fix(overrides: Partial<Position> = {}): Position {
    return { latitude: 30, longitude: 31, accuracy: 20, timestamp: NOW, ...overrides };
}

describe('settleOnce', () => {
    it('keeps the first value and runs cleanup once', async () => {
        const cleanup = vi.fn();
        const { promise, settle, isSettled } = settleOnce<string>(cleanup);

        expect(settle('first')).toBe(true);
        expect(settle('second')).toBe(false);

        await expect(promise).resolves.toBe('first');
        expect(cleanup).toHaveBeenCalledTimes(1);
        expect(isSettled()).toBe(true);
    });
});

describe('isUsableFix', () => {
    it('rejects a fix stamped after the current time', () => {
        expect(isUsableFix(fix({ timestamp: NOW + 1000 }), NOW)).toBe(false);
        expect(isUsableFix(fix(), NOW)).toBe(true);
    });
});

describe('DeviceLocationPort', () => {
    let now: number;
    let port: DeviceLocationPort;
    let requester: ReturnType<typeof vi.fn>;

    beforeEach(() => {
        vi.useFakeTimers();
        now = NOW;
        port = new DeviceLocationPort(() => now);
        requester = vi.fn();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('resolves null straight away when no device is attached', async () => {
        await expect(port.requestPosition(1000)).resolves.toBeNull();
    });

    it('returns a fresh cached fix without asking the device', async () => {
        port.attach(requester);
        port.pushFix(fix());
        now += 10_000;

        await expect(port.requestPosition(1000)).resolves.toEqual(fix());
        expect(requester).not.toHaveBeenCalled();
        expect(port.currentAuthorization()).toBe('authorized');
    });

    it('asks the device when the cached fix is older than 30 seconds', async () => {
        port.attach(requester);
        port.pushFix(fix());
        now += 30_000;

        const pending = port.requestPosition(5000);
        expect(requester).toHaveBeenCalledTimes(1);

        const fresh = fix({ timestamp: now, latitude: 30.5 });
        port.pushFix(fresh);
        await expect(pending).resolves.toEqual(fresh);
    });

    it('resolves null on timeout and ignores a late fix', async () => {
        port.attach(requester);
        const pending = port.requestPosition(1000);

        vi.advanceTimersByTime(1000);
        await expect(pending).resolves.toBeNull();

        // The late fix is only cached for the next request
        port.pushFix(fix());
        await expect(port.requestPosition(1000)).resolves.toEqual(fix());
        expect(requester).toHaveBeenCalledTimes(1);
    });

    it('ages a future-dated fix from the time it arrived', async () => {
        port.attach(requester);
        port.pushFix(fix({ timestamp: NOW + 60 * 60_000 }));
        expect(port.lastKnownFix()).toEqual(fix());

        now += 30 * 60_000;
        const pending = port.requestPosition(1000);

        expect(requester).toHaveBeenCalledTimes(1);
        vi.advanceTimersByTime(1000);
        await expect(pending).resolves.toBeNull();
    });

    it('keeps waiting through an inaccurate fix', async () => {
        port.attach(requester);
        const pending = port.requestPosition(1000);

        port.pushFix(fix({ accuracy: 250 }));
        vi.advanceTimersByTime(1000);

        await expect(pending).resolves.toBeNull();
        expect(port.lastKnownFix()).toBeNull();
    });

    it('settles a request once even when a fix and the timer race', async () => {
        port.attach(requester);
        const onResult = vi.fn();
        const pending = port.requestPosition(1000).then(onResult);

        port.pushFix(fix());
        vi.advanceTimersByTime(1000);
        port.pushFix(fix({ latitude: 40 }));
        await pending;

        expect(onResult).toHaveBeenCalledTimes(1);
        expect(onResult).toHaveBeenCalledWith(fix());
        expect(vi.getTimerCount()).toBe(0);
    });

    it('resolves null when the caller aborts', async () => {
        port.attach(requester);
        const controller = new AbortController();
        const pending = port.requestPosition(1000, controller.signal);

        controller.abort();
        await expect(pending).resolves.toBeNull();
        expect(vi.getTimerCount()).toBe(0);
    });

    it('resolves null when permission is denied mid-request', async () => {
        port.attach(requester);
        const pending = port.requestPosition(1000);

        port.setAuthorization('denied');
        await expect(pending).resolves.toBeNull();
        await expect(port.requestPosition(1000)).resolves.toBeNull();
    });

    it('resolves null when the device reports an error', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        port.attach(requester);
        const pending = port.requestPosition(1000);

        port.pushError('location unknown');
        await expect(pending).resolves.toBeNull();
        expect(warn).toHaveBeenCalledWith('Device location error:', 'location unknown');
        warn.mockRestore();
    });

    it('only detaches the requester that attached', async () => {
        const detachFirst = port.attach(requester);
        const second = vi.fn();
        port.attach(second);

        detachFirst();
        expect(port.isAttached()).toBe(true);

        const pending = port.requestPosition(1000);
        expect(second).toHaveBeenCalledTimes(1);
        port.detach();
        await expect(pending).resolves.toBeNull();
    });
});
