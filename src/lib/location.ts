import { Coordinates } from './geo';

export interface Position extends Coordinates {
    /** Horizontal accuracy in meters */
    accuracy: number;
    /** Epoch milliseconds when the device took the fix */
    timestamp: number;
}

export type AuthorizationStatus = 'undetermined' | 'authorized' | 'denied';

export interface LocationVerificationPort {
    currentAuthorization(): AuthorizationStatus;
    /**
     * Resolves exactly once within `timeoutMs`. `null` means no usable position:
     * timeout, denial, device error, abort or no device to ask.
     */
    requestPosition(timeoutMs: number, signal?: AbortSignal): Promise<Position | null>;
}

export const MAX_FIX_AGE_MS = 30_000;
export const MIN_ACCURACY_METERS = 100;

export function isUsableFix(position: Position, now: number): boolean {
    const age = now - position.timestamp;
    return position.accuracy <= MIN_ACCURACY_METERS && age >= 0 && age < MAX_FIX_AGE_MS;
}

/**
 * Single-assignment result. The first `settle` wins, runs `cleanup` and resolves
 * the promise; later calls return false and do nothing.
 */
export function settleOnce<T>(cleanup: () => void = () => undefined) {
    let done = false;
    let resolvePromise: (value: T) => void = () => undefined;

    const promise = new Promise<T>((resolve) => {
        resolvePromise = resolve;
    });

    const settle = (value: T): boolean => {
        if (done) return false;
        done = true;
        cleanup();
        resolvePromise(value);
        return true;
    };

    return { promise, settle, isSettled: () => done };
}

type FixRequester = () => void;
type Waiter = (position: Position | null) => void;

/**
 * Position source fed by a connected device. The transport calls `attach` with a
 * function that asks the device for a fix, then forwards whatever the device
 * reports through `pushFix`, `pushError` and `setAuthorization`.
 */
export class DeviceLocationPort implements LocationVerificationPort {
    private lastFix: Position | null = null;
    private authorization: AuthorizationStatus = 'undetermined';
    private requester: FixRequester | null = null;
    private readonly waiters = new Set<Waiter>();

    constructor(private readonly now: () => number = Date.now) {}

    currentAuthorization(): AuthorizationStatus {
        return this.authorization;
    }

    isAttached(): boolean {
        return this.requester !== null;
    }

    /** Returns a detach function that only detaches this requester. */
    attach(requester: FixRequester): () => void {
        this.requester = requester;
        return () => {
            if (this.requester === requester) this.detach();
        };
    }

    detach(): void {
        this.requester = null;
        this.flush(null);
    }

    setAuthorization(status: AuthorizationStatus): void {
        this.authorization = status;
        if (status === 'denied') {
            this.lastFix = null;
            this.flush(null);
        }
    }

    pushFix(position: Position): void {
        if (this.authorization === 'denied') return;
        if (this.authorization === 'undetermined') this.authorization = 'authorized';

        // A device clock running ahead must not stretch how long a fix stays fresh
        const receivedAt = this.now();
        const fix = { ...position, timestamp: Math.min(position.timestamp, receivedAt) };

        // Inaccurate or stale fixes never settle a waiting request
        if (!isUsableFix(fix, receivedAt)) return;

        this.lastFix = fix;
        this.flush(fix);
    }

    pushError(reason: string): void {
        console.warn('Device location error:', reason);
        this.flush(null);
    }

    lastKnownFix(): Position | null {
        if (this.lastFix && isUsableFix(this.lastFix, this.now())) return this.lastFix;
        return null;
    }

    requestPosition(timeoutMs: number, signal?: AbortSignal): Promise<Position | null> {
        if (this.authorization === 'denied' || signal?.aborted) return Promise.resolve(null);

        const cached = this.lastKnownFix();
        if (cached) return Promise.resolve(cached);

        const requester = this.requester;
        if (!requester) return Promise.resolve(null);

        let timer: NodeJS.Timeout | undefined;
        const onAbort = () => settle(null);
        const waiter: Waiter = (position) => settle(position);

        const { promise, settle } = settleOnce<Position | null>(() => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
            this.waiters.delete(waiter);
        });

        timer = setTimeout(() => settle(null), timeoutMs);
        signal?.addEventListener('abort', onAbort, { once: true });
        this.waiters.add(waiter);

        try {
            requester();
        } catch (error) {
            console.error('Location request failed:', error);
            settle(null);
        }

        return promise;
    }

    private flush(position: Position | null): void {
        const pending = Array.from(this.waiters);
        this.waiters.clear();
        for (const waiter of pending) waiter(position);
    }
}
