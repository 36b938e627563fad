/**
 * Bounded single-consumer event channel.
 *
 * Background producers `send()` into it; when the buffer is full the returned
 * promise waits until the consumer drains room, so nothing is ever dropped.
 * The consumer calls `drain()` once per tick on the render loop.
 */
import { ChannelClosedError } from '../lib/errors';

interface PendingSend<T> {
    item: T;
    resolve: () => void;
    reject: (err: Error) => void;
}

export class EventChannel<T> {
    private readonly buffer: T[] = [];
    private readonly pending: PendingSend<T>[] = [];
    private closed = false;

    constructor(
        readonly name: string,
        readonly capacity: number,
    ) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Channel "${name}" capacity must be a positive integer (got ${capacity})`);
        }
    }

    /** Items buffered and ready to drain. */
    get size(): number {
        return this.buffer.length;
    }

    /** Producers currently waiting for room. */
    get waiting(): number {
        return this.pending.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /** Enqueue without waiting; false when the buffer is full. */
    trySend(item: T): boolean {
        if (this.closed) throw new ChannelClosedError(this.name);
        if (this.buffer.length >= this.capacity) return false;
        this.buffer.push(item);
        return true;
    }

    /** Enqueue, waiting for room while the buffer is full. */
    send(item: T): Promise<void> {
        if (this.closed) return Promise.reject(new ChannelClosedError(this.name));
        if (this.pending.length === 0 && this.buffer.length < this.capacity) {
            this.buffer.push(item);
            return Promise.resolve();
        }
        return new Promise<void>((resolve, reject) => {
            this.pending.push({ item, resolve, reject });
        });
    }

    /**
     * Remove up to `max` items in send order. Waiting producers are moved
     * into the freed room, oldest first.
     */
    drain(max = Infinity): T[] {
        const count = Math.min(max, this.buffer.length);
        const items = this.buffer.splice(0, count);
        while (this.pending.length > 0 && this.buffer.length < this.capacity) {
            const next = this.pending.shift();
            if (!next) break;
            this.buffer.push(next.item);
            next.resolve();
        }
        return items;
    }

    /**
     * Refuse further sends. Buffered items stay drainable; producers still
     * waiting for room are rejected.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        for (const waiting of this.pending.splice(0)) {
            waiting.reject(new ChannelClosedError(this.name));
        }
    }
}
