import type { Pixmap } from '@pagewatch/core';
import { TransportError } from './errors.js';
import { encodeBroadcast, type WireFrame } from './wire.js';

/** One viewer connection. `send` settles once the frame is handed to the connection. */
export interface ViewerTransport {
    send(frame: WireFrame): Promise<void>;
    close(): void;
}

export interface BroadcastHubOptions {
    /** Per-frame write timeout; a write that takes longer fails the session. */
    writeTimeoutMs?: number;
}

export interface BroadcastReport {
    delivered: number;
    pruned: number[];
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * A connected viewer. Deliveries are queued, so the frames of one broadcast
 * never interleave with those of another.
 */
export class ViewerSession {
    public readonly id: number;
    private readonly transport: ViewerTransport;
    private readonly writeTimeoutMs: number | undefined;
    private readonly closed = new AbortController();
    private queue: Promise<void> = Promise.resolve();
    private failure: TransportError | undefined;

    constructor(id: number, transport: ViewerTransport, writeTimeoutMs?: number) {
        this.id = id;
        this.transport = transport;
        this.writeTimeoutMs = writeTimeoutMs;
    }

    deliver(frames: WireFrame[]): Promise<void> {
        const run = this.queue.then(() => this.writeAll(frames));
        // The failure reaches the caller through `run`; the queue only keeps order.
        this.queue = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    /** Close the transport; queued and in-flight writes fail at once. */
    close(): void {
        if (this.closed.signal.aborted) {
            return;
        }
        this.closed.abort();
        try {
            this.transport.close();
        } catch (error) {
            console.warn(`[HUB] Failed to close viewer #${this.id}: ${errorMessage(error)}`);
        }
    }

    private async writeAll(frames: WireFrame[]): Promise<void> {
        for (const frame of frames) {
            if (this.failure) {
                throw this.failure;
            }
            try {
                await this.write(frame);
            } catch (error) {
                this.failure = error instanceof TransportError ? error : new TransportError(this.id, errorMessage(error));
                throw this.failure;
            }
        }
    }

    private write(frame: WireFrame): Promise<void> {
        const signal = this.closed.signal;
        if (signal.aborted) {
            return Promise.reject(new TransportError(this.id, 'session closed'));
        }

        const timeoutMs = this.writeTimeoutMs;
        let timer: NodeJS.Timeout | undefined;
        let onClose: (() => void) | undefined;
        const interrupted = new Promise<never>((_, reject) => {
            onClose = () => reject(new TransportError(this.id, 'session closed'));
            signal.addEventListener('abort', onClose, { once: true });
            if (timeoutMs !== undefined) {
                timer = setTimeout(() => {
                    reject(new TransportError(this.id, `write timed out after ${timeoutMs}ms`));
                }, timeoutMs);
            }
        });
        return Promise.race([this.transport.send(frame), interrupted]).finally(() => {
            clearTimeout(timer);
            if (onClose) {
                signal.removeEventListener('abort', onClose);
            }
        });
    }
}

/**
 * The set of connected viewers. `add` and the prune pass after a broadcast are
 * synchronous, so they never interleave with each other.
 */
export class BroadcastHub {
    private sessions: ViewerSession[] = [];
    private nextId = 1;
    private readonly writeTimeoutMs: number | undefined;

    constructor(options: BroadcastHubOptions = {}) {
        this.writeTimeoutMs = options.writeTimeoutMs;
    }

    get size(): number {
        return this.sessions.length;
    }

    sessionIds(): number[] {
        return this.sessions.map((session) => session.id);
    }

    add(transport: ViewerTransport): ViewerSession {
        const session = new ViewerSession(this.nextId, transport, this.writeTimeoutMs);
        this.nextId += 1;
        this.sessions.push(session);
        console.log(`[HUB] Viewer #${session.id} connected (${this.sessions.length} total)`);
        return session;
    }

    remove(session: ViewerSession): boolean {
        const before = this.sessions.length;
        this.sessions = this.sessions.filter((entry) => entry !== session);
        const removed = this.sessions.length !== before;
        if (removed) {
            console.log(`[HUB] Viewer #${session.id} disconnected (${this.sessions.length} total)`);
        }
        return removed;
    }

    /**
     * Send `pages` to every session connected when the call starts. Sessions
     * whose transport failed are removed once every send settled.
     */
    async broadcast(pages: Pixmap[]): Promise<BroadcastReport> {
        const frames = encodeBroadcast(pages);
        const recipients = [...this.sessions];
        if (frames.length === 0 || recipients.length === 0) {
            return { delivered: 0, pruned: [] };
        }

        const results = await Promise.allSettled(recipients.map((session) => session.deliver(frames)));

        const failed = new Set<ViewerSession>();
        results.forEach((result, index) => {
            if (result.status === 'rejected') {
                const session = recipients[index];
                failed.add(session);
                console.warn(`[HUB] Dropping viewer #${session.id}: ${errorMessage(result.reason)}`);
            }
        });
        this.prune(failed);

        return {
            delivered: recipients.length - failed.size,
            pruned: Array.from(failed, (session) => session.id),
        };
    }

    closeAll(): void {
        const sessions = this.sessions;
        this.sessions = [];
        for (const session of sessions) {
            session.close();
        }
    }

    private prune(failed: Set<ViewerSession>): void {
        if (failed.size === 0) {
            return;
        }
        this.sessions = this.sessions.filter((session) => !failed.has(session));
        for (const session of failed) {
            session.close();
        }
    }
}
