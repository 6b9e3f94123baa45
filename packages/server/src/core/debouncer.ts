import { DEFAULT_DEBOUNCE_MS } from '@pagewatch/core';

export type DebouncerState = 'idle' | 'collecting' | 'deciding' | 'triggering';

export interface ChangeDebouncerOptions<TEvent> {
    windowMs?: number;
    isRelevant: (event: TEvent) => Promise<boolean> | boolean;
    trigger: (events: TEvent[]) => Promise<void>;
}

/**
 * Coalesces bursts of change events into single triggers.
 *
 * The first event of a burst opens a fixed window. When it closes, the batch
 * is checked for relevance and, if any event is relevant, `trigger` runs once
 * for the whole batch. Events that arrive while deciding or triggering open
 * the next window after the current trigger settles, so triggers never run
 * concurrently.
 */
export class ChangeDebouncer<TEvent> {
    private state: DebouncerState = 'idle';
    private buffer: TEvent[] = [];
    private timer: NodeJS.Timeout | null = null;
    private stopped = false;
    private idleWaiters: Array<() => void> = [];
    private readonly windowMs: number;
    private readonly isRelevant: (event: TEvent) => Promise<boolean> | boolean;
    private readonly trigger: (events: TEvent[]) => Promise<void>;

    constructor(options: ChangeDebouncerOptions<TEvent>) {
        this.windowMs = Math.max(1, options.windowMs ?? DEFAULT_DEBOUNCE_MS);
        this.isRelevant = options.isRelevant;
        this.trigger = options.trigger;
    }

    getState(): DebouncerState {
        return this.state;
    }

    get pending(): number {
        return this.buffer.length;
    }

    push(event: TEvent): void {
        if (this.stopped) {
            return;
        }
        this.buffer.push(event);
        if (this.state === 'idle') {
            this.openWindow();
        }
    }

    /** Resolves once no window is open and no trigger is running. */
    whenIdle(): Promise<void> {
        if (this.state === 'idle') {
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.idleWaiters.push(resolve);
        });
    }

    /** Drop buffered events and accept no more. A running trigger still finishes. */
    stop(): void {
        this.stopped = true;
        this.buffer = [];
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.state === 'collecting') {
            this.becomeIdle();
        }
    }

    private openWindow(): void {
        this.state = 'collecting';
        this.timer = setTimeout(() => {
            this.timer = null;
            void this.decide();
        }, this.windowMs);
    }

    private async decide(): Promise<void> {
        this.state = 'deciding';
        const batch = this.buffer;
        this.buffer = [];

        try {
            if (await this.anyRelevant(batch)) {
                this.state = 'triggering';
                await this.trigger(batch);
            }
        } catch (error) {
            console.error('[WATCH] Change handling failed:', error);
        }

        if (this.buffer.length > 0 && !this.stopped) {
            this.openWindow();
        } else {
            this.becomeIdle();
        }
    }

    private async anyRelevant(batch: TEvent[]): Promise<boolean> {
        for (const event of batch) {
            if (await this.isRelevant(event)) {
                return true;
            }
        }
        return false;
    }

    private becomeIdle(): void {
        this.state = 'idle';
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) {
            resolve();
        }
    }
}
