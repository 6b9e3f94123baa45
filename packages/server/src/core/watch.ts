import * as fs from 'node:fs';
import * as path from 'node:path';
import chokidar from 'chokidar';
import ignore from 'ignore';
import {
    DEFAULT_WATCH_IGNORE_PATTERNS,
    type FsEvent,
    type FsEventKind,
    type Pixmap,
    type RecompileOrchestrator,
} from '@pagewatch/core';
import type { BroadcastHub } from '../server/broadcast-hub.js';
import { WatchError } from '../server/errors.js';
import { ChangeDebouncer, type DebouncerState } from './debouncer.js';

export interface WatchSubscription {
    close(): Promise<void>;
}

export interface WatchHandlers {
    onEvent: (event: FsEvent) => void;
    onError: (error: Error) => void;
}

/** Starts a recursive subscription on `root`; resolves once it is live. */
export type WatchSubscriber = (root: string, handlers: WatchHandlers) => Promise<WatchSubscription>;

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

function ignoresRelativePath(matcher: ReturnType<typeof ignore>, root: string, candidatePath: string): boolean {
    const relativePath = path.relative(root, candidatePath).replace(/\\/g, '/');
    if (!relativePath || relativePath === '.' || relativePath.startsWith('..') || path.isAbsolute(relativePath)) {
        return false;
    }
    if (matcher.ignores(relativePath)) {
        return true;
    }
    return matcher.ignores(`${relativePath}/`);
}

/**
 * Subscriber backed by chokidar. Initial scan events are suppressed; errors
 * before `ready` reject the subscription.
 */
export function createChokidarSubscriber(ignorePatterns: readonly string[] = DEFAULT_WATCH_IGNORE_PATTERNS): WatchSubscriber {
    return (root, handlers) => new Promise((resolve, reject) => {
        const matcher = ignore().add([...ignorePatterns]);
        const watcher = chokidar.watch(root, {
            persistent: true,
            ignoreInitial: true,
            ignored: (watchPath: string) => ignoresRelativePath(matcher, root, watchPath),
        });
        let ready = false;

        const forward = (kind: FsEventKind) => (watchPath: string) => {
            handlers.onEvent({ kind, paths: [path.resolve(root, watchPath)] });
        };

        watcher
            .on('add', forward({ type: 'create' }))
            .on('addDir', forward({ type: 'create' }))
            .on('change', forward({ type: 'modify', modify: 'data' }))
            .on('unlink', forward({ type: 'remove' }))
            .on('unlinkDir', forward({ type: 'remove' }))
            .on('error', (error: unknown) => {
                if (ready) {
                    handlers.onError(toError(error));
                    return;
                }
                watcher.close().catch((closeError: unknown) => {
                    console.error(`[WATCH] Failed to close watcher for '${root}':`, closeError);
                });
                reject(new WatchError(root, `failed to watch '${root}': ${toError(error).message}`));
            })
            .once('ready', () => {
                ready = true;
                resolve({ close: () => watcher.close() });
            });
    });
}

export interface WatchSessionOptions {
    input: string;
    root: string;
    orchestrator: RecompileOrchestrator;
    hub: BroadcastHub;
    debounceMs?: number;
    subscribe?: WatchSubscriber;
    /** Receives formatted diagnostics of failed compilations. */
    writeDiagnostics?: (text: string) => void;
}

/**
 * The watch loop: compile once, then recompile on relevant changes and hand
 * every successful render to the hub.
 */
export class WatchSession {
    private readonly input: string;
    private readonly root: string;
    private readonly orchestrator: RecompileOrchestrator;
    private readonly hub: BroadcastHub;
    private readonly subscribe: WatchSubscriber;
    private readonly writeDiagnostics: (text: string) => void;
    private readonly debouncer: ChangeDebouncer<FsEvent>;
    private readonly broadcasts = new Set<Promise<void>>();
    private subscription: WatchSubscription | null = null;

    constructor(options: WatchSessionOptions) {
        this.input = options.input;
        this.root = options.root;
        this.orchestrator = options.orchestrator;
        this.hub = options.hub;
        this.subscribe = options.subscribe || createChokidarSubscriber();
        this.writeDiagnostics = options.writeDiagnostics || ((text) => process.stderr.write(text));
        this.debouncer = new ChangeDebouncer<FsEvent>({
            windowMs: options.debounceMs,
            isRelevant: (event) => this.orchestrator.isRelevant(event),
            trigger: () => this.recompile(),
        });
    }

    get state(): DebouncerState {
        return this.debouncer.getState();
    }

    async start(): Promise<void> {
        await this.ensureRoot();
        await this.recompile();

        try {
            this.subscription = await this.subscribe(this.root, {
                onEvent: (event) => this.debouncer.push(event),
                onError: (error) => console.error(`[WATCH] Watch error: ${error.message}`),
            });
        } catch (error) {
            throw error instanceof WatchError
                ? error
                : new WatchError(this.root, `failed to watch '${this.root}': ${toError(error).message}`);
        }
        console.log(`[WATCH] Watching '${this.root}' for changes...`);
    }

    /** Resolves once no change is pending and every dispatched broadcast settled. */
    async settled(): Promise<void> {
        await this.debouncer.whenIdle();
        await Promise.all(Array.from(this.broadcasts));
    }

    async stop(): Promise<void> {
        this.debouncer.stop();
        const subscription = this.subscription;
        this.subscription = null;
        if (subscription) {
            await subscription.close();
        }
        await this.settled();
    }

    private async ensureRoot(): Promise<void> {
        let stat: fs.Stats;
        try {
            stat = await fs.promises.stat(this.root);
        } catch (error) {
            throw new WatchError(this.root, `failed to watch '${this.root}': ${toError(error).message}`);
        }
        if (!stat.isDirectory()) {
            throw new WatchError(this.root, `failed to watch '${this.root}': not a directory`);
        }
    }

    private async recompile(): Promise<void> {
        const result = await this.orchestrator.runOnce(this.input);
        if (result.kind === 'diagnostics') {
            this.writeDiagnostics(`${this.orchestrator.formatDiagnostics(result.errors)}\n\n`);
            return;
        }
        this.dispatch(result.pages);
    }

    private dispatch(pages: Pixmap[]): void {
        const pending: Promise<void> = this.hub.broadcast(pages)
            .then((report) => {
                if (report.delivered > 0 || report.pruned.length > 0) {
                    console.log(`[HUB] Sent ${pages.length} page(s) to ${report.delivered} viewer(s)`);
                }
            })
            .catch((error: unknown) => {
                console.error('[HUB] Broadcast failed:', error);
            })
            .finally(() => {
                this.broadcasts.delete(pending);
            });
        this.broadcasts.add(pending);
    }
}
