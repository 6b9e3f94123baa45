import * as path from 'node:path';
import { MEMO_EVICTION_MAX_AGE, RENDER_SCALE } from '../config/defaults.js';
import { WHITE, type DocumentEngine, type Pixmap, type Rgba, type SourceDiagnostic } from '../engine/types.js';
import { DependencyTracker, type FsEvent } from '../world/dependencies.js';
import type { SlotCacheStats } from '../world/slot-cache.js';
import type { PreviewWorld } from '../world/world.js';
import { formatDiagnostics } from './diagnostics.js';

export type RunResult =
    | { kind: 'rendered'; pages: Pixmap[] }
    | { kind: 'diagnostics'; errors: SourceDiagnostic[] };

export type CompileStatus = 'compiling' | 'success' | 'error';

export interface RecompileOrchestratorOptions {
    scale?: number;
    fill?: Rgba;
    evictionMaxAge?: number;
    /** `tracked` describes the cache after a finished run. */
    onStatus?: (input: string, status: CompileStatus, tracked?: SlotCacheStats) => void;
}

const STATUS_MESSAGES: Record<CompileStatus, string> = {
    compiling: 'compiling ...',
    success: 'compiled successfully',
    error: 'compiled with errors',
};

function logStatus(input: string, status: CompileStatus, tracked?: SlotCacheStats): void {
    const suffix = tracked ? ` (${tracked.slots} file(s) tracked)` : '';
    const line = `[COMPILE] ${input}: ${STATUS_MESSAGES[status]}${suffix}`;
    if (status === 'error') {
        console.warn(line);
    } else {
        console.log(line);
    }
}

/**
 * Owns the world's cache and runs one compilation at a time. Callers must
 * not start a run before the previous one settled: both would reset the
 * same cache.
 */
export class RecompileOrchestrator {
    public readonly dependencies: DependencyTracker;
    private readonly world: PreviewWorld;
    private readonly engine: DocumentEngine;
    private readonly scale: number;
    private readonly fill: Rgba;
    private readonly evictionMaxAge: number;
    private readonly onStatus: (input: string, status: CompileStatus, tracked?: SlotCacheStats) => void;

    constructor(world: PreviewWorld, engine: DocumentEngine, options: RecompileOrchestratorOptions = {}) {
        this.world = world;
        this.engine = engine;
        this.dependencies = new DependencyTracker(world.cache);
        this.scale = options.scale ?? RENDER_SCALE;
        this.fill = options.fill ?? WHITE;
        this.evictionMaxAge = options.evictionMaxAge ?? MEMO_EVICTION_MAX_AGE;
        this.onStatus = options.onStatus || logStatus;
    }

    public isRelevant(event: FsEvent): Promise<boolean> {
        return this.dependencies.isRelevant(event);
    }

    public async runOnce(input: string): Promise<RunResult> {
        const display = path.relative(process.cwd(), input) || input;
        this.onStatus(display, 'compiling');

        let result: RunResult;
        try {
            result = await this.compile(input);
        } finally {
            this.engine.evict(this.evictionMaxAge);
        }

        this.onStatus(display, result.kind === 'rendered' ? 'success' : 'error', this.world.cache.stats());
        return result;
    }

    /** Render diagnostics from the most recent run. */
    public formatDiagnostics(errors: SourceDiagnostic[]): string {
        return formatDiagnostics(errors, (id) => this.world.source(id), this.world.root);
    }

    private async compile(input: string): Promise<RunResult> {
        this.world.reset();

        const main = await this.world.resolve(input);
        if (!main.ok) {
            return { kind: 'diagnostics', errors: [{ message: main.error.message, trace: [] }] };
        }
        this.world.setMain(main.value);

        const outcome = await this.engine.compile(this.world);
        if (!outcome.ok) {
            return { kind: 'diagnostics', errors: outcome.errors };
        }

        return {
            kind: 'rendered',
            pages: outcome.pages.map((frame) => this.engine.render(frame, this.scale, this.fill)),
        };
    }
}
