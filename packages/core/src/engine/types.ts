import type { FontBook } from '../fonts/book.js';
import type { LoadedFont } from '../fonts/searcher.js';
import type { FileResult } from '../world/errors.js';
import type { Source, SourceId } from '../world/source.js';

/** A range of UTF-16 offsets in one source. */
export interface Span {
    source: SourceId;
    start: number;
    end: number;
}

export interface TracePoint {
    message: string;
    span: Span;
}

/**
 * An error reported by an engine. `span` is absent when the error is not
 * tied to a source, e.g. when the root file itself cannot be read.
 */
export interface SourceDiagnostic {
    message: string;
    span?: Span;
    trace: TracePoint[];
}

/**
 * Everything an engine may read. Engines must not touch the filesystem
 * themselves: every file they see has to be served through this interface so
 * that it is cached and tracked as a dependency.
 */
export interface World {
    readonly root: string;
    main(): Source;
    resolve(filePath: string): Promise<FileResult<SourceId>>;
    source(id: SourceId): Source;
    book(): FontBook;
    font(index: number): Promise<LoadedFont | undefined>;
    file(filePath: string): Promise<FileResult<Uint8Array>>;
}

/** A rasterized page. */
export interface Pixmap {
    width: number;
    height: number;
    /** Premultiplied RGBA, row-major, `width * height * 4` bytes. */
    data: Uint8Array;
}

export interface Rgba {
    r: number;
    g: number;
    b: number;
    a: number;
}

export const WHITE: Rgba = { r: 255, g: 255, b: 255, a: 255 };

export type CompileOutcome<TFrame> =
    | { ok: true; pages: TFrame[] }
    | { ok: false; errors: SourceDiagnostic[] };

/**
 * The document compiler. `TFrame` is the engine's laid-out page; only the
 * engine itself knows how to rasterize one.
 */
export interface DocumentEngine<TFrame = unknown> {
    readonly name: string;
    compile(world: World): Promise<CompileOutcome<TFrame>>;
    render(frame: TFrame, scale: number, fill: Rgba): Pixmap;
    /** Drop memoized results that went unused for `maxAge` compilations. */
    evict(maxAge: number): void;
}
