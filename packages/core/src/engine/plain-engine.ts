import * as crypto from 'node:crypto';
import * as path from 'node:path';
import type { Source, SourceId } from '../world/source.js';
import type {
    CompileOutcome,
    DocumentEngine,
    Pixmap,
    Rgba,
    SourceDiagnostic,
    Span,
    TracePoint,
    World,
} from './types.js';

// A4 in points.
export const PAGE_WIDTH = 595;
export const PAGE_HEIGHT = 842;
export const PAGE_MARGIN = 56;
export const LINE_HEIGHT = 14;
const BAR_HEIGHT = 6;
const CHAR_WIDTH = 5.5;
const INK: Rgba = { r: 68, g: 68, b: 68, a: 255 };

export interface PlainLine {
    /** Top of the line box, in points. */
    y: number;
    /** Width of the greeked text bar, in points. */
    width: number;
}

export interface PlainFrame {
    width: number;
    height: number;
    lines: PlainLine[];
}

export type PlainNode =
    | { kind: 'text'; length: number }
    | { kind: 'blank' }
    | { kind: 'pagebreak' }
    | { kind: 'include'; target: string; start: number; end: number }
    | { kind: 'error'; message: string; start: number; end: number };

interface MemoEntry {
    nodes: PlainNode[];
    lastUsed: number;
}

const DIRECTIVE = /^#([A-Za-z][\w-]*)(?:\s+(.*))?$/;
const QUOTED_PATH = /^"([^"]+)"$/;

/**
 * Split a document into nodes, one per line. Lines starting with `#` are
 * directives: `#include "path"` and `#pagebreak`.
 */
export function parsePlain(text: string): PlainNode[] {
    const nodes: PlainNode[] = [];
    let offset = 0;

    for (const rawLine of text.split('\n')) {
        const line = rawLine.replace(/\r$/, '');
        const indent = line.length - line.trimStart().length;
        const trimmed = line.trim();
        const start = offset + indent;
        const end = start + trimmed.length;
        offset += rawLine.length + 1;

        if (!trimmed) {
            nodes.push({ kind: 'blank' });
            continue;
        }
        if (!trimmed.startsWith('#')) {
            nodes.push({ kind: 'text', length: trimmed.length });
            continue;
        }

        const match = DIRECTIVE.exec(trimmed);
        if (!match) {
            nodes.push({ kind: 'error', message: 'expected a directive name after `#`', start, end });
            continue;
        }

        const [, name, args] = match;
        switch (name) {
            case 'pagebreak':
                nodes.push(args
                    ? { kind: 'error', message: '`#pagebreak` takes no arguments', start, end }
                    : { kind: 'pagebreak' });
                break;
            case 'include': {
                const target = QUOTED_PATH.exec((args || '').trim());
                nodes.push(target
                    ? { kind: 'include', target: target[1], start, end }
                    : { kind: 'error', message: 'expected a quoted path after `#include`', start, end });
                break;
            }
            default:
                nodes.push({ kind: 'error', message: `unknown directive \`#${name}\``, start, end });
        }
    }

    // A trailing newline does not open another line.
    if (nodes.length > 1 && text.endsWith('\n') && nodes[nodes.length - 1].kind === 'blank') {
        nodes.pop();
    }
    return nodes;
}

class PageLayout {
    private readonly pages: PlainFrame[] = [];
    private lines: PlainLine[] = [];
    private y = PAGE_MARGIN;

    line(length: number): void {
        this.advance();
        this.lines.push({ y: this.y, width: Math.min(length * CHAR_WIDTH, PAGE_WIDTH - 2 * PAGE_MARGIN) });
        this.y += LINE_HEIGHT;
    }

    skip(): void {
        this.advance();
        this.y += LINE_HEIGHT;
    }

    pageBreak(): void {
        this.pages.push({ width: PAGE_WIDTH, height: PAGE_HEIGHT, lines: this.lines });
        this.lines = [];
        this.y = PAGE_MARGIN;
    }

    finish(): PlainFrame[] {
        this.pageBreak();
        return this.pages;
    }

    private advance(): void {
        if (this.y + LINE_HEIGHT > PAGE_HEIGHT - PAGE_MARGIN) {
            this.pageBreak();
        }
    }
}

function premultiply(color: Rgba): [number, number, number, number] {
    const alpha = color.a / 255;
    return [
        Math.round(color.r * alpha),
        Math.round(color.g * alpha),
        Math.round(color.b * alpha),
        color.a,
    ];
}

function fillRect(pixmap: Pixmap, x0: number, y0: number, x1: number, y1: number, color: Rgba): void {
    const [r, g, b, a] = premultiply(color);
    const left = Math.max(0, Math.round(x0));
    const right = Math.min(pixmap.width, Math.round(x1));
    const top = Math.max(0, Math.round(y0));
    const bottom = Math.min(pixmap.height, Math.round(y1));

    for (let y = top; y < bottom; y += 1) {
        for (let x = left; x < right; x += 1) {
            const i = (y * pixmap.width + x) * 4;
            pixmap.data[i] = r;
            pixmap.data[i + 1] = g;
            pixmap.data[i + 2] = b;
            pixmap.data[i + 3] = a;
        }
    }
}

/**
 * Built-in engine for line-based documents. It lays out each line of text as
 * a grey bar, which is enough to preview structure and page flow.
 */
export class PlainEngine implements DocumentEngine<PlainFrame> {
    public readonly name = 'plain';
    private readonly memo = new Map<string, MemoEntry>();
    private generation = 0;

    async compile(world: World): Promise<CompileOutcome<PlainFrame>> {
        this.generation += 1;
        const layout = new PageLayout();
        const errors: SourceDiagnostic[] = [];
        const main = world.main();

        await this.expand(world, main, [main.id], [], layout, errors);

        if (errors.length > 0) {
            return { ok: false, errors };
        }
        return { ok: true, pages: layout.finish() };
    }

    render(frame: PlainFrame, scale: number, fill: Rgba): Pixmap {
        const width = Math.max(1, Math.ceil(frame.width * scale));
        const height = Math.max(1, Math.ceil(frame.height * scale));
        const pixmap: Pixmap = { width, height, data: new Uint8Array(width * height * 4) };

        fillRect(pixmap, 0, 0, width, height, fill);
        for (const line of frame.lines) {
            const top = line.y + (LINE_HEIGHT - BAR_HEIGHT) / 2;
            fillRect(
                pixmap,
                PAGE_MARGIN * scale,
                top * scale,
                (PAGE_MARGIN + line.width) * scale,
                (top + BAR_HEIGHT) * scale,
                INK
            );
        }
        return pixmap;
    }

    evict(maxAge: number): void {
        for (const [key, entry] of this.memo) {
            if (this.generation - entry.lastUsed >= maxAge) {
                this.memo.delete(key);
            }
        }
    }

    get memoSize(): number {
        return this.memo.size;
    }

    private parse(source: Source): PlainNode[] {
        const key = crypto.createHash('sha256').update(source.text).digest('hex');
        let entry = this.memo.get(key);
        if (!entry) {
            entry = { nodes: parsePlain(source.text), lastUsed: this.generation };
            this.memo.set(key, entry);
        }
        entry.lastUsed = this.generation;
        return entry.nodes;
    }

    private async expand(
        world: World,
        source: Source,
        chain: SourceId[],
        trace: TracePoint[],
        layout: PageLayout,
        errors: SourceDiagnostic[]
    ): Promise<void> {
        for (const node of this.parse(source)) {
            switch (node.kind) {
                case 'text':
                    layout.line(node.length);
                    break;
                case 'blank':
                    layout.skip();
                    break;
                case 'pagebreak':
                    layout.pageBreak();
                    break;
                case 'error':
                    errors.push({
                        message: node.message,
                        span: { source: source.id, start: node.start, end: node.end },
                        trace,
                    });
                    break;
                case 'include': {
                    const span: Span = { source: source.id, start: node.start, end: node.end };
                    const resolved = await world.resolve(resolveIncludePath(world.root, source.path, node.target));
                    if (!resolved.ok) {
                        errors.push({ message: resolved.error.message, span, trace });
                        break;
                    }
                    if (chain.includes(resolved.value)) {
                        errors.push({ message: 'cyclic include', span, trace });
                        break;
                    }
                    await this.expand(
                        world,
                        world.source(resolved.value),
                        [...chain, resolved.value],
                        [{ message: 'error occurred in this include', span }, ...trace],
                        layout,
                        errors
                    );
                    break;
                }
            }
        }
    }
}

/** Absolute targets are relative to the project root, others to the including file. */
export function resolveIncludePath(root: string, includingPath: string, target: string): string {
    if (target.startsWith('/')) {
        return path.join(root, target);
    }
    return path.resolve(path.dirname(includingPath), target);
}
