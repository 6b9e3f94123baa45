import * as path from 'node:path';
import type { SourceDiagnostic, Span } from '../engine/types.js';
import type { Source, SourceId } from '../world/source.js';

export type SourceLookup = (id: SourceId) => Source;

export function displayPath(filePath: string, root?: string): string {
    if (!root) {
        return filePath;
    }
    const relative = path.relative(root, filePath);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
        return filePath;
    }
    return relative;
}

function renderLabel(source: Source, span: Span, root?: string): string[] {
    const { line, column } = source.lineColumn(span.start);
    const text = source.lineText(line);
    const pad = ' '.repeat(String(line).length);
    const underline = Math.max(1, Math.min(span.end - span.start, text.length - (column - 1)));

    return [
        `${pad}--> ${displayPath(source.path, root)}:${line}:${column}`,
        `${pad} |`,
        `${line} | ${text}`,
        `${pad} | ${' '.repeat(column - 1)}${'^'.repeat(underline)}`,
    ];
}

/**
 * Render diagnostics the way a terminal reader expects them: the error with
 * its location and source line, then one `help` entry per trace point.
 */
export function formatDiagnostics(errors: SourceDiagnostic[], lookup: SourceLookup, root?: string): string {
    const blocks: string[] = [];

    for (const error of errors) {
        const lines = [`error: ${error.message}`];
        if (error.span) {
            lines.push(...renderLabel(lookup(error.span.source), error.span, root));
        }
        blocks.push(lines.join('\n'));

        for (const point of error.trace) {
            blocks.push([`help: ${point.message}`, ...renderLabel(lookup(point.span.source), point.span, root)].join('\n'));
        }
    }

    return blocks.join('\n\n');
}
