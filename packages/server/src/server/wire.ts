import { z } from 'zod';
import type { Pixmap } from '@pagewatch/core';

export type WireFrame =
    | { kind: 'text'; data: string }
    | { kind: 'binary'; data: Uint8Array };

export const broadcastHeaderSchema = z.object({
    page_num: z.number().int().nonnegative(),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
});

export type BroadcastHeader = z.infer<typeof broadcastHeaderSchema>;

/**
 * Binary wire format: one JSON text frame with the page count and the size of
 * the first page, then one frame of premultiplied RGBA bytes per page.
 */
export function encodeBroadcast(pages: Pixmap[]): WireFrame[] {
    if (pages.length === 0) {
        return [];
    }

    const header: BroadcastHeader = {
        page_num: pages.length,
        width: pages[0].width,
        height: pages[0].height,
    };
    return [
        { kind: 'text', data: JSON.stringify(header) },
        ...pages.map((page): WireFrame => ({ kind: 'binary', data: page.data })),
    ];
}

function formatZodError(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'header'}: ${issue.message}`)
        .join('; ');
}

/** Viewer-side decoder for one broadcast. Throws on malformed input. */
export function decodeBroadcast(frames: WireFrame[]): Pixmap[] {
    const [first, ...rest] = frames;
    if (!first || first.kind !== 'text') {
        throw new Error('Broadcast must start with a text header frame');
    }

    let raw: unknown;
    try {
        raw = JSON.parse(first.data);
    } catch (error) {
        throw new Error(`Invalid broadcast header: ${error instanceof Error ? error.message : String(error)}`);
    }
    const parsed = broadcastHeaderSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`Invalid broadcast header: ${formatZodError(parsed.error)}`);
    }

    const { page_num: pageCount, width, height } = parsed.data;
    if (rest.length !== pageCount) {
        throw new Error(`Header announced ${pageCount} pages but ${rest.length} frames followed`);
    }

    const expectedLength = width * height * 4;
    return rest.map((frame, index) => {
        if (frame.kind !== 'binary') {
            throw new Error(`Page ${index + 1} is not a binary frame`);
        }
        if (frame.data.length !== expectedLength) {
            throw new Error(`Page ${index + 1} has ${frame.data.length} bytes, expected ${expectedLength}`);
        }
        return { width, height, data: frame.data };
    });
}
