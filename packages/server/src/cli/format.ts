import { formatVariant, type FontBook } from "@pagewatch/core";

export interface CliWriters {
    writeStdout: (text: string) => void;
    writeStderr: (text: string) => void;
}

export function emitError(writers: CliWriters, token: string, message: string): void {
    writers.writeStderr(`${token} ${message}\n`);
}

/** One family per line, each optionally followed by its variants. */
export function formatFontList(book: FontBook, variants: boolean): string {
    const lines: string[] = [];
    for (const [family, infos] of book.families()) {
        lines.push(family);
        if (variants) {
            for (const info of infos) {
                lines.push(`- ${formatVariant(info.variant)}`);
            }
        }
    }
    return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}
