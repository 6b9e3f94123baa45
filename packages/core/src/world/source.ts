export type SourceId = number;

export interface LineColumn {
    /** 1-based */
    line: number;
    /** 1-based, in UTF-16 code units */
    column: number;
}

/**
 * A decoded source file. Offsets are UTF-16 code units into `text`.
 */
export class Source {
    public readonly id: SourceId;
    public readonly path: string;
    public readonly text: string;
    private readonly lineStarts: number[];

    constructor(id: SourceId, filePath: string, text: string) {
        this.id = id;
        this.path = filePath;
        this.text = text;
        this.lineStarts = [0];
        for (let i = 0; i < text.length; i += 1) {
            if (text.charCodeAt(i) === 10) {
                this.lineStarts.push(i + 1);
            }
        }
    }

    get lineCount(): number {
        return this.lineStarts.length;
    }

    lineColumn(offset: number): LineColumn {
        const clamped = Math.max(0, Math.min(offset, this.text.length));
        let low = 0;
        let high = this.lineStarts.length - 1;
        while (low < high) {
            const mid = (low + high + 1) >> 1;
            if (this.lineStarts[mid] <= clamped) {
                low = mid;
            } else {
                high = mid - 1;
            }
        }
        return { line: low + 1, column: clamped - this.lineStarts[low] + 1 };
    }

    lineText(line: number): string {
        if (line < 1 || line > this.lineStarts.length) {
            return '';
        }
        const start = this.lineStarts[line - 1];
        const end = line < this.lineStarts.length ? this.lineStarts[line] - 1 : this.text.length;
        return this.text.slice(start, end).replace(/\r$/, '');
    }
}
