export type FontStyle = 'normal' | 'italic' | 'oblique';

export interface FontVariant {
    style: FontStyle;
    /** 100 (thin) to 900 (black) */
    weight: number;
    /** Width relative to normal, 0.5 to 2 */
    stretch: number;
}

export interface FontInfo {
    family: string;
    variant: FontVariant;
}

/**
 * Metadata for every known font face, indexed the same way as the font slots
 * a world serves them from.
 */
export class FontBook {
    private readonly infos: FontInfo[] = [];

    push(info: FontInfo): number {
        this.infos.push(info);
        return this.infos.length - 1;
    }

    info(index: number): FontInfo | undefined {
        return this.infos[index];
    }

    get length(): number {
        return this.infos.length;
    }

    /** Families sorted case-insensitively, each with its faces in discovery order. */
    families(): Array<[string, FontInfo[]]> {
        const byKey = new Map<string, { name: string; infos: FontInfo[] }>();
        for (const info of this.infos) {
            const key = info.family.toLowerCase();
            const entry = byKey.get(key);
            if (entry) {
                entry.infos.push(info);
            } else {
                byKey.set(key, { name: info.family, infos: [info] });
            }
        }

        return Array.from(byKey.entries())
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([, entry]) => [entry.name, entry.infos]);
    }

    /**
     * Index of the face of `family` closest to `variant`: style first, then
     * stretch, then weight.
     */
    select(family: string, variant: FontVariant): number | undefined {
        const key = family.toLowerCase();
        let best: { index: number; score: [number, number, number] } | undefined;

        for (let index = 0; index < this.infos.length; index += 1) {
            const info = this.infos[index];
            if (info.family.toLowerCase() !== key) {
                continue;
            }
            const score: [number, number, number] = [
                info.variant.style === variant.style ? 0 : 1,
                Math.abs(info.variant.stretch - variant.stretch),
                Math.abs(info.variant.weight - variant.weight),
            ];
            if (!best || compareScores(score, best.score) < 0) {
                best = { index, score };
            }
        }

        return best?.index;
    }
}

function compareScores(a: [number, number, number], b: [number, number, number]): number {
    for (let i = 0; i < a.length; i += 1) {
        if (a[i] !== b[i]) {
            return a[i] - b[i];
        }
    }
    return 0;
}

export function formatVariant(variant: FontVariant): string {
    return `Style: ${variant.style}, Weight: ${variant.weight}, Stretch: ${Math.round(variant.stretch * 1000) / 10}%`;
}
