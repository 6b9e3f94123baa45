import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as fontkit from 'fontkit';
import { z } from 'zod';
import { FONT_EXTENSIONS } from '../config/defaults.js';
import { Lazy } from '../world/lazy.js';
import { FontBook, type FontInfo, type FontStyle } from './book.js';

/** Where a font face lives, and the face itself once something asked for it. */
export interface FontSlot {
    path: string;
    index: number;
    font: Lazy<LoadedFont | undefined>;
}

export interface LoadedFont {
    info: FontInfo;
    index: number;
    data: Uint8Array;
}

export type FontParser = (data: Uint8Array) => FontInfo[];

export interface FontSearcherOptions {
    parse?: FontParser;
    readFile?: (filePath: string) => Promise<Uint8Array>;
}

const os2Schema = z.object({
    usWeightClass: z.number().int().min(1).max(1000),
    usWidthClass: z.number().int().min(1).max(9),
    fsSelection: z.object({
        italic: z.boolean().optional(),
        oblique: z.boolean().optional(),
    }).passthrough().optional(),
}).passthrough();

const STRETCH_BY_WIDTH_CLASS = [0.5, 0.625, 0.75, 0.875, 1, 1.125, 1.25, 1.5, 2];

type FontkitFace = Pick<fontkit.Font, 'familyName' | 'subfamilyName'>;

function faceInfo(face: FontkitFace): FontInfo {
    const os2 = os2Schema.safeParse(Reflect.get(face, 'OS/2'));
    const subfamily = (face.subfamilyName || '').toLowerCase();

    let style: FontStyle = 'normal';
    if ((os2.success && os2.data.fsSelection?.oblique === true) || /oblique|slanted/.test(subfamily)) {
        style = 'oblique';
    }
    if ((os2.success && os2.data.fsSelection?.italic === true) || subfamily.includes('italic')) {
        style = 'italic';
    }

    return {
        family: face.familyName.trim(),
        variant: {
            style,
            weight: os2.success ? Math.round(os2.data.usWeightClass / 100) * 100 || 100 : 400,
            stretch: os2.success ? STRETCH_BY_WIDTH_CLASS[os2.data.usWidthClass - 1] : 1,
        },
    };
}

/**
 * Read the faces of a font file or collection.
 */
export function parseFontInfos(data: Uint8Array): FontInfo[] {
    const parsed = fontkit.create(Buffer.from(data.buffer, data.byteOffset, data.byteLength));
    const faces: FontkitFace[] = 'fonts' in parsed ? parsed.fonts : [parsed];
    return faces.map(faceInfo);
}

export function systemFontDirectories(platform: NodeJS.Platform = process.platform): string[] {
    const home = os.homedir();
    switch (platform) {
        case 'darwin':
            return [
                '/Library/Fonts',
                '/Network/Library/Fonts',
                '/System/Library/Fonts',
                path.join(home, 'Library', 'Fonts'),
            ];
        case 'win32': {
            const windir = process.env.WINDIR || 'C:\\Windows';
            const dirs = [path.join(windir, 'Fonts')];
            if (process.env.APPDATA) {
                dirs.push(path.join(process.env.APPDATA, 'Microsoft', 'Windows', 'Fonts'));
            }
            if (process.env.LOCALAPPDATA) {
                dirs.push(path.join(process.env.LOCALAPPDATA, 'Microsoft', 'Windows', 'Fonts'));
            }
            return dirs;
        }
        default:
            return [
                '/usr/share/fonts',
                '/usr/local/share/fonts',
                path.join(process.env.XDG_DATA_HOME || path.join(home, '.local', 'share'), 'fonts'),
            ];
    }
}

export function isFontFile(filePath: string): boolean {
    return FONT_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * Searches for fonts and records one slot per face. Files that cannot be read
 * or parsed are skipped.
 */
export class FontSearcher {
    public readonly book = new FontBook();
    public readonly fonts: FontSlot[] = [];
    private readonly parse: FontParser;
    private readonly readFile: (filePath: string) => Promise<Uint8Array>;
    private readonly visitedDirs = new Set<string>();

    constructor(options: FontSearcherOptions = {}) {
        this.parse = options.parse || parseFontInfos;
        this.readFile = options.readFile || ((filePath) => fs.promises.readFile(filePath));
    }

    public async searchSystem(): Promise<void> {
        for (const dir of systemFontDirectories()) {
            await this.searchDir(dir);
        }
    }

    /** Walk `dir` recursively in file-name order, following symlinks. */
    public async searchDir(dir: string): Promise<void> {
        let entries: string[];
        try {
            const canonical = await fs.promises.realpath(dir);
            if (this.visitedDirs.has(canonical)) {
                return;
            }
            this.visitedDirs.add(canonical);
            entries = await fs.promises.readdir(dir);
        } catch {
            return;
        }

        for (const name of entries.sort()) {
            const entryPath = path.join(dir, name);
            let stat: fs.Stats;
            try {
                stat = await fs.promises.stat(entryPath);
            } catch {
                continue;
            }

            if (stat.isDirectory()) {
                await this.searchDir(entryPath);
            } else if (stat.isFile() && isFontFile(entryPath)) {
                await this.searchFile(entryPath);
            }
        }
    }

    public async searchFile(filePath: string): Promise<void> {
        let infos: FontInfo[];
        try {
            infos = this.parse(await this.readFile(filePath));
        } catch (error) {
            console.warn(`[FONTS] Skipping '${filePath}': ${error instanceof Error ? error.message : String(error)}`);
            return;
        }

        infos.forEach((info, index) => {
            this.book.push(info);
            this.fonts.push({ path: filePath, index, font: new Lazy() });
        });
    }
}
