import type { World } from '../engine/types.js';
import { FontBook } from '../fonts/book.js';
import type { FontSlot, LoadedFont } from '../fonts/searcher.js';
import type { FileResult } from './errors.js';
import { SlotCache } from './slot-cache.js';
import type { Source, SourceId } from './source.js';

export interface PreviewWorldOptions {
    root: string;
    cache?: SlotCache;
    book?: FontBook;
    fonts?: FontSlot[];
}

/**
 * A world backed by the local filesystem. Sources and files come from the
 * slot cache; fonts come from the slots found at startup.
 */
export class PreviewWorld implements World {
    public readonly root: string;
    public readonly cache: SlotCache;
    private readonly fontBook: FontBook;
    private readonly fontSlots: FontSlot[];
    private mainId: SourceId | undefined;

    constructor(options: PreviewWorldOptions) {
        this.root = options.root;
        this.cache = options.cache || new SlotCache();
        this.fontBook = options.book || new FontBook();
        this.fontSlots = options.fonts || [];
    }

    main(): Source {
        if (this.mainId === undefined) {
            throw new Error('No main source has been resolved for this compilation');
        }
        return this.cache.sourceById(this.mainId);
    }

    setMain(id: SourceId): void {
        this.mainId = id;
    }

    resolve(filePath: string): Promise<FileResult<SourceId>> {
        return this.cache.getOrLoadSource(filePath);
    }

    source(id: SourceId): Source {
        return this.cache.sourceById(id);
    }

    book(): FontBook {
        return this.fontBook;
    }

    async font(index: number): Promise<LoadedFont | undefined> {
        const slot = this.fontSlots[index];
        const info = this.fontBook.info(index);
        if (!slot || !info) {
            return undefined;
        }

        return slot.font.getOrInit(async () => {
            const data = await this.file(slot.path);
            if (!data.ok) {
                return undefined;
            }
            return { info, index: slot.index, data: data.value };
        });
    }

    file(filePath: string): Promise<FileResult<Uint8Array>> {
        return this.cache.getOrLoadBytes(filePath);
    }

    /** Start a fresh compilation: forget every cached file and the main source. */
    reset(): void {
        this.cache.reset();
        this.mainId = undefined;
    }
}
