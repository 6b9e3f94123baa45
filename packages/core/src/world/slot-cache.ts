import * as fs from 'node:fs';
import * as path from 'node:path';
import { FileError, fail, fileErrorFromIo, ok, type FileResult } from './errors.js';
import { resolveIdentity, type FileIdentity } from './identity.js';
import { Lazy } from './lazy.js';
import { Source, type SourceId } from './source.js';

export type ReadFileFn = (filePath: string) => Promise<Uint8Array>;

export interface SlotCacheOptions {
    readFile?: ReadFileFn;
}

export interface SlotCacheStats {
    paths: number;
    slots: number;
    sources: number;
}

/** Canonical data for all paths pointing at the same file. */
interface Slot {
    source: Lazy<FileResult<SourceId>>;
    bytes: Lazy<FileResult<Uint8Array>>;
}

/**
 * Everything `reset()` throws away. Loads capture the generation they started
 * in, so a load still in flight across a reset never leaks into the next one.
 */
interface Generation {
    identities: Map<string, Promise<FileResult<FileIdentity>>>;
    slots: Map<FileIdentity, Slot>;
    sources: Source[];
}

export async function readFileBytes(filePath: string): Promise<Uint8Array> {
    const stat = await fs.promises.stat(filePath);
    if (stat.isDirectory()) {
        throw new FileError('is_directory', filePath);
    }
    return fs.promises.readFile(filePath);
}

function emptyGeneration(): Generation {
    return {
        identities: new Map(),
        slots: new Map(),
        sources: [],
    };
}

/**
 * Identity-keyed file cache for one compilation cycle.
 *
 * Source ids index into an append-only store that is cleared by `reset()`;
 * an id must never be used after the reset that follows the cycle it was
 * produced in.
 */
export class SlotCache {
    private generation: Generation = emptyGeneration();
    private readonly readFile: ReadFileFn;
    private readonly decoder = new TextDecoder('utf-8', { fatal: true });

    constructor(options: SlotCacheOptions = {}) {
        this.readFile = options.readFile || readFileBytes;
    }

    public async getOrLoadSource(filePath: string): Promise<FileResult<SourceId>> {
        const generation = this.generation;
        const slot = await this.slot(generation, filePath);
        if (!slot.ok) {
            return slot;
        }

        return slot.value.source.getOrInit(async () => {
            const bytes = await this.read(filePath);
            if (!bytes.ok) {
                return bytes;
            }

            let text: string;
            try {
                text = this.decoder.decode(bytes.value);
            } catch {
                return fail(new FileError('invalid_utf8', filePath));
            }
            return ok(this.insert(generation, filePath, text));
        });
    }

    public async getOrLoadBytes(filePath: string): Promise<FileResult<Uint8Array>> {
        const slot = await this.slot(this.generation, filePath);
        if (!slot.ok) {
            return slot;
        }
        return slot.value.bytes.getOrInit(() => this.read(filePath));
    }

    public sourceById(id: SourceId): Source {
        const source = this.generation.sources[id];
        if (!source) {
            throw new RangeError(`Unknown source id ${id} (store holds ${this.generation.sources.length} sources)`);
        }
        return source;
    }

    public reset(): void {
        this.generation = emptyGeneration();
    }

    /** Whether `filePath`, as given or canonical, was looked up since the last reset. */
    public hasPath(filePath: string): boolean {
        return this.generation.identities.has(path.normalize(filePath));
    }

    public hasIdentity(identity: FileIdentity): boolean {
        return this.generation.slots.has(identity);
    }

    public stats(): SlotCacheStats {
        return {
            paths: this.generation.identities.size,
            slots: this.generation.slots.size,
            sources: this.generation.sources.length,
        };
    }

    private async slot(generation: Generation, filePath: string): Promise<FileResult<Slot>> {
        const identity = await this.identity(generation, filePath);
        if (!identity.ok) {
            return identity;
        }

        let slot = generation.slots.get(identity.value);
        if (!slot) {
            slot = { source: new Lazy(), bytes: new Lazy() };
            generation.slots.set(identity.value, slot);
        }
        return ok(slot);
    }

    private identity(generation: Generation, filePath: string): Promise<FileResult<FileIdentity>> {
        const key = path.normalize(filePath);
        const known = generation.identities.get(key);
        if (known) {
            return known;
        }

        const pending = this.resolveAndIndex(generation, key);
        generation.identities.set(key, pending);
        return pending;
    }

    private async resolveAndIndex(generation: Generation, key: string): Promise<FileResult<FileIdentity>> {
        const identity = await resolveIdentity(key);

        // File events report canonical paths; index them next to the path as given.
        let canonical: string;
        try {
            canonical = path.normalize(await fs.promises.realpath(key));
        } catch {
            return identity;
        }
        if (!generation.identities.has(canonical)) {
            generation.identities.set(canonical, Promise.resolve(identity));
        }
        return identity;
    }

    private async read(filePath: string): Promise<FileResult<Uint8Array>> {
        try {
            return ok(await this.readFile(filePath));
        } catch (error) {
            return fail(error instanceof FileError ? error : fileErrorFromIo(error, filePath));
        }
    }

    private insert(generation: Generation, filePath: string, text: string): SourceId {
        const id = generation.sources.length;
        generation.sources.push(new Source(id, path.normalize(filePath), text));
        return id;
    }
}
