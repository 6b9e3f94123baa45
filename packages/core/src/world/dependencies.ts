import { resolveIdentity } from './identity.js';
import type { SlotCache } from './slot-cache.js';

export type ModifyKind = 'any' | 'data' | 'metadata' | 'name' | 'other';

export type FsEventKind =
    | { type: 'any' }
    | { type: 'access' }
    | { type: 'create' }
    | { type: 'modify'; modify: ModifyKind }
    | { type: 'remove' }
    | { type: 'other' };

/** A raw filesystem notification; renames carry both the old and the new path. */
export interface FsEvent {
    kind: FsEventKind;
    paths: string[];
}

/**
 * Answers whether a filesystem change can affect the output of the last
 * compilation, from what that compilation looked up in the slot cache.
 */
export class DependencyTracker {
    private readonly cache: SlotCache;

    constructor(cache: SlotCache) {
        this.cache = cache;
    }

    public async touched(filePath: string): Promise<boolean> {
        if (this.cache.hasPath(filePath)) {
            return true;
        }
        const identity = await resolveIdentity(filePath);
        return identity.ok && this.cache.hasIdentity(identity.value);
    }

    public async isRelevant(event: FsEvent): Promise<boolean> {
        if (!mayAffectContent(event.kind)) {
            return false;
        }

        for (const eventPath of event.paths) {
            if (await this.touched(eventPath)) {
                return true;
            }
        }
        return false;
    }
}

function mayAffectContent(kind: FsEventKind): boolean {
    switch (kind.type) {
        case 'access':
        case 'other':
            return false;
        case 'modify':
            return kind.modify !== 'metadata' && kind.modify !== 'other';
        case 'any':
        case 'create':
        case 'remove':
            return true;
    }
}
