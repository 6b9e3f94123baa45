import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { DEFAULT_ENGINE } from '../config/defaults.js';
import { PlainEngine } from './plain-engine.js';
import type { DocumentEngine } from './types.js';

export function isDocumentEngine(value: unknown): value is DocumentEngine {
    if (!value || typeof value !== 'object') {
        return false;
    }
    return typeof Reflect.get(value, 'name') === 'string'
        && typeof Reflect.get(value, 'compile') === 'function'
        && typeof Reflect.get(value, 'render') === 'function'
        && typeof Reflect.get(value, 'evict') === 'function';
}

function toImportSpecifier(specifier: string, cwd: string): string {
    if (specifier.startsWith('.') || path.isAbsolute(specifier)) {
        return pathToFileURL(path.resolve(cwd, specifier)).href;
    }
    return specifier;
}

/**
 * Load a document engine. `plain` is built in; anything else is a module
 * whose default export is an engine or a function returning one.
 */
export async function loadEngine(specifier: string = DEFAULT_ENGINE, cwd: string = process.cwd()): Promise<DocumentEngine> {
    if (specifier === DEFAULT_ENGINE) {
        return new PlainEngine();
    }

    const loaded: unknown = await import(toImportSpecifier(specifier, cwd));
    const exported: unknown = loaded && typeof loaded === 'object' ? Reflect.get(loaded, 'default') : undefined;
    const candidate: unknown = typeof exported === 'function' ? await exported() : exported;

    if (!isDocumentEngine(candidate)) {
        throw new Error(`Module '${specifier}' does not export a document engine (expected name, compile, render and evict).`);
    }
    return candidate;
}
