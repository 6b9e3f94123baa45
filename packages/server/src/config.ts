import * as path from 'node:path';
import { z } from 'zod';
import {
    DEFAULT_DEBOUNCE_MS,
    DEFAULT_ENGINE,
    DEFAULT_LISTEN_ADDRESS,
    envManager,
} from '@pagewatch/core';

export interface EnvSource {
    get(name: string): string | undefined;
}

export interface PagewatchConfig {
    /** `host:port` the viewer server listens on. */
    host: string;
    /** Project root; derived from the input when absent. */
    root?: string;
    fontPaths: string[];
    debounceMs: number;
    writeTimeoutMs?: number;
    engine: string;
}

/** Values given on the command line. They win over the environment. */
export interface ConfigOverrides {
    host?: string;
    root?: string;
    fontPaths?: string[];
}

const positiveIntegerSchema = z.coerce.number().int().positive();

function readPositiveInteger(env: EnvSource, name: string, fallback: number): number;
function readPositiveInteger(env: EnvSource, name: string, fallback: undefined): number | undefined;
function readPositiveInteger(env: EnvSource, name: string, fallback: number | undefined): number | undefined {
    const raw = env.get(name);
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const parsed = positiveIntegerSchema.safeParse(raw.trim());
    if (!parsed.success) {
        console.warn(`[CONFIG] Invalid ${name} '${raw}', expected a positive integer. Using ${fallback === undefined ? 'no limit' : `default ${fallback}`}.`);
        return fallback;
    }
    return parsed.data;
}

function splitPathList(value: string | undefined): string[] {
    if (!value) {
        return [];
    }
    return value.split(path.delimiter).map((entry) => entry.trim()).filter((entry) => entry.length > 0);
}

export function createPagewatchConfig(overrides: ConfigOverrides = {}, env: EnvSource = envManager): PagewatchConfig {
    const envFontPaths = splitPathList(env.get('PAGEWATCH_FONT_PATHS'));

    return {
        host: overrides.host || env.get('PAGEWATCH_HOST') || DEFAULT_LISTEN_ADDRESS,
        root: overrides.root || env.get('PAGEWATCH_ROOT') || undefined,
        fontPaths: overrides.fontPaths && overrides.fontPaths.length > 0 ? overrides.fontPaths : envFontPaths,
        debounceMs: readPositiveInteger(env, 'PAGEWATCH_DEBOUNCE_MS', DEFAULT_DEBOUNCE_MS),
        writeTimeoutMs: readPositiveInteger(env, 'PAGEWATCH_WRITE_TIMEOUT_MS', undefined),
        engine: env.get('PAGEWATCH_ENGINE') || DEFAULT_ENGINE,
    };
}

export function logConfigurationSummary(config: PagewatchConfig, input: string, root: string): void {
    console.log(`[CONFIG] Configuration Summary:`);
    console.log(`[CONFIG]   Input: ${input}`);
    console.log(`[CONFIG]   Root: ${root}`);
    console.log(`[CONFIG]   Listen Address: ${config.host}`);
    console.log(`[CONFIG]   Engine: ${config.engine}`);
    console.log(`[CONFIG]   Debounce: ${config.debounceMs}ms`);
    console.log(`[CONFIG]   Write Timeout: ${config.writeTimeoutMs === undefined ? 'none' : `${config.writeTimeoutMs}ms`}`);
    console.log(`[CONFIG]   Extra Font Paths: ${config.fontPaths.length > 0 ? config.fontPaths.join(', ') : '[None]'}`);
}

export function buildHelpMessage(): string {
    return `
pagewatch: live preview server for documents

Usage:
  pagewatch [global options] watch <input>    Compile <input>, recompile on change and stream pages to viewers
  pagewatch [global options] fonts [--variants]
                                              List discovered font families
  pagewatch help                              Show this help message
  pagewatch version                           Show the version

Global options:
  --root <dir>            Project root (default: directory of <input>)
  --font-path <dir>       Additional font directory; may be repeated
  --host <host:port>      Viewer server address (default: ${DEFAULT_LISTEN_ADDRESS})

Environment Variables:
  PAGEWATCH_HOST              Viewer server address, overridden by --host
  PAGEWATCH_ROOT              Project root, overridden by --root
  PAGEWATCH_FONT_PATHS        Font directories separated by '${path.delimiter}', overridden by --font-path
  PAGEWATCH_DEBOUNCE_MS       Change debounce window in milliseconds (default: ${DEFAULT_DEBOUNCE_MS})
  PAGEWATCH_WRITE_TIMEOUT_MS  Per-frame write timeout for viewers in milliseconds (default: none)
  PAGEWATCH_ENGINE            Document engine: '${DEFAULT_ENGINE}' or a module specifier (default: ${DEFAULT_ENGINE})

Variables are also read from ${envManager.getEnvFilePath()}.

Examples:
  pagewatch watch notes/main.txt
  pagewatch --host 0.0.0.0:8080 --font-path ./fonts watch main.txt
  pagewatch fonts --variants
`;
}
