import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
    FontSearcher,
    PreviewWorld,
    RecompileOrchestrator,
    loadEngine,
} from "@pagewatch/core";
import { buildHelpMessage, createPagewatchConfig, logConfigurationSummary, type EnvSource } from "../config.js";
import { WatchSession, type WatchSubscriber } from "../core/watch.js";
import { BroadcastHub } from "../server/broadcast-hub.js";
import { parseListenAddress, ViewerServer, type ListenAddress } from "../server/viewer-server.js";
import { parseCliArgs, type GlobalOptions } from "./args.js";
import { asCliError, CliError } from "./errors.js";
import { emitError, formatFontList, type CliWriters } from "./format.js";

export interface RunCliOptions {
    writeStdout?: (text: string) => void;
    writeStderr?: (text: string) => void;
    env?: EnvSource;
    cwd?: string;
    /** Whether to walk the platform's font directories; `--font-path` entries are always searched. */
    searchSystemFonts?: boolean;
    createFontSearcher?: () => FontSearcher;
    subscribe?: WatchSubscriber;
    /** Resolves when the watch command should shut down. Defaults to SIGINT/SIGTERM. */
    waitForShutdown?: () => Promise<void>;
}

function readPackageVersion(): string {
    try {
        const currentFile = fileURLToPath(import.meta.url);
        const packagePath = path.resolve(path.dirname(currentFile), "..", "..", "package.json");
        const parsed: unknown = JSON.parse(fs.readFileSync(packagePath, "utf8"));
        const version = parsed && typeof parsed === "object" ? Reflect.get(parsed, "version") : undefined;
        return typeof version === "string" ? version : "unknown";
    } catch {
        return "unknown";
    }
}

function waitForSignal(): Promise<void> {
    return new Promise((resolve) => {
        const onSignal = (signal: NodeJS.Signals) => {
            process.off("SIGINT", onSignal);
            process.off("SIGTERM", onSignal);
            console.error(`[SERVER] Received ${signal}, shutting down gracefully...`);
            resolve();
        };
        process.on("SIGINT", onSignal);
        process.on("SIGTERM", onSignal);
    });
}

async function discoverFonts(fontPaths: string[], options: RunCliOptions, cwd: string): Promise<FontSearcher> {
    const searcher = options.createFontSearcher ? options.createFontSearcher() : new FontSearcher();
    if (options.searchSystemFonts !== false) {
        await searcher.searchSystem();
    }
    for (const dir of fontPaths) {
        await searcher.searchDir(path.resolve(cwd, dir));
    }
    console.log(`[FONTS] Found ${searcher.book.length} font faces`);
    return searcher;
}

/** The directory of the canonical input, or the working directory when it cannot be resolved. */
async function deriveRoot(input: string, cwd: string): Promise<string> {
    try {
        return path.dirname(await fs.promises.realpath(input));
    } catch {
        return cwd;
    }
}

async function runWatch(input: string, globals: GlobalOptions, options: RunCliOptions, writers: CliWriters, cwd: string): Promise<number> {
    const config = createPagewatchConfig(
        { host: globals.host, root: globals.root, fontPaths: globals.fontPaths },
        options.env
    );

    let address: ListenAddress;
    try {
        address = parseListenAddress(config.host);
    } catch (error) {
        throw new CliError("E_USAGE", error instanceof Error ? error.message : String(error), 2);
    }

    const inputPath = path.resolve(cwd, input);
    const root = config.root ? path.resolve(cwd, config.root) : await deriveRoot(inputPath, cwd);
    logConfigurationSummary(config, inputPath, root);

    const fonts = await discoverFonts(config.fontPaths, options, cwd);
    const engine = await loadEngine(config.engine, cwd);
    const world = new PreviewWorld({ root, book: fonts.book, fonts: fonts.fonts });
    const hub = new BroadcastHub({ writeTimeoutMs: config.writeTimeoutMs });
    const session = new WatchSession({
        input: inputPath,
        root,
        orchestrator: new RecompileOrchestrator(world, engine),
        hub,
        debounceMs: config.debounceMs,
        subscribe: options.subscribe,
        writeDiagnostics: writers.writeStderr,
    });
    const server = new ViewerServer(hub, address);

    try {
        await session.start();
        await server.start();
        await (options.waitForShutdown || waitForSignal)();
    } finally {
        await server.stop();
        await session.stop();
    }
    return 0;
}

async function runFonts(globals: GlobalOptions, variants: boolean, options: RunCliOptions, writers: CliWriters, cwd: string): Promise<number> {
    const config = createPagewatchConfig({ fontPaths: globals.fontPaths }, options.env);
    const fonts = await discoverFonts(config.fontPaths, options, cwd);
    writers.writeStdout(formatFontList(fonts.book, variants));
    return 0;
}

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
    const writers: CliWriters = {
        writeStdout: options.writeStdout || ((text: string) => process.stdout.write(text)),
        writeStderr: options.writeStderr || ((text: string) => process.stderr.write(text)),
    };
    const cwd = options.cwd || process.cwd();

    try {
        const { globals, command } = parseCliArgs(argv);
        if (command.kind === "help") {
            writers.writeStdout(buildHelpMessage());
            return 0;
        }
        if (command.kind === "version") {
            writers.writeStdout(`pagewatch ${readPackageVersion()}\n`);
            return 0;
        }
        if (command.kind === "fonts") {
            return await runFonts(globals, command.variants, options, writers, cwd);
        }
        return await runWatch(command.input, globals, options, writers, cwd);
    } catch (error) {
        const cliError = asCliError(error);
        emitError(writers, cliError.token, cliError.message);
        return cliError.exitCode;
    }
}
