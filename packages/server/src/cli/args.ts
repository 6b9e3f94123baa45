import { CliError } from "./errors.js";

export interface GlobalOptions {
    root?: string;
    fontPaths: string[];
    host?: string;
}

export type ParsedCommand =
    | { kind: "help" }
    | { kind: "version" }
    | { kind: "watch"; input: string }
    | { kind: "fonts"; variants: boolean };

export interface ParsedCliInput {
    globals: GlobalOptions;
    command: ParsedCommand;
}

function requireValue(argv: string[], index: number, flag: string): string {
    const next = argv[index + 1];
    if (!next || next.startsWith("--")) {
        throw new CliError("E_USAGE", `Missing value for ${flag}.`, 2);
    }
    return next;
}

function parseGlobalOptions(argv: string[]): { globals: GlobalOptions; rest: string[] } {
    const globals: GlobalOptions = { fontPaths: [] };

    let i = 0;
    while (i < argv.length) {
        const token = argv[i];
        switch (token) {
            case "--root":
                globals.root = requireValue(argv, i, token);
                i += 2;
                break;
            case "--font-path":
                globals.fontPaths.push(requireValue(argv, i, token));
                i += 2;
                break;
            case "--host":
                globals.host = requireValue(argv, i, token);
                i += 2;
                break;
            default:
                if (token.startsWith("--") && token !== "--help" && token !== "--version") {
                    throw new CliError("E_USAGE", `Unknown option '${token}'.`, 2);
                }
                return { globals, rest: argv.slice(i) };
        }
    }

    return { globals, rest: [] };
}

/** Global options come before the command; everything after it belongs to the command. */
export function parseCliArgs(argv: string[]): ParsedCliInput {
    const { globals, rest } = parseGlobalOptions(argv);
    if (rest.length === 0 || rest[0] === "help" || rest.includes("--help") || rest.includes("-h")) {
        return { globals, command: { kind: "help" } };
    }

    if (rest[0] === "version" || rest.includes("--version") || rest.includes("-v")) {
        return { globals, command: { kind: "version" } };
    }

    if (rest[0] === "watch") {
        const input = rest[1];
        if (!input || input.startsWith("--")) {
            throw new CliError("E_USAGE", "Missing input file. Use: watch <input>", 2);
        }
        if (rest.length > 2) {
            throw new CliError("E_USAGE", `Unknown arguments for watch: ${rest.slice(2).join(" ")}`, 2);
        }
        return { globals, command: { kind: "watch", input } };
    }

    if (rest[0] === "fonts") {
        const unknown = rest.slice(1).filter((token) => token !== "--variants");
        if (unknown.length > 0) {
            throw new CliError("E_USAGE", `Unknown arguments for fonts: ${unknown.join(" ")}`, 2);
        }
        return { globals, command: { kind: "fonts", variants: rest.includes("--variants") } };
    }

    throw new CliError("E_USAGE", `Unsupported command '${rest[0]}'.`, 2);
}
