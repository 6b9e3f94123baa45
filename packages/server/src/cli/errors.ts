import { WatchError } from "../server/errors.js";

export class CliError extends Error {
    public readonly token: string;
    public readonly exitCode: number;

    constructor(token: string, message: string, exitCode: number) {
        super(message);
        this.name = "CliError";
        this.token = token;
        this.exitCode = exitCode;
    }
}

export function asCliError(error: unknown): CliError {
    if (error instanceof CliError) {
        return error;
    }
    if (error instanceof WatchError) {
        return new CliError("E_WATCH", error.message, 1);
    }
    if (error instanceof Error) {
        return new CliError("E_RUNTIME", error.message, 1);
    }
    return new CliError("E_RUNTIME", String(error), 1);
}
