import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Environment lookup: the process environment first, then `~/.pagewatch/.env`.
 */
export class EnvManager {
    private readonly envFilePath: string;
    private fileValues: Map<string, string> | null = null;

    constructor(envFilePath: string = path.join(os.homedir(), '.pagewatch', '.env')) {
        this.envFilePath = envFilePath;
    }

    get(name: string): string | undefined {
        const fromProcess = process.env[name];
        if (fromProcess !== undefined && fromProcess !== '') {
            return fromProcess;
        }
        return this.loadFile().get(name);
    }

    getEnvFilePath(): string {
        return this.envFilePath;
    }

    private loadFile(): Map<string, string> {
        if (this.fileValues) {
            return this.fileValues;
        }

        const values = new Map<string, string>();
        this.fileValues = values;

        let content: string;
        try {
            content = fs.readFileSync(this.envFilePath, 'utf-8');
        } catch {
            return values;
        }

        for (const rawLine of content.split(/\r?\n/)) {
            const line = rawLine.trim();
            if (!line || line.startsWith('#')) {
                continue;
            }
            const eq = line.indexOf('=');
            if (eq <= 0) {
                continue;
            }
            const key = line.slice(0, eq).trim();
            const value = line.slice(eq + 1).trim().replace(/^(['"])(.*)\1$/, '$2');
            values.set(key, value);
        }
        return values;
    }
}

export const envManager = new EnvManager();
