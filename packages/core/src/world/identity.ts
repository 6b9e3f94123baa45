import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import { fileErrorFromIo, ok, fail, type FileResult } from './errors.js';

/**
 * A token that is the same for every path naming the same file on disk,
 * whether reached through a symlink, a hardlink or another spelling.
 */
export type FileIdentity = string;

export function identityFromStat(dev: bigint, ino: bigint): FileIdentity {
    return crypto
        .createHash('sha256')
        .update(`${dev}:${ino}`)
        .digest('hex')
        .slice(0, 32);
}

export async function resolveIdentity(filePath: string): Promise<FileResult<FileIdentity>> {
    let stat: fs.BigIntStats;
    try {
        stat = await fs.promises.stat(filePath, { bigint: true });
    } catch (error) {
        return fail(fileErrorFromIo(error, filePath));
    }
    return ok(identityFromStat(stat.dev, stat.ino));
}
