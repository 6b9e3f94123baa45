export type FileErrorKind =
    | 'not_found'
    | 'access_denied'
    | 'is_directory'
    | 'invalid_utf8'
    | 'other';

export class FileError extends Error {
    public readonly kind: FileErrorKind;
    public readonly path: string;

    constructor(kind: FileErrorKind, path: string, detail?: string) {
        super(describeFileError(kind, path, detail));
        this.name = 'FileError';
        this.kind = kind;
        this.path = path;
    }
}

export type FileResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: FileError };

export function ok<T>(value: T): FileResult<T> {
    return { ok: true, value };
}

export function fail<T>(error: FileError): FileResult<T> {
    return { ok: false, error };
}

function describeFileError(kind: FileErrorKind, filePath: string, detail?: string): string {
    switch (kind) {
        case 'not_found':
            return `file not found (searched at ${filePath})`;
        case 'access_denied':
            return 'failed to load file (access denied)';
        case 'is_directory':
            return 'failed to load file (is a directory)';
        case 'invalid_utf8':
            return 'file is not valid utf-8';
        case 'other':
            return detail ? `failed to load file (${detail})` : 'failed to load file';
    }
}

function errnoCode(error: unknown): string | undefined {
    if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Map an error thrown by `node:fs` onto the file error taxonomy.
 */
export function fileErrorFromIo(error: unknown, filePath: string): FileError {
    switch (errnoCode(error)) {
        case 'ENOENT':
        case 'ENOTDIR':
            return new FileError('not_found', filePath);
        case 'EACCES':
        case 'EPERM':
            return new FileError('access_denied', filePath);
        case 'EISDIR':
            return new FileError('is_directory', filePath);
        default:
            return new FileError('other', filePath, error instanceof Error ? error.message : String(error));
    }
}
