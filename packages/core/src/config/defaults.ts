export const FONT_EXTENSIONS = new Set(['.ttf', '.otf', '.ttc', '.otc']);

/** Scale from points to pixels used when rasterizing pages for viewers. */
export const RENDER_SCALE = 2;

/** Compilations a memoized engine result may go unused before eviction. */
export const MEMO_EVICTION_MAX_AGE = 30;

export const DEFAULT_LISTEN_ADDRESS = '127.0.0.1:23625';

export const DEFAULT_DEBOUNCE_MS = 50;

export const DEFAULT_ENGINE = 'plain';

/**
 * Paths the watcher never subscribes to. Only version control metadata: any
 * other file under the root may be a dependency of the document.
 */
export const DEFAULT_WATCH_IGNORE_PATTERNS = [
    '.git/',
    '.svn/',
    '.hg/',
];
