/**
 * Compute-or-fetch cell. The first `getOrInit` call runs its initializer; every
 * later call, including ones racing the first, receives the same promise.
 */
export class Lazy<T> {
    private pending: Promise<T> | undefined;

    getOrInit(init: () => Promise<T>): Promise<T> {
        if (!this.pending) {
            this.pending = init();
        }
        return this.pending;
    }

    get isInitialized(): boolean {
        return this.pending !== undefined;
    }
}
