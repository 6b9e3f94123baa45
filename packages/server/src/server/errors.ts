/** A viewer send that failed or did not finish in time. Only that viewer is dropped. */
export class TransportError extends Error {
    public readonly sessionId: number;

    constructor(sessionId: number, message: string) {
        super(message);
        this.name = 'TransportError';
        this.sessionId = sessionId;
    }
}

/** The filesystem subscription could not be established or failed while starting. */
export class WatchError extends Error {
    public readonly root: string;

    constructor(root: string, message: string) {
        super(message);
        this.name = 'WatchError';
        this.root = root;
    }
}
