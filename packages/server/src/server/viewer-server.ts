import { WebSocketServer, WebSocket } from 'ws';
import type { AddressInfo } from 'node:net';
import type { BroadcastHub, ViewerTransport } from './broadcast-hub.js';
import type { WireFrame } from './wire.js';

export interface ListenAddress {
    host: string;
    port: number;
}

/** Parse `host:port`; the port is the part after the last colon. */
export function parseListenAddress(value: string): ListenAddress {
    const separator = value.lastIndexOf(':');
    const rawHost = separator === -1 ? '' : value.slice(0, separator);
    const rawPort = separator === -1 ? value : value.slice(separator + 1);
    const port = Number(rawPort);

    if (!rawHost || !/^\d+$/.test(rawPort) || port > 65535) {
        throw new Error(`Invalid listen address '${value}'. Expected <host>:<port>.`);
    }
    const host = rawHost.startsWith('[') && rawHost.endsWith(']') ? rawHost.slice(1, -1) : rawHost;
    return { host, port };
}

export class WsViewerTransport implements ViewerTransport {
    private readonly socket: WebSocket;

    constructor(socket: WebSocket) {
        this.socket = socket;
    }

    send(frame: WireFrame): Promise<void> {
        if (this.socket.readyState !== WebSocket.OPEN) {
            return Promise.reject(new Error('connection is closed'));
        }
        return new Promise((resolve, reject) => {
            this.socket.send(frame.data, { binary: frame.kind === 'binary' }, (error) => {
                if (error) {
                    reject(error);
                } else {
                    resolve();
                }
            });
        });
    }

    close(): void {
        if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
            this.socket.close(1001, 'Server shutting down');
        }
    }
}

/**
 * Accepts viewer connections and hands each one to the hub. A viewer leaves
 * the hub when its socket closes or when a broadcast to it fails.
 */
export class ViewerServer {
    private wss: WebSocketServer | null = null;
    private readonly hub: BroadcastHub;
    private readonly address: ListenAddress;

    constructor(hub: BroadcastHub, address: ListenAddress) {
        this.hub = hub;
        this.address = address;
    }

    start(): Promise<ListenAddress> {
        return new Promise((resolve, reject) => {
            const wss = new WebSocketServer({ host: this.address.host, port: this.address.port });
            this.wss = wss;

            wss.on('connection', (socket) => this.handleConnection(socket));
            wss.once('error', reject);
            wss.once('listening', () => {
                wss.off('error', reject);
                wss.on('error', (error) => {
                    console.error(`[SERVER] WebSocket server error: ${error.message}`);
                });
                const bound = this.boundAddress();
                console.log(`[SERVER] Listening on ws://${bound.host}:${bound.port}`);
                resolve(bound);
            });
        });
    }

    stop(): Promise<void> {
        const wss = this.wss;
        if (!wss) {
            return Promise.resolve();
        }
        this.wss = null;
        this.hub.closeAll();
        // A viewer with unsent data is not reading; it would never finish the close handshake.
        for (const client of wss.clients) {
            if (client.bufferedAmount > 0) {
                client.terminate();
            }
        }

        return new Promise((resolve, reject) => {
            wss.close((error) => {
                if (error) {
                    reject(error);
                } else {
                    resolve();
                }
            });
        });
    }

    private boundAddress(): ListenAddress {
        const info = this.wss?.address();
        if (info && typeof info === 'object') {
            const { address, port }: AddressInfo = info;
            return { host: address, port };
        }
        return this.address;
    }

    private handleConnection(socket: WebSocket): void {
        const session = this.hub.add(new WsViewerTransport(socket));
        socket.on('close', () => {
            this.hub.remove(session);
        });
        socket.on('error', (error) => {
            console.warn(`[SERVER] Viewer #${session.id} socket error: ${error.message}`);
        });
    }
}
