// src/internal/conn/handler.ts
import net from 'net';
import type { Duplex } from 'stream';
import { ErrorKind, ServerError } from '../../types/err';
import type { DriverError } from '../../types/err';
import { buildQuitPayload } from '../command/quit';
import { DrvError } from '../err';
import { drainPacket, prependHeader } from '../protocol/frame';
import { headerOf } from '../protocol/helpers';
import {
    buildLoginPayload,
    clientFlags,
    parseAuthSwitch,
    parseHandshake,
    scrambleNativePassword,
} from '../protocol/login';
import { parseERRPacket, parseOKPacket } from '../protocol/packets';
import {
    AUTH_MORE_DATA,
    EOF_PACKET,
    ERR_PACKET,
    Handshake,
    NATIVE_PASSWORD_PLUGIN,
    OK_PACKET,
} from '../protocol/types';

export interface HandlerConfig {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    timeout: number;     // ms, dial + handshake
    keepAlive: number;   // ms, 0 disables
    readTimeout: number; // ms per packet, 0 disables
}

/**
 * ConnHandler owns the transport of one connection: packet I/O, sequence
 * ids, and the fatal error that poisons it once the byte stream can no
 * longer be trusted. It has no notion of commands beyond login and quit.
 */
export class ConnHandler {
    private stream: Duplex;
    private config: HandlerConfig;
    private seq = 0;
    private fatal: DriverError | null = null;
    private closed = false;
    private handshake: Handshake | null = null;
    private flags = 0;

    constructor(stream: Duplex, config: HandlerConfig) {
        this.stream = stream;
        this.config = config;

        // an unhandled 'error' would crash the process
        this.stream.on('error', (err: Error) => {
            console.error('[mysql] socket error:', err.message);
            this.markBroken(err);
        });
    }

    static async dial(config: HandlerConfig): Promise<ConnHandler> {
        const socket = await new Promise<net.Socket>((resolve, reject) => {
            const socket = new net.Socket();
            const timer = setTimeout(() => {
                socket.destroy();
                reject(DrvError(`TIMEOUT:dial ${config.host}:${config.port} timed out`));
            }, config.timeout);

            const onError = (err: Error) => {
                clearTimeout(timer);
                reject(DrvError(err, ErrorKind.Transport));
            };

            socket.once('error', onError);
            socket.connect(config.port, config.host, () => {
                clearTimeout(timer);
                socket.removeListener('error', onError);
                if (config.keepAlive > 0) {
                    socket.setKeepAlive(true, config.keepAlive);
                }
                socket.setNoDelay(true);
                resolve(socket);
            });
        });

        const handler = new ConnHandler(socket, config);
        await handler.login();
        return handler;
    }

    get serverHandshake(): Handshake | null {
        return this.handshake;
    }

    get capabilityFlags(): number {
        return this.flags;
    }

    get usable(): boolean {
        return !this.closed && this.fatal === null;
    }

    // login runs the handshake; the stream is destroyed on any failure.
    async login(): Promise<void> {
        const timer = setTimeout(() => {
            this.stream.destroy(DrvError('TIMEOUT:handshake timed out'));
        }, this.config.timeout);

        try {
            const greeting = parseHandshake(await this.readPacket());
            this.handshake = greeting;
            this.flags = clientFlags(greeting.capabilityFlags, this.config.database);

            await this.writePacket(buildLoginPayload(this.config, this.flags, greeting.seed));
            let reply = await this.readPacket();

            if (headerOf(reply) === EOF_PACKET) {
                const [plugin, seed] = parseAuthSwitch(reply);
                if (plugin !== NATIVE_PASSWORD_PLUGIN) {
                    throw DrvError(`UNSUPPORTED_AUTH:server requested auth plugin "${plugin}"`);
                }
                await this.writePacket(scrambleNativePassword(this.config.password, seed));
                reply = await this.readPacket();
            }

            const head = headerOf(reply);
            switch (head) {
                case OK_PACKET:
                    parseOKPacket(reply, this.flags);
                    return;
                case ERR_PACKET:
                    throw parseERRPacket(reply, this.flags);
                case AUTH_MORE_DATA:
                    throw DrvError('UNSUPPORTED_AUTH:server requested extra auth data (caching_sha2_password?)');
                default:
                    throw DrvError(`MALFORMED_PACKET:unexpected login reply header ${head}`);
            }
        } catch (err) {
            const e = DrvError(err instanceof Error ? err : String(err));
            this.markBroken(e);
            this.stream.destroy();
            throw e;
        } finally {
            clearTimeout(timer);
        }
    }

    // sendCommand writes the first packet of a command; every command starts at sequence id 0.
    async sendCommand(payload: Buffer): Promise<void> {
        this.ensureUsable();
        this.seq = 0;
        await this.writePacket(payload);
    }

    async writePacket(payload: Buffer): Promise<void> {
        this.ensureUsable();
        const [frame, next] = prependHeader(this.seq, payload);
        this.seq = next;

        await new Promise<void>((resolve, reject) => {
            this.stream.write(frame, (err) => {
                if (err) {
                    reject(this.markBroken(err));
                    return;
                }
                resolve();
            });
        });
    }

    async readPacket(): Promise<Buffer> {
        this.ensureUsable();

        const timeout = this.config.readTimeout;
        const timer = timeout > 0
            ? setTimeout(() => this.stream.destroy(DrvError(`TIMEOUT:no packet within ${timeout}ms`)), timeout)
            : null;

        try {
            const [payload, next] = await drainPacket(this.stream, this.seq);
            this.seq = next;
            return payload;
        } catch (err) {
            throw this.markBroken(err instanceof Error ? err : String(err));
        } finally {
            if (timer) clearTimeout(timer);
        }
    }

    /**
     * markBroken records the first error after which the byte stream is out
     * of step with the server and returns the error as a DriverError.
     * ERR packets leave the stream in step, so a ServerError is returned as is.
     */
    markBroken(err: Error | string): DriverError {
        const e = DrvError(err, typeof err === 'string' ? undefined : ErrorKind.Transport);
        if (e instanceof ServerError) return e;
        if (this.fatal === null) {
            this.fatal = e;
        }
        return e;
    }

    async close(): Promise<void> {
        if (this.closed) return;

        if (this.usable) {
            try {
                await this.sendCommand(buildQuitPayload());
            } catch (err) {
                console.warn('[mysql] COM_QUIT failed:', err instanceof Error ? err.message : err);
            }
        }

        this.closed = true;
        this.stream.destroy();
    }

    private ensureUsable(): void {
        if (this.closed) {
            throw DrvError('CONN_CLOSED:connection is closed');
        }
        if (this.fatal) {
            throw this.fatal;
        }
    }
}
