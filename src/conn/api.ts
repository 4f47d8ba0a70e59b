// src/conn/api.ts
import { Mutex } from 'async-mutex';
import type { Duplex } from 'stream';
import type { ConnAPI } from '../api/conn';
import { buildQueryPayload, readQueryResp } from '../internal/command/query';
import { readExecResp } from '../internal/command/exec';
import { ConnHandler, type HandlerConfig } from '../internal/conn/handler';
import { DrvError } from '../internal/err';
import { Rows } from '../rows/rows';
import { ErrorKind, IsServer } from '../types/err';
import type { DriverError } from '../types/err';
import type { OkPacket } from '../types/response';
import { validateConfig, type Config } from './config';

/**
 * Conn is a single MySQL connection speaking the text protocol.
 *
 * Commands are serialised: a query() or exec() started while another one is
 * still being dispatched waits for it. A cursor returned by query() keeps
 * the connection busy until it is drained; the next command rejects with
 * CURSOR_OPEN meanwhile, unless the config enables autoDrain.
 */
export class Conn implements ConnAPI {
    private handler: ConnHandler;
    private mu = new Mutex();
    private active: Rows | null = null;
    private autoDrain: boolean;

    private constructor(handler: ConnHandler, autoDrain: boolean) {
        this.handler = handler;
        this.autoDrain = autoDrain;
    }

    // create dials the server and logs in.
    static async create(cfg: Config): Promise<Conn> {
        const errors = validateConfig(cfg);
        if (errors.length > 0) {
            throw DrvError(`CONFIG_ERROR:${errors.join('; ')}`, ErrorKind.Client);
        }

        const handler = await ConnHandler.dial(handlerConfig(cfg));
        return new Conn(handler, cfg.autoDrain);
    }

    // fromStream logs in over an already-open transport (a socket, a tunnel, a test double).
    static async fromStream(stream: Duplex, cfg: Config): Promise<Conn> {
        const handler = new ConnHandler(stream, handlerConfig(cfg));
        await handler.login();
        return new Conn(handler, cfg.autoDrain);
    }

    get serverVersion(): string {
        return this.handler.serverHandshake?.serverVersion ?? '';
    }

    get connectionId(): number {
        return this.handler.serverHandshake?.connectionId ?? 0;
    }

    async query(sql: string): Promise<Rows> {
        return this.mu.runExclusive(async () => {
            await this.settleCursor();
            try {
                await this.handler.sendCommand(buildQueryPayload(sql));
                const rs = await readQueryResp(this.handler);
                const rows = new Rows(rs, rs.columns, rs.finished);
                this.active = rows;
                return rows;
            } catch (err) {
                throw this.fail(err);
            }
        });
    }

    async exec(sql: string): Promise<OkPacket> {
        return this.mu.runExclusive(async () => {
            await this.settleCursor();
            try {
                await this.handler.sendCommand(buildQueryPayload(sql));
                return await readExecResp(this.handler);
            } catch (err) {
                throw this.fail(err);
            }
        });
    }

    async close(): Promise<void> {
        await this.mu.runExclusive(() => this.handler.close());
    }

    // settleCursor frees the connection from the previous cursor, or refuses to.
    private async settleCursor(): Promise<void> {
        const rows = this.active;
        if (rows && !rows.drained) {
            if (!this.autoDrain) {
                throw DrvError('CURSOR_OPEN:previous result set has unread rows, read it to the end or call drain()');
            }
            await rows.drain();
        }
        this.active = null;
    }

    // ERR replies and a drained stray result set leave the stream in step; anything else breaks the connection.
    private fail(err: unknown): DriverError {
        const e = DrvError(err instanceof Error ? err : String(err));
        if (IsServer(e) || e.code === 'UNEXPECTED_RESULT_SET') {
            return e;
        }
        return this.handler.markBroken(e);
    }
}

function handlerConfig(cfg: Config): HandlerConfig {
    return {
        host: cfg.host,
        port: cfg.port,
        user: cfg.user,
        password: cfg.password,
        database: cfg.database,
        timeout: cfg.timeout,
        keepAlive: cfg.keepAlive,
        readTimeout: cfg.readTimeout,
    };
}
