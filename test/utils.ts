import { Duplex } from 'stream';
import type { RowSource } from '../src/api/rows';
import { Config, ConfigBuilder } from '../src/conn/config';

// ─────────────────────────────────────────────────────────────────────────────
// Packet builders (server side of the wire)
// ─────────────────────────────────────────────────────────────────────────────
export const SERVER_CAPS = 0x010AA20F;
export const SEED = Buffer.from('abcdefghijklmnopqrst'); // 20 bytes

export function lenenc(n: number): Buffer {
    if (n < 0xFB) return Buffer.from([n]);
    if (n <= 0xFFFF) {
        const b = Buffer.alloc(3);
        b[0] = 0xFC;
        b.writeUInt16LE(n, 1);
        return b;
    }
    if (n <= 0xFFFFFF) {
        const b = Buffer.alloc(4);
        b[0] = 0xFD;
        b.writeUIntLE(n, 1, 3);
        return b;
    }
    const b = Buffer.alloc(9);
    b[0] = 0xFE;
    b.writeBigUInt64LE(BigInt(n), 1);
    return b;
}

export function lenencStr(s: string | Buffer): Buffer {
    const data = typeof s === 'string' ? Buffer.from(s, 'utf8') : s;
    return Buffer.concat([lenenc(data.length), data]);
}

// row encodes a text-protocol row; null becomes the 0xFB marker
export function row(values: Array<string | null>): Buffer {
    return Buffer.concat(values.map((v) => (v === null ? Buffer.from([0xFB]) : lenencStr(v))));
}

export function okPacket(opts: { affectedRows?: number; lastInsertId?: number; status?: number; warnings?: number; info?: string } = {}): Buffer {
    const tail = Buffer.alloc(4);
    tail.writeUInt16LE(opts.status ?? 0x0002, 0);
    tail.writeUInt16LE(opts.warnings ?? 0, 2);
    return Buffer.concat([
        Buffer.from([0x00]),
        lenenc(opts.affectedRows ?? 0),
        lenenc(opts.lastInsertId ?? 0),
        tail,
        Buffer.from(opts.info ?? '', 'utf8'),
    ]);
}

export function errPacket(errno: number, sqlState: string, message: string): Buffer {
    const head = Buffer.alloc(3);
    head[0] = 0xFF;
    head.writeUInt16LE(errno, 1);
    return Buffer.concat([head, Buffer.from(`#${sqlState}${message}`, 'utf8')]);
}

export function eofPacket(warnings = 0, status = 0x0002): Buffer {
    const b = Buffer.alloc(5);
    b[0] = 0xFE;
    b.writeUInt16LE(warnings, 1);
    b.writeUInt16LE(status, 3);
    return b;
}

export function columnDef(name: string, columnType = 0xFD, table = 'people'): Buffer {
    const fixed = Buffer.alloc(12);
    fixed.writeUInt16LE(45, 0);        // charset
    fixed.writeUInt32LE(255, 2);       // column length
    fixed[6] = columnType;
    fixed.writeUInt16LE(0x0001, 7);    // NOT_NULL
    fixed[9] = 0;                      // decimals
    return Buffer.concat([
        lenencStr('def'),
        lenencStr('shop'),
        lenencStr(table),
        lenencStr(table),
        lenencStr(name),
        lenencStr(name),
        lenenc(0x0C),
        fixed,
    ]);
}

// resultSet lays out a complete text-protocol result set
export function resultSet(names: string[], rows: Array<Array<string | null>>): Buffer[] {
    return [
        lenenc(names.length),
        ...names.map((n) => columnDef(n)),
        eofPacket(),
        ...rows.map(row),
        eofPacket(),
    ];
}

export function greeting(opts: { version?: string; connectionId?: number; seed?: Buffer; capabilities?: number; plugin?: string } = {}): Buffer {
    const seed = opts.seed ?? SEED;
    const caps = opts.capabilities ?? SERVER_CAPS;

    const fixed = Buffer.alloc(4 + 8 + 1 + 2 + 1 + 2 + 2 + 1 + 10);
    let o = 0;
    fixed.writeUInt32LE(opts.connectionId ?? 7, o); o += 4;
    seed.copy(fixed, o, 0, 8); o += 8;
    o += 1;                                       // filler
    fixed.writeUInt16LE(caps & 0xFFFF, o); o += 2;
    fixed[o++] = 45;                              // charset
    fixed.writeUInt16LE(0x0002, o); o += 2;       // status
    fixed.writeUInt16LE(Math.floor(caps / 0x10000) & 0xFFFF, o); o += 2;
    fixed[o++] = seed.length + 1;

    return Buffer.concat([
        Buffer.from([10]),
        Buffer.from(`${opts.version ?? '8.0.36-test'}\0`, 'latin1'),
        fixed,
        seed.subarray(8),
        Buffer.from([0]),
        Buffer.from(`${opts.plugin ?? 'mysql_native_password'}\0`, 'latin1'),
    ]);
}

export function authSwitch(plugin: string, seed: Buffer): Buffer {
    return Buffer.concat([Buffer.from([0xFE]), Buffer.from(`${plugin}\0`, 'latin1'), seed, Buffer.from([0])]);
}

export function frame(seq: number, payload: Buffer): Buffer {
    const head = Buffer.alloc(4);
    head.writeUIntLE(payload.length, 0, 3);
    head[3] = seq & 0xFF;
    return Buffer.concat([head, payload]);
}

export function splitFrames(chunk: Buffer): Array<{ seq: number; payload: Buffer }> {
    const out: Array<{ seq: number; payload: Buffer }> = [];
    let o = 0;
    while (o + 4 <= chunk.length) {
        const len = chunk.readUIntLE(o, 3);
        out.push({ seq: chunk[o + 3], payload: Buffer.from(chunk.subarray(o + 4, o + 4 + len)) });
        o += 4 + len;
    }
    return out;
}

// ─────────────────────────────────────────────────────────────────────────────
// In-process stand-ins
// ─────────────────────────────────────────────────────────────────────────────

/**
 * FakeSocket plays the server: it sends `greeting` on creation and answers
 * each packet the client writes with the next queued reply, numbering the
 * reply packets after the client's sequence id.
 */
export class FakeSocket extends Duplex {
    readonly packets: Buffer[] = [];
    private replies: Buffer[][] = [];

    constructor(greetingPayload: Buffer = greeting()) {
        super();
        this.push(frame(0, greetingPayload));
    }

    reply(...payloads: Buffer[]): this {
        this.replies.push(payloads);
        return this;
    }

    hangUp(): void {
        this.push(null);
    }

    _read(): void {
        // replies are pushed from _write
    }

    _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        for (const { seq, payload } of splitFrames(chunk)) {
            this.packets.push(payload);
            const answer = this.replies.shift() ?? [];
            answer.forEach((p, i) => this.push(frame(seq + 1 + i, p)));
        }
        callback();
    }
}

// ScriptedSource yields packets, null (end) or throws, one step per call.
export class ScriptedSource implements RowSource {
    calls = 0;
    private steps: Array<Buffer | null | Error>;

    constructor(steps: Array<Buffer | null | Error>) {
        this.steps = steps;
    }

    async nextRow(): Promise<Buffer | null> {
        this.calls++;
        const step = this.steps.shift();
        if (step instanceof Error) throw step;
        return step ?? null;
    }
}

export function testConfig(overrides: Partial<Config> = {}): Config {
    const cfg = ConfigBuilder.new()
        .withHost('127.0.0.1')
        .withUser('app')
        .withPassword('test-secret')
        .withDatabase('shop')
        .build();
    return { ...cfg, ...overrides };
}
