// src/internal/command/query.ts
import type { RowSource } from '../../api/rows';
import type { DriverError } from '../../types/err';
import type { ColumnDef } from '../../types/response';
import { DrvError } from '../err';
import { headerOf, readLenencInt } from '../protocol/helpers';
import {
    isEOFPacket,
    isERRPacket,
    parseColumnDef,
    parseEOFPacket,
    parseERRPacket,
    parseOKPacket,
} from '../protocol/packets';
import { COM_QUERY, ERR_PACKET, LOCAL_INFILE, OK_PACKET } from '../protocol/types';

// PacketReader is the slice of the connection handler a result set needs.
export interface PacketReader {
    readonly capabilityFlags: number;
    readPacket(): Promise<Buffer>;
    markBroken(err: Error | string): DriverError;
}

export function buildQueryPayload(sql: string): Buffer {
    const text = Buffer.from(sql, 'utf8');
    const buf = Buffer.alloc(1 + text.length);
    buf[0] = COM_QUERY;
    text.copy(buf, 1);
    return buf;
}

/**
 * ResultSet is the row source of a COM_QUERY response. The header (column
 * count, definitions, EOF) has already been consumed when it is created;
 * nextRow reads exactly one packet per call until the closing EOF or ERR.
 */
export class ResultSet implements RowSource {
    readonly columns: readonly ColumnDef[];
    private reader: PacketReader;
    private done: boolean;

    constructor(reader: PacketReader, columns: ColumnDef[], done = false) {
        this.reader = reader;
        this.columns = columns;
        this.done = done;
    }

    // true once the closing EOF or ERR has been read, or for an OK response
    get finished(): boolean {
        return this.done;
    }

    async nextRow(): Promise<Buffer | null> {
        if (this.done) return null;

        let packet: Buffer;
        try {
            packet = await this.reader.readPacket();
        } catch (err) {
            this.done = true;
            throw err;
        }

        if (isEOFPacket(packet)) {
            this.done = true;
            return null;
        }
        if (isERRPacket(packet)) {
            this.done = true;
            throw this.errPacket(packet);
        }
        return packet;
    }

    // a malformed ERR packet leaves the stream in an unknown place
    private errPacket(packet: Buffer): DriverError {
        try {
            return parseERRPacket(packet, this.reader.capabilityFlags);
        } catch (err) {
            return this.reader.markBroken(err instanceof Error ? err : String(err));
        }
    }
}

/**
 * openResultSet interprets the first packet of a COM_QUERY response.
 *   OK            -> a finished, column-less result set
 *   ERR           -> throws the ServerError
 *   LOCAL INFILE  -> unsupported
 *   column count  -> reads the column definitions and the EOF that follows
 */
export async function openResultSet(reader: PacketReader, first: Buffer): Promise<ResultSet> {
    switch (headerOf(first)) {
        case OK_PACKET:
            parseOKPacket(first, reader.capabilityFlags);
            return new ResultSet(reader, [], true);
        case ERR_PACKET:
            throw parseERRPacket(first, reader.capabilityFlags);
        case LOCAL_INFILE:
            throw DrvError('UNSUPPORTED_RESPONSE:LOCAL INFILE requests are not supported');
    }

    const [count, end] = readLenencInt(first, 0);
    if (end !== first.length || count === 0) {
        throw DrvError(`MALFORMED_PACKET:bad column count packet (${first.length} bytes)`);
    }

    const columns: ColumnDef[] = [];
    for (let i = 0; i < count; i++) {
        columns.push(parseColumnDef(await reader.readPacket()));
    }
    parseEOFPacket(await reader.readPacket());

    return new ResultSet(reader, columns);
}

export async function readQueryResp(reader: PacketReader): Promise<ResultSet> {
    return openResultSet(reader, await reader.readPacket());
}
