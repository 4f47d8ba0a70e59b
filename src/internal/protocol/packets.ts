// src/internal/protocol/packets.ts
import { ServerError } from '../../types/err';
import type { ColumnDef, OkPacket } from '../../types/response';
import { DrvError } from '../err';
import { ensure, readLenencInt, readLenencString } from './helpers';
import { Capability, EOF_PACKET, ERR_PACKET, OK_PACKET } from './types';

export function parseOKPacket(payload: Buffer, capabilityFlags: number): OkPacket {
    ensure(payload, 0, 1);
    if (payload[0] !== OK_PACKET) {
        throw DrvError(`MALFORMED_PACKET:expected OK packet, got header 0x${payload[0].toString(16)}`);
    }

    const [affectedRows, afterRows] = readLenencInt(payload, 1);
    const [lastInsertId, afterId] = readLenencInt(payload, afterRows);
    let offset = afterId;

    let statusFlags = 0;
    let warnings = 0;
    if (capabilityFlags & Capability.PROTOCOL_41) {
        ensure(payload, offset, 4);
        statusFlags = payload.readUInt16LE(offset);
        warnings = payload.readUInt16LE(offset + 2);
        offset += 4;
    } else if (capabilityFlags & Capability.TRANSACTIONS) {
        ensure(payload, offset, 2);
        statusFlags = payload.readUInt16LE(offset);
        offset += 2;
    }

    return {
        affectedRows,
        lastInsertId,
        statusFlags,
        warnings,
        info: payload.toString('utf8', offset),
    };
}

// parseERRPacket returns (does not throw) the ServerError described by the packet.
export function parseERRPacket(payload: Buffer, capabilityFlags: number): ServerError {
    ensure(payload, 0, 3);
    if (payload[0] !== ERR_PACKET) {
        throw DrvError(`MALFORMED_PACKET:expected ERR packet, got header 0x${payload[0].toString(16)}`);
    }

    const errno = payload.readUInt16LE(1);
    let sqlState = 'HY000';
    let offset = 3;

    // the '#' marker is only present under PROTOCOL_41
    if ((capabilityFlags & Capability.PROTOCOL_41) && payload[3] === 0x23) {
        ensure(payload, 4, 5);
        sqlState = payload.toString('latin1', 4, 9);
        offset = 9;
    }

    return new ServerError(errno, sqlState, payload.toString('utf8', offset));
}

// EOF packets are shorter than 9 bytes; a row can begin with 0xFE only as an 8-byte length prefix.
export function isEOFPacket(payload: Buffer): boolean {
    return payload.length > 0 && payload.length < 9 && payload[0] === EOF_PACKET;
}

export function isERRPacket(payload: Buffer): boolean {
    return payload.length > 0 && payload[0] === ERR_PACKET;
}

export function parseEOFPacket(payload: Buffer): { warnings: number; statusFlags: number } {
    if (!isEOFPacket(payload)) {
        throw DrvError('MALFORMED_PACKET:expected EOF packet');
    }
    if (payload.length < 5) {
        return { warnings: 0, statusFlags: 0 };
    }
    return {
        warnings: payload.readUInt16LE(1),
        statusFlags: payload.readUInt16LE(3),
    };
}

export function parseColumnDef(payload: Buffer): ColumnDef {
    let offset = 0;
    const text: string[] = [];
    for (let i = 0; i < 6; i++) {
        const [value, next] = readLenencString(payload, offset);
        text.push(value);
        offset = next;
    }

    // length of the fixed-size block that follows, always 0x0c
    const [, fixedStart] = readLenencInt(payload, offset);
    ensure(payload, fixedStart, 10);

    const [catalog, schema, table, orgTable, name, orgName] = text;
    return {
        catalog,
        schema,
        table,
        orgTable,
        name,
        orgName,
        charset: payload.readUInt16LE(fixedStart),
        columnLength: payload.readUInt32LE(fixedStart + 2),
        columnType: payload[fixedStart + 6],
        flags: payload.readUInt16LE(fixedStart + 7),
        decimals: payload[fixedStart + 9],
    };
}
