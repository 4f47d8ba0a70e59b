import type { RowValue } from '../../types/response';
import { DrvError } from '../err';
import { LENENC_2, LENENC_3, LENENC_8, LENENC_NULL } from './types';

export const EMPTY = Buffer.alloc(0);

// headerOf returns the first byte of a payload, or -1 for an empty one.
export function headerOf(payload: Buffer): number {
    return payload.length > 0 ? payload[0] : -1;
}

// ensure throws MALFORMED_PACKET unless n bytes are available at offset
export function ensure(data: Buffer, offset: number, n: number): void {
    if (offset < 0 || offset + n > data.length) {
        throw DrvError(`MALFORMED_PACKET:need ${n} byte(s) at offset ${offset}, packet has ${data.length}`);
    }
}

// readLenencInt decodes a length-encoded integer, returning [value, nextOffset].
// 8-byte values above 2^53 lose precision.
export function readLenencInt(data: Buffer, offset: number): [number, number] {
    ensure(data, offset, 1);
    const first = data[offset];

    if (first < LENENC_NULL) {
        return [first, offset + 1];
    }

    switch (first) {
        case LENENC_2:
            ensure(data, offset + 1, 2);
            return [data.readUInt16LE(offset + 1), offset + 3];
        case LENENC_3:
            ensure(data, offset + 1, 3);
            return [data.readUIntLE(offset + 1, 3), offset + 4];
        case LENENC_8:
            ensure(data, offset + 1, 8);
            return [Number(data.readBigUInt64LE(offset + 1)), offset + 9];
        default:
            throw DrvError(`MALFORMED_PACKET:invalid length marker 0x${first.toString(16)} at offset ${offset}`);
    }
}

// readLenencBytes returns a view (no copy) of a length-prefixed byte string.
export function readLenencBytes(data: Buffer, offset: number): [Buffer, number] {
    const [len, start] = readLenencInt(data, offset);
    ensure(data, start, len);
    return [data.subarray(start, start + len), start + len];
}

export function readLenencString(data: Buffer, offset: number): [string, number] {
    const [bytes, next] = readLenencBytes(data, offset);
    return [bytes.toString('utf8'), next];
}

// readNulString reads up to the next 0x00, or to the end of the packet when there is none.
export function readNulString(data: Buffer, offset: number): [string, number] {
    ensure(data, offset, 0);
    const end = data.indexOf(0, offset);
    if (end === -1) {
        return [data.toString('utf8', offset), data.length];
    }
    return [data.toString('utf8', offset, end), end + 1];
}

/**
 * readRowValue decodes the column starting at `offset` of a text-protocol row.
 * A 0xFB marker is SQL NULL; anything else is a length-encoded string.
 * Pure: the packet is never modified and the returned value shares its memory.
 */
export function readRowValue(packet: Buffer, offset: number): RowValue {
    ensure(packet, offset, 1);
    if (packet[offset] === LENENC_NULL) {
        return { value: EMPTY, offset: offset + 1, isNull: true };
    }

    const [value, next] = readLenencBytes(packet, offset);
    return { value, offset: next, isNull: false };
}
