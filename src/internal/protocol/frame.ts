import type { Readable } from 'stream';
import { ErrorKind } from '../../types/err';
import { DrvError } from '../err';
import { HEADER_SIZE, MAX_PAYLOAD_LEN } from './types';

// PrependHeader frames an already-serialised payload for the wire:
// | payloadLen(3, LE) | seq(1) | payload |
// Payloads of 0xFFFFFF bytes or more are split; a payload whose length is an
// exact multiple of 0xFFFFFF ends with an empty packet.
// Returns the frame bytes and the sequence id the next packet must carry.
export function prependHeader(seq: number, payload: Buffer): [Buffer, number] {
    const frames: Buffer[] = [];
    let offset = 0;
    let next = seq;

    for (;;) {
        const len = Math.min(MAX_PAYLOAD_LEN, payload.length - offset);
        const header = Buffer.alloc(HEADER_SIZE);
        header.writeUIntLE(len, 0, 3);
        header[3] = next;
        frames.push(header, payload.subarray(offset, offset + len));

        next = (next + 1) & 0xFF;
        offset += len;
        if (len < MAX_PAYLOAD_LEN) break;
    }

    return [Buffer.concat(frames), next];
}

// DrainPacket reads one logical packet, joining continuation packets.
// `seq` is the sequence id the first header must carry; the returned number is the next expected one.
export async function drainPacket(stream: Readable, seq: number): Promise<[Buffer, number]> {
    const parts: Buffer[] = [];
    let expected = seq;

    for (;;) {
        const header = Buffer.alloc(HEADER_SIZE);
        await readFull(stream, header);

        const len = header.readUIntLE(0, 3);
        const got = header[3];
        if (got !== expected) {
            throw DrvError(`PACKET_OUT_OF_ORDER:expected sequence id ${expected}, got ${got}`);
        }
        expected = (expected + 1) & 0xFF;

        const payload = Buffer.alloc(len);
        await readFull(stream, payload);
        parts.push(payload);

        if (len < MAX_PAYLOAD_LEN) break;
    }

    return [parts.length === 1 ? parts[0] : Buffer.concat(parts), expected];
}

// Helper function to read exact number of bytes from stream
export function readFull(stream: Readable, buffer: Buffer): Promise<void> {
    if (buffer.length === 0) {
        return Promise.resolve();
    }
    if (stream.destroyed || stream.readableEnded) {
        return Promise.reject(DrvError('STREAM_ENDED:connection is no longer readable'));
    }

    return new Promise((resolve, reject) => {
        let bytesRead = 0;

        const cleanup = () => {
            stream.removeListener('readable', readChunk);
            stream.removeListener('error', onError);
            stream.removeListener('end', onEnd);
            stream.removeListener('close', onEnd);
        };

        const readChunk = () => {
            let chunk = stream.read(buffer.length - bytesRead) as Buffer | null;
            while (chunk) {
                chunk.copy(buffer, bytesRead);
                bytesRead += chunk.length;

                if (bytesRead === buffer.length) {
                    cleanup();
                    resolve();
                    return;
                }
                // only reached once the stream has ended and handed back its tail
                chunk = stream.read(buffer.length - bytesRead) as Buffer | null;
            }
        };

        const onError = (error: Error) => {
            cleanup();
            reject(DrvError(error, ErrorKind.Transport));
        };

        const onEnd = () => {
            cleanup();
            reject(DrvError(`STREAM_ENDED:stream ended after ${bytesRead} of ${buffer.length} bytes`));
        };

        stream.on('readable', readChunk);
        stream.on('error', onError);
        stream.on('end', onEnd);
        stream.on('close', onEnd);

        // Trigger initial read
        readChunk();
    });
}
