import { createHash } from 'crypto';
import { DrvError } from '../err';
import { ensure, readNulString } from './helpers';
import { parseERRPacket } from './packets';
import {
    Capability,
    ERR_PACKET,
    Handshake,
    MAX_PACKET_SIZE,
    NATIVE_PASSWORD_PLUGIN,
    UTF8MB4_GENERAL_CI,
} from './types';

export type LoginParams = {
    user: string;
    password: string;
    database: string;
};

const SEED_LEN = 20;

// parseHandshake decodes Protocol::HandshakeV10. An ERR greeting (too many
// connections, host blocked) is thrown as the ServerError it carries.
export function parseHandshake(payload: Buffer): Handshake {
    ensure(payload, 0, 1);
    if (payload[0] === ERR_PACKET) {
        throw parseERRPacket(payload, Capability.PROTOCOL_41);
    }

    const protocolVersion = payload[0];
    if (protocolVersion !== 10) {
        throw DrvError(`UNSUPPORTED_SERVER:handshake protocol version ${protocolVersion}`);
    }

    const [serverVersion, afterVersion] = readNulString(payload, 1);
    let offset = afterVersion;

    ensure(payload, offset, 4 + 8 + 1 + 2);
    const connectionId = payload.readUInt32LE(offset);
    offset += 4;
    const seedPart1 = payload.subarray(offset, offset + 8);
    offset += 8 + 1; // + filler
    let capabilityFlags = payload.readUInt16LE(offset);
    offset += 2;

    let charset = 0;
    let statusFlags = 0;
    let seed = Buffer.from(seedPart1);
    let authPlugin = NATIVE_PASSWORD_PLUGIN;

    if (offset < payload.length) {
        ensure(payload, offset, 1 + 2 + 2 + 1 + 10);
        charset = payload[offset];
        statusFlags = payload.readUInt16LE(offset + 1);
        // upper half is added, not OR-ed, to keep bit 31 positive
        capabilityFlags += payload.readUInt16LE(offset + 3) * 0x10000;
        const authDataLen = payload[offset + 5];
        offset += 1 + 2 + 2 + 1 + 10;

        if (capabilityFlags & Capability.SECURE_CONNECTION) {
            const part2Len = Math.max(13, authDataLen - 8);
            ensure(payload, offset, part2Len);
            // part 2 is NUL-terminated; the seed is 20 bytes overall
            seed = Buffer.concat([seedPart1, payload.subarray(offset, offset + SEED_LEN - 8)]);
            offset += part2Len;
        }

        if ((capabilityFlags & Capability.PLUGIN_AUTH) && offset < payload.length) {
            [authPlugin] = readNulString(payload, offset);
        }
    }

    return {
        protocolVersion,
        serverVersion,
        connectionId,
        seed,
        capabilityFlags,
        charset,
        statusFlags,
        authPlugin,
    };
}

// clientFlags returns what we ask for, masked by what the server offers.
export function clientFlags(serverFlags: number, database: string): number {
    if (!(serverFlags & Capability.PROTOCOL_41)) {
        throw DrvError('UNSUPPORTED_SERVER:server does not speak protocol 4.1');
    }

    let flags = Capability.LONG_PASSWORD
        | Capability.LONG_FLAG
        | Capability.PROTOCOL_41
        | Capability.TRANSACTIONS
        | Capability.SECURE_CONNECTION
        | Capability.PLUGIN_AUTH;
    if (database) {
        flags |= Capability.CONNECT_WITH_DB;
    }
    return (flags & serverFlags) >>> 0;
}

/**
 * scrambleNativePassword computes the mysql_native_password auth response:
 * SHA1(password) XOR SHA1(seed + SHA1(SHA1(password))).
 * An empty password yields an empty response.
 */
export function scrambleNativePassword(password: string, seed: Buffer): Buffer {
    if (!password) {
        return Buffer.alloc(0);
    }

    const stage1 = sha1(Buffer.from(password, 'utf8'));
    const stage2 = sha1(stage1);
    const stage3 = sha1(Buffer.concat([seed, stage2]));

    for (let i = 0; i < stage3.length; i++) {
        stage3[i] ^= stage1[i];
    }
    return stage3;
}

function sha1(data: Buffer): Buffer {
    return createHash('sha1').update(data).digest();
}

// buildLoginPayload serialises Protocol::HandshakeResponse41.
export function buildLoginPayload(p: LoginParams, flags: number, seed: Buffer): Buffer {
    const user = Buffer.from(p.user, 'utf8');
    const auth = scrambleNativePassword(p.password, seed);
    const db = flags & Capability.CONNECT_WITH_DB ? Buffer.from(p.database, 'utf8') : null;
    const plugin = flags & Capability.PLUGIN_AUTH ? Buffer.from(NATIVE_PASSWORD_PLUGIN, 'latin1') : null;

    // Calculate total size to pre-allocate Buffer
    let totalSize = 4 + 4 + 1 + 23 + user.length + 1 + 1 + auth.length;
    if (db) totalSize += db.length + 1;
    if (plugin) totalSize += plugin.length + 1;

    const buf = Buffer.alloc(totalSize); // zero-filled: covers the 23-byte filler and NUL terminators
    let offset = 0;

    buf.writeUInt32LE(flags, offset);
    offset += 4;
    buf.writeUInt32LE(MAX_PACKET_SIZE, offset);
    offset += 4;
    buf[offset++] = UTF8MB4_GENERAL_CI;
    offset += 23;

    user.copy(buf, offset);
    offset += user.length + 1;

    buf[offset++] = auth.length;
    auth.copy(buf, offset);
    offset += auth.length;

    if (db) {
        db.copy(buf, offset);
        offset += db.length + 1;
    }
    if (plugin) {
        plugin.copy(buf, offset);
    }

    return buf;
}

// parseAuthSwitch decodes an AuthSwitchRequest (0xFE header) into [plugin, seed].
export function parseAuthSwitch(payload: Buffer): [string, Buffer] {
    const [plugin, offset] = readNulString(payload, 1);
    let end = payload.length;
    if (end > offset && payload[end - 1] === 0) {
        end--;
    }
    return [plugin, Buffer.from(payload.subarray(offset, end))];
}
