// src/internal/command/exec.ts
import type { OkPacket } from '../../types/response';
import { DrvError } from '../err';
import { headerOf } from '../protocol/helpers';
import { parseERRPacket, parseOKPacket } from '../protocol/packets';
import { ERR_PACKET, OK_PACKET } from '../protocol/types';
import { openResultSet, type PacketReader } from './query';

/**
 * readExecResp reads the single reply of a statement run through exec().
 * OK is returned, ERR is thrown as a ServerError. A statement that produced
 * rows is drained so the connection stays usable, then rejected.
 */
export async function readExecResp(reader: PacketReader): Promise<OkPacket> {
    const first = await reader.readPacket();

    switch (headerOf(first)) {
        case OK_PACKET:
            return parseOKPacket(first, reader.capabilityFlags);
        case ERR_PACKET:
            throw parseERRPacket(first, reader.capabilityFlags);
    }

    const rs = await openResultSet(reader, first);
    let skipped = 0;
    while ((await rs.nextRow()) !== null) {
        skipped++;
    }
    throw DrvError(`UNEXPECTED_RESULT_SET:statement returned ${rs.columns.length} column(s) and ${skipped} row(s), use query()`);
}
