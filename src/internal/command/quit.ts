// src/internal/command/quit.ts
import { COM_QUIT } from '../protocol/types';

// COM_QUIT has no body and no reply; the server just closes the connection.
export function buildQuitPayload(): Buffer {
    return Buffer.from([COM_QUIT]);
}
