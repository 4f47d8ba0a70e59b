import type { Rows } from '../rows/rows';
import type { OkPacket } from '../types/response';

export interface ConnAPI {
    /**
     * Run a statement that returns rows. The returned cursor must be read to
     * its end (or drained) before the connection accepts another command.
     */
    query(sql: string): Promise<Rows>;

    /**
     * Run a statement without a result set (INSERT, UPDATE, DDL, SET ...)
     */
    exec(sql: string): Promise<OkPacket>;

    /**
     * Send COM_QUIT and release the socket
     */
    close(): Promise<void>;
}
