/**
 * RowSource hands out the raw row packets of one result set, in server order.
 *
 * - resolves a packet: one more row is available
 * - resolves `null`: the result set ended cleanly
 * - rejects: the stream failed (transport error or an ERR packet in place of a row)
 *
 * Once it has resolved `null` or rejected it is not called again.
 */
export interface RowSource {
    nextRow(): Promise<Buffer | null>;
}
