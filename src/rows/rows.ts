// src/rows/rows.ts
import type { RowSource } from '../api/rows';
import { ErrorKind } from '../types/err';
import type { ColumnDef, RowValue } from '../types/response';
import { DrvError } from '../internal/err';
import { EMPTY, readRowValue } from '../internal/protocol/helpers';
import { toBool, toFloat, toInt, toSigned, toSignedBig } from './convert';

type RowState =
    | { kind: 'idle' }
    | { kind: 'active'; packet: Buffer; offset: number }
    | { kind: 'ended' }
    | { kind: 'failed'; error: Error };

/**
 * Rows is a forward-only cursor over the result set of a SELECT query.
 *
 * next() must be called before reading the first row and must keep being
 * called until it returns false: the connection carries one sequential
 * stream, and no other command can run while rows are left unread.
 *
 *     const rows = await conn.query('SELECT id, name FROM people');
 *     while (await rows.next()) {
 *         const id = rows.int();
 *         const [name, isNull] = rows.nullString();
 *     }
 *     const err = rows.lastError();
 *     if (err) throw err;
 *
 * Columns are read left to right, one per accessor call; there is no way
 * back within a row. Accessors never throw. A value that cannot be converted
 * is returned as the zero value and the error is kept for lastError();
 * only the first error is kept. Once an error is kept next() returns false,
 * so a loop that stops early must be followed by a lastError() check.
 */
export class Rows {
    private source: RowSource;
    private cols: readonly ColumnDef[];
    private state: RowState = { kind: 'idle' };
    private err: Error | null = null;

    // ended creates a cursor over a source that is known to have no rows left.
    constructor(source: RowSource, columns: readonly ColumnDef[] = [], ended = false) {
        this.source = source;
        this.cols = columns;
        if (ended) {
            this.state = { kind: 'ended' };
        }
    }

    // Next moves the cursor to the next unread row.
    // It returns false at the end of the result set, or once an error has been kept.
    async next(): Promise<boolean> {
        if (this.drained || this.err) {
            return false;
        }
        return this.advance();
    }

    /**
     * drain reads and discards every remaining row, even when an error has
     * been kept, so the connection can run the next command. A failure of
     * the stream itself is kept like any other error (first one wins).
     */
    async drain(): Promise<void> {
        while (!this.drained) {
            await this.advance();
        }
    }

    // true once the result set has been read to its end or the stream failed
    get drained(): boolean {
        return this.state.kind === 'ended' || this.state.kind === 'failed';
    }

    columns(): readonly ColumnDef[] {
        return this.cols;
    }

    // LastError returns the first error met while reading the result set.
    // Always call it after next() returns false.
    lastError(): Error | null {
        return this.err;
    }

    bytes(): Buffer {
        return this.nullBytes()[0];
    }

    // the returned buffer shares memory with the row packet
    nullBytes(): [Buffer, boolean] {
        const { value, isNull } = this.readColumn();
        return [value, isNull];
    }

    string(): string {
        return this.nullString()[0];
    }

    nullString(): [string, boolean] {
        const [data, isNull] = this.nullBytes();
        return [data.toString('utf8'), isNull];
    }

    int(): number {
        return this.nullInt()[0];
    }

    nullInt(): [number, boolean] {
        return this.nullParsed(0, toInt);
    }

    int8(): number {
        return this.nullInt8()[0];
    }

    nullInt8(): [number, boolean] {
        return this.nullParsed(0, (s) => toSigned(s, 8));
    }

    int16(): number {
        return this.nullInt16()[0];
    }

    nullInt16(): [number, boolean] {
        return this.nullParsed(0, (s) => toSigned(s, 16));
    }

    int32(): number {
        return this.nullInt32()[0];
    }

    nullInt32(): [number, boolean] {
        return this.nullParsed(0, (s) => toSigned(s, 32));
    }

    int64(): bigint {
        return this.nullInt64()[0];
    }

    nullInt64(): [bigint, boolean] {
        return this.nullParsed(0n, (s) => toSignedBig(s, 64));
    }

    float32(): number {
        return this.nullFloat32()[0];
    }

    nullFloat32(): [number, boolean] {
        return this.nullParsed(0, (s) => toFloat(s, 32));
    }

    float64(): number {
        return this.nullFloat64()[0];
    }

    nullFloat64(): [number, boolean] {
        return this.nullParsed(0, (s) => toFloat(s, 64));
    }

    bool(): boolean {
        return this.nullBool()[0];
    }

    nullBool(): [boolean, boolean] {
        return this.nullParsed(false, toBool);
    }

    private async advance(): Promise<boolean> {
        let packet: Buffer | null;
        try {
            packet = await this.source.nextRow();
        } catch (err) {
            const e = err instanceof Error ? err : DrvError(String(err), ErrorKind.Transport);
            this.state = { kind: 'failed', error: e };
            this.latch(e);
            return false;
        }

        if (packet === null) {
            this.state = { kind: 'ended' };
            return false;
        }

        this.state = { kind: 'active', packet, offset: 0 };
        return true;
    }

    private readColumn(): RowValue {
        const state = this.state;
        if (state.kind !== 'active') {
            this.latch(DrvError('NO_ROW:column read without a current row, call next() first'));
            return { value: EMPTY, offset: 0, isNull: false };
        }

        try {
            const column = readRowValue(state.packet, state.offset);
            state.offset = column.offset;
            return column;
        } catch (err) {
            this.latch(err instanceof Error ? err : DrvError(String(err)));
            return { value: EMPTY, offset: state.offset, isNull: false };
        }
    }

    private nullParsed<T>(zero: T, parse: (text: string) => T): [T, boolean] {
        const [text, isNull] = this.nullString();
        if (isNull) {
            return [zero, true];
        }

        try {
            return [parse(text), false];
        } catch (err) {
            this.latch(err instanceof Error ? err : DrvError(String(err), ErrorKind.Conversion));
            return [zero, false];
        }
    }

    // first error wins; later ones are dropped
    private latch(err: Error): void {
        if (this.err === null) {
            this.err = err;
        }
    }
}
