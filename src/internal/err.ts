import { DriverError, ErrorKind } from '../types/err';

type Stringable = string | Error | { toString(): string };

const CODE_PATTERN = /^[A-Z][A-Z0-9_]*$/;

const FALLBACK_CODES: Record<ErrorKind, string> = {
    [ErrorKind.Client]: 'CLIENT_ERROR',
    [ErrorKind.Server]: 'SERVER_ERROR',
    [ErrorKind.Transport]: 'TRANSPORT_ERROR',
    [ErrorKind.Conversion]: 'CONVERSION_ERROR',
    [ErrorKind.Internal]: 'INTERNAL_ERROR',
};

/**
 * DrvError turns *anything* into a DriverError.
 *   DrvError('CURSOR_OPEN:drain the previous rows')  -> ErrorKind.Client
 *   DrvError(new Error('OUT_OF_RANGE:"300" int8'))   -> ErrorKind.Conversion
 *   DrvError(socketErr, ErrorKind.Transport)         -> forced bucket
 *   DrvError('something else')                       -> ErrorKind.Internal
 *
 * Existing DriverErrors (ServerError included) pass through untouched.
 */
export function DrvError(input: Stringable, kind?: ErrorKind): DriverError {
    if (input instanceof DriverError) return input;

    const str = input instanceof Error ? input.message : String(input);
    const sep = str.indexOf(':');
    const head = sep > 0 ? str.slice(0, sep) : '';
    const hasCode = CODE_PATTERN.test(head);
    const code = hasCode ? head : '';
    const msg = hasCode ? str.slice(sep + 1) : str;

    const bucket = kind ?? kindOf(code);
    return new DriverError(bucket, code || FALLBACK_CODES[bucket], msg);
}

function kindOf(code: string): ErrorKind {
    switch (code) {
        case 'CONFIG_ERROR':
        case 'CURSOR_OPEN':
        case 'CONN_CLOSED':
        case 'NO_ROW':
        case 'UNSUPPORTED_AUTH':
        case 'UNSUPPORTED_SERVER':
        case 'UNSUPPORTED_RESPONSE':
        case 'UNEXPECTED_RESULT_SET':
            return ErrorKind.Client;
        case 'INVALID_SYNTAX':
        case 'OUT_OF_RANGE':
            return ErrorKind.Conversion;
        case 'MALFORMED_PACKET':
        case 'PACKET_OUT_OF_ORDER':
        case 'STREAM_ENDED':
        case 'TIMEOUT':
            return ErrorKind.Transport;
        default:
            return ErrorKind.Internal;
    }
}
