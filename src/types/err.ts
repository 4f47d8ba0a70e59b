export enum ErrorKind {
    Client = 'CLIENT',
    Server = 'SERVER',
    Transport = 'TRANSPORT',
    Conversion = 'CONVERSION',
    Internal = 'INTERNAL',
}

export class DriverError extends Error {
    public readonly kind: ErrorKind;
    public readonly code: string;

    constructor(kind: ErrorKind, code: string, message: string) {
        super(`${code}:${message}`);
        this.name = 'DriverError';
        this.kind = kind;
        this.code = code;
        Object.setPrototypeOf(this, new.target.prototype); // instanceof works for subclasses too
    }
}

/**
 * ServerError carries an ERR packet sent by the server, either as the reply
 * to a command or in place of the next row of a result set.
 */
export class ServerError extends DriverError {
    public readonly errno: number;
    public readonly sqlState: string;
    public readonly serverMessage: string;

    constructor(errno: number, sqlState: string, serverMessage: string) {
        super(ErrorKind.Server, 'SERVER_ERROR', `${errno} (${sqlState}) ${serverMessage}`);
        this.name = 'ServerError';
        this.errno = errno;
        this.sqlState = sqlState;
        this.serverMessage = serverMessage;
    }
}

/* ---------- user-facing helpers ---------- */
export const IsClient = (e: unknown): e is DriverError => isKind(e, ErrorKind.Client);
export const IsServer = (e: unknown): e is ServerError => e instanceof ServerError;
export const IsTransport = (e: unknown): e is DriverError => isKind(e, ErrorKind.Transport);
export const IsConversion = (e: unknown): e is DriverError => isKind(e, ErrorKind.Conversion);
export const IsInternal = (e: unknown): e is DriverError => isKind(e, ErrorKind.Internal);

function isKind(err: unknown, want: ErrorKind): boolean {
    return err instanceof DriverError && err.kind === want;
}
