export const MAX_PAYLOAD_LEN = 0xFFFFFF;
export const HEADER_SIZE = 4;

// first byte of a response payload
export const OK_PACKET = 0x00;
export const AUTH_MORE_DATA = 0x01;
export const LOCAL_INFILE = 0xFB;
export const EOF_PACKET = 0xFE;
export const ERR_PACKET = 0xFF;

// length-encoded integer markers
export const LENENC_NULL = 0xFB;
export const LENENC_2 = 0xFC;
export const LENENC_3 = 0xFD;
export const LENENC_8 = 0xFE;

export const COM_QUIT = 0x01;
export const COM_QUERY = 0x03;

export const UTF8MB4_GENERAL_CI = 45;
export const MAX_PACKET_SIZE = 0x01000000;

export const NATIVE_PASSWORD_PLUGIN = 'mysql_native_password';

export const Capability = {
    LONG_PASSWORD: 0x00000001,
    FOUND_ROWS: 0x00000002,
    LONG_FLAG: 0x00000004,
    CONNECT_WITH_DB: 0x00000008,
    PROTOCOL_41: 0x00000200,
    TRANSACTIONS: 0x00002000,
    SECURE_CONNECTION: 0x00008000,
    MULTI_RESULTS: 0x00020000,
    PLUGIN_AUTH: 0x00080000,
    DEPRECATE_EOF: 0x01000000,
} as const;

export type Handshake = {
    protocolVersion: number;
    serverVersion: string;
    connectionId: number;
    seed: Buffer;
    capabilityFlags: number;
    charset: number;
    statusFlags: number;
    authPlugin: string;
};
