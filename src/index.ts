export { Conn, Config, ConfigBuilder } from './conn';
export { Rows } from './rows/rows';
export type { ConnAPI } from './api/conn';
export type { RowSource } from './api/rows';
export type { OkPacket, ColumnDef, RowValue } from './types/response';
export {
    DriverError,
    ServerError,
    ErrorKind,
    IsClient,
    IsServer,
    IsTransport,
    IsConversion,
    IsInternal,
} from './types/err';
export { readRowValue } from './internal/protocol/helpers';
