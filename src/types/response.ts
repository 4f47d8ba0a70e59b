// OkPacket is the acknowledgment returned by exec() for statements without a result set.
export type OkPacket = {
    affectedRows: number;
    lastInsertId: number;
    statusFlags: number;
    warnings: number;
    info: string;
};

// ColumnDef describes one column of a result set (Protocol::ColumnDefinition41).
export type ColumnDef = {
    catalog: string;
    schema: string;
    table: string;
    orgTable: string;
    name: string;
    orgName: string;
    charset: number;
    columnLength: number;
    columnType: number;
    flags: number;
    decimals: number;
};

// RowValue is what the value decoder hands back for one column of a text row.
export type RowValue = {
    value: Buffer;
    offset: number;
    isNull: boolean;
};
