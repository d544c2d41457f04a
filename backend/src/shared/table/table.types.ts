export type CellValue = string | number | null;

export type TableRow = readonly CellValue[];

export type TableRecord = Record<string, CellValue>;
