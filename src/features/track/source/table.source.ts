// src/features/track/source/table.source.ts
import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { TextDecoder } from "node:util";
import Papa from "papaparse";
import * as XLSX from "xlsx";
import { ConfigError, UnsupportedFormat } from "../track.errors";
import type { ColumnRef, RawValue } from "../track.types";

export const DEFAULT_ENCODING = "utf-8";

export const TABLE_FILE_TYPES = ["csv", "xlsx", "xls"] as const;

export type TableFileType = (typeof TABLE_FILE_TYPES)[number];

export type TableData = {
    headers: string[];
    rows: RawValue[][];
};

export type ReadTableOptions = {
    /** Text encoding for CSV files (e.g. "utf-8", "gbk"). Spreadsheets ignore it. */
    encoding?: string;
};

export function detectFileType(path: string): TableFileType {
    const ext = extname(path).slice(1).toLowerCase();
    const known = TABLE_FILE_TYPES.find((t) => t === ext);
    if (!known) throw new UnsupportedFormat(path, ext || "(none)");
    return known;
}

/**
 * Read a whole table: first row is the header, the rest are data rows.
 * Every data row is padded/truncated to the header width.
 */
export function readTable(path: string, options: ReadTableOptions = {}): TableData {
    const type = detectFileType(path);
    const grid = type === "csv" ? readCsvGrid(path, options.encoding ?? DEFAULT_ENCODING) : readSheetGrid(path);

    if (grid.length === 0) return { headers: [], rows: [] };

    const headers = grid[0].map((h) => (h === null ? "" : String(h).trim()));
    const width = headers.length;
    const rows = grid.slice(1).map((row) => {
        const out: RawValue[] = row.slice(0, width);
        while (out.length < width) out.push(null);
        return out;
    });

    return { headers, rows };
}

export function readHeaders(path: string, options: ReadTableOptions = {}): string[] {
    return readTable(path, options).headers;
}

/**
 * Column position for a reference, or -1 when the file has no such column.
 * Numeric strings that are not header names are read as indices.
 */
export function resolveColumn(headers: readonly string[], ref: ColumnRef): number {
    if (typeof ref === "number") {
        return Number.isInteger(ref) && ref >= 0 && ref < headers.length ? ref : -1;
    }
    const byName = headers.indexOf(ref);
    if (byName >= 0) return byName;
    if (/^\d+$/.test(ref)) return resolveColumn(headers, Number(ref));
    return -1;
}

/** All cells of one column, or null when the column does not exist. */
export function readColumn(table: TableData, ref: ColumnRef): RawValue[] | null {
    const col = resolveColumn(table.headers, ref);
    if (col < 0) return null;
    return table.rows.map((row) => row[col]);
}

export function decodeText(bytes: Uint8Array, encoding: string): string {
    let decoder: TextDecoder;
    try {
        decoder = new TextDecoder(encoding);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigError(`Unknown text encoding "${encoding}": ${reason}`);
    }
    return decoder.decode(bytes);
}

function readCsvGrid(path: string, encoding: string): RawValue[][] {
    const text = decodeText(readFileSync(path), encoding);
    const parsed = Papa.parse<string[]>(text, { skipEmptyLines: true });

    if (parsed.errors.length > 0) {
        const first = parsed.errors[0];
        console.warn(`${path}: ${parsed.errors.length} CSV issue(s), first at row ${first.row ?? "?"}: ${first.message}`);
    }

    return parsed.data.map((row) => row.map((cell) => (cell.trim() === "" ? null : cell)));
}

function readSheetGrid(path: string): RawValue[][] {
    const workbook = XLSX.read(readFileSync(path), { type: "buffer", cellDates: true });
    const sheetName = workbook.SheetNames[0];
    if (sheetName === undefined) return [];

    const sheet = workbook.Sheets[sheetName];
    const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        raw: true,
        defval: null,
        blankrows: false,
    });

    return grid.map((row) => row.map(toRawValue));
}

function toRawValue(cell: unknown): RawValue {
    if (
        cell === null ||
        typeof cell === "string" ||
        typeof cell === "number" ||
        typeof cell === "boolean" ||
        cell instanceof Date
    ) {
        return cell;
    }
    return cell === undefined ? null : String(cell);
}
