import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import {
  CATALOG_FIELDS,
  REQUIRED_CATALOG_FIELDS,
  sortCatalog,
  type Catalog,
  type FileRecord,
} from "./catalog.js";
import { CatalogValidationError } from "./errors.js";

export interface CatalogStore {
  load(file: string): Promise<Catalog>;
  save(file: string, catalog: ReadonlyMap<string, FileRecord>): Promise<void>;
}

export function validateCatalogHeaders(
  headers: readonly string[] | undefined,
  required: readonly string[] = REQUIRED_CATALOG_FIELDS,
  filePath?: string,
): asserts headers is readonly string[] {
  if (!headers || headers.length === 0) {
    throw new CatalogValidationError("catalog is empty or has no header row", {
      filePath,
      missingColumns: required,
      actualColumns: [],
    });
  }
  const actual = new Set(headers);
  const missing = required.filter((col) => !actual.has(col));
  if (missing.length) {
    throw new CatalogValidationError("catalog is missing required columns", {
      filePath,
      missingColumns: missing,
      actualColumns: headers,
    });
  }
}

function toRows(parsed: unknown): string[][] {
  if (!Array.isArray(parsed)) return [];
  const rows: string[][] = [];
  for (const row of parsed) {
    if (Array.isArray(row)) {
      rows.push(row.map((cell) => (typeof cell === "string" ? cell : "")));
    }
  }
  return rows;
}

function rowToRecord(headers: readonly string[], row: string[]): FileRecord {
  const value = (field: string): string | undefined => {
    const idx = headers.indexOf(field);
    return idx >= 0 ? row[idx] : undefined;
  };
  return {
    id: value("id") ?? "",
    name: value("name") ?? "",
    size_bytes: value("size_bytes") || "0",
    duration_milliseconds: value("duration_milliseconds") ?? "",
    path: value("path") ?? "",
    link: value("link") ?? "",
    created_at: value("created_at") ?? "",
    mime_type: value("mime_type") ?? "",
  };
}

/**
 * Parse catalog CSV text. Extra columns are ignored, missing optional ones
 * come back empty, rows without an id are dropped.
 */
export function parseCatalogCsv(text: string, filePath?: string): Catalog {
  const rows = toRows(
    parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }),
  );
  const headers: string[] | undefined = rows[0];
  validateCatalogHeaders(headers, REQUIRED_CATALOG_FIELDS, filePath);
  const catalog: Catalog = new Map();
  for (const row of rows.slice(1)) {
    const record = rowToRecord(headers, row);
    if (record.id) {
      catalog.set(record.id, record);
    }
  }
  return catalog;
}

export function formatCatalogCsv(records: readonly FileRecord[]): string {
  return stringify([...records], {
    header: true,
    columns: [...CATALOG_FIELDS],
  });
}

export class CsvCatalogStore implements CatalogStore {
  constructor(private readonly opts: { sort?: boolean } = {}) {}

  async load(file: string): Promise<Catalog> {
    const text = await readFile(file, "utf8");
    return parseCatalogCsv(text, file);
  }

  async save(
    file: string,
    catalog: ReadonlyMap<string, FileRecord>,
  ): Promise<void> {
    const records = this.opts.sort
      ? sortCatalog(catalog)
      : Array.from(catalog.values());
    await mkdir(path.dirname(path.resolve(file)), { recursive: true });
    await writeFile(file, formatCatalogCsv(records), "utf8");
  }
}
