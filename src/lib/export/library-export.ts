import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Library } from "@/lib/library/build-library";
import { calendarDate } from "@/lib/library/normalize";
import {
  countKeywords,
  toStorageRows,
  type KeywordRow,
  type StorageRow,
} from "@/lib/library/table";

type CsvValue = string | number | null;

function escapeCsv(value: CsvValue): string {
  if (value === null) {
    return "";
  }

  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(header: readonly string[], rows: readonly CsvValue[][]): string {
  return [header, ...rows].map((row) => row.map(escapeCsv).join(",")).join("\n") + "\n";
}

export function libraryCsv(rows: readonly StorageRow[]): string {
  return toCsv(
    [
      "name",
      "CreateDate",
      "FocalLength",
      "FNumber",
      "Camera",
      "Lens",
      "Flag",
      "CropFactor",
      "EqFocalLength",
      "Date",
      "Keywords",
    ],
    rows.map((row) => [
      row.name,
      row.CreateDate.toISOString(),
      row.FocalLength,
      row.FNumber,
      row.Camera,
      row.Lens,
      row.Flag,
      row.CropFactor,
      row.EqFocalLength,
      row.Date,
      row.Keywords.join("|"),
    ]),
  );
}

export function keywordsCsv(rows: readonly KeywordRow[]): string {
  return toCsv(
    ["name", "Camera", "Lens", "Keywords"],
    rows.map((row) => [row.name, row.camera, row.lens, row.keyword]),
  );
}

export function keywordCountsCsv(rows: readonly KeywordRow[]): string {
  return toCsv(
    ["Keyword", "Photos"],
    countKeywords(rows).map(({ keyword, photos }) => [keyword, photos]),
  );
}

export type ExportedFiles = {
  library: string;
  keywords: string;
  keywordCounts: string;
};

/**
 * Writes library.csv, keywords.csv and a dated keyword-count file into
 * `outDir`, creating it if needed.
 */
export async function writeLibraryExports(
  library: Pick<Library, "table" | "keywords">,
  outDir: string,
  today: Date = new Date(),
): Promise<ExportedFiles> {
  await mkdir(outDir, { recursive: true });

  const files: ExportedFiles = {
    library: path.join(outDir, "library.csv"),
    keywords: path.join(outDir, "keywords.csv"),
    keywordCounts: path.join(outDir, `keywords-${calendarDate(today)}.csv`),
  };

  await writeFile(files.library, libraryCsv(toStorageRows(library.table)), "utf8");
  await writeFile(files.keywords, keywordsCsv(library.keywords), "utf8");
  await writeFile(files.keywordCounts, keywordCountsCsv(library.keywords), "utf8");

  return files;
}
