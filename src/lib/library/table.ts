export type LibraryRow = {
  name: string;
  createDate: Date;
  focalLength: number;
  fNumber: number;
  camera: string;
  /** Empty until the facade fills in "No Lens". */
  lens: string;
  flag: number;
  keywords: string[];
  cropFactor: number;
  equivalentFocalLength: string;
  /** Calendar date of createDate (UTC), YYYY-MM-DD. */
  date: string;
};

export const LIBRARY_COLUMNS = [
  "name",
  "createDate",
  "focalLength",
  "fNumber",
  "camera",
  "lens",
  "flag",
  "keywords",
  "cropFactor",
  "equivalentFocalLength",
  "date",
] as const satisfies readonly (keyof LibraryRow)[];

export type LibraryTable = {
  columns: typeof LIBRARY_COLUMNS;
  rows: LibraryRow[];
};

export type KeywordRow = {
  name: string;
  camera: string;
  lens: string;
  keyword: string | null;
};

/** Row shape the analytical store loads. */
export type StorageRow = {
  name: string;
  CreateDate: Date;
  FocalLength: number;
  FNumber: number;
  Camera: string;
  Lens: string;
  Flag: number;
  CropFactor: number;
  EqFocalLength: string;
  Date: string;
  Keywords: string[];
};

export type KeywordCount = {
  keyword: string;
  photos: number;
};

export function createLibraryTable(rows: LibraryRow[] = []): LibraryTable {
  return { columns: LIBRARY_COLUMNS, rows };
}

/** One row per keyword; photos without keywords keep a single null row. */
export function explodeKeywords(rows: readonly LibraryRow[]): KeywordRow[] {
  return rows.flatMap<KeywordRow>(({ name, camera, lens, keywords }) =>
    keywords.length === 0
      ? [{ name, camera, lens, keyword: null }]
      : keywords.map((keyword) => ({ name, camera, lens, keyword })),
  );
}

/** Rows as both the CSV export and the Photos table store them. */
export function toStorageRows(table: LibraryTable): StorageRow[] {
  return table.rows.map((row) => ({
    name: row.name,
    CreateDate: row.createDate,
    FocalLength: row.focalLength,
    FNumber: row.fNumber,
    Camera: row.camera,
    Lens: row.lens,
    Flag: row.flag,
    CropFactor: row.cropFactor,
    EqFocalLength: row.equivalentFocalLength,
    Date: row.date,
    Keywords: [...row.keywords],
  }));
}

export function countKeywords(rows: readonly KeywordRow[]): KeywordCount[] {
  const counts = new Map<string, number>();

  for (const { keyword } of rows) {
    if (keyword !== null) {
      counts.set(keyword, (counts.get(keyword) ?? 0) + 1);
    }
  }

  return [...counts]
    .map(([keyword, photos]) => ({ keyword, photos }))
    .sort((a, b) => (a.keyword < b.keyword ? -1 : a.keyword > b.keyword ? 1 : 0));
}
