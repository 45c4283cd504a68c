import { FILTERABLE_COLUMNS, type Config } from "@/lib/config";
import { EmptyLibraryError } from "@/lib/errors";
import type { SidecarRecord } from "@/lib/sidecar/parser";
import type { RunContext } from "@/lib/library/run";
import { createLibraryTable, type LibraryRow, type LibraryTable } from "@/lib/library/table";

// ISO 8601 ("2021-09-22T15:08:33", optional fraction and zone) or the EXIF
// layout "2021:09:22 15:08:33"; values without a zone are read as UTC
const DATE_PATTERN =
  /^(\d{4})([-:])(\d{2})\2(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const RATIONAL_PATTERN =
  /^\s*([+-]?\d+(?:\.\d+)?)\s*(?:\/\s*(\d+(?:\.\d+)?)\s*)?$/;

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function zoneOffsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === "Z") {
    return 0;
  }

  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2) || "0");

  return sign * (hours * 60 + minutes);
}

export function parseCreateDate(raw: string): Date | null {
  const match = DATE_PATTERN.exec(raw.trim());
  if (!match) {
    return null;
  }

  const [, y, , mo, d, h = "0", mi = "0", s = "0", fraction = "", zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return null;
  }

  const millis = Number(fraction.slice(0, 3).padEnd(3, "0"));
  const time =
    Date.UTC(year, month - 1, day, hour, minute, second, millis) -
    zoneOffsetMinutes(zone) * 60_000;

  return Number.isFinite(time) ? new Date(time) : null;
}

/** "28/5" -> 5.6; a bare number is its own value. */
export function evaluateRational(raw: string): number | null {
  const match = RATIONAL_PATTERN.exec(raw);
  if (!match) {
    return null;
  }

  const numerator = Number(match[1]);
  const denominator = match[2] === undefined ? 1 : Number(match[2]);

  if (denominator === 0) {
    return null;
  }

  return numerator / denominator;
}

/**
 * Some exports store the f-number a hundred times too large ("280" for
 * f/2.8). The >90 check-and-divide runs twice, so values above 9000 are
 * scaled down by 10000.
 */
export function correctFNumber(value: number): number {
  let corrected = value;

  for (let pass = 0; pass < 2; pass += 1) {
    if (corrected > 90) {
      corrected /= 100;
    }
  }

  return corrected;
}

export function parseFlag(raw: string): number | null {
  return INTEGER_PATTERN.test(raw) ? Number.parseInt(raw, 10) : null;
}

export function formatFocalLength(value: number): string {
  const rounded = Number.isInteger(value) ? value : Number(value.toFixed(1));
  return `${rounded}mm`;
}

export function calendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function applyDropFilters(
  rows: readonly LibraryRow[],
  filters: Config["dropFilters"],
): LibraryRow[] {
  const rules = FILTERABLE_COLUMNS.flatMap((column) => {
    const values = filters[column];
    return values && values.length > 0
      ? [{ column, excluded: new Set(values.map(String)) }]
      : [];
  });

  return rows.filter((row) =>
    rules.every(({ column, excluded }) => !excluded.has(String(row[column]))),
  );
}

/**
 * Turns parsed sidecar records into library rows: dates first (rows with
 * bad dates are dropped and logged), then the numeric fields, camera
 * clean-up, crop factor, derived columns and finally the drop-filters.
 *
 * Records that all fail date parsing raise `EmptyLibraryError`; no records
 * at all give an empty table.
 */
export function normalizeRecords(
  records: readonly SidecarRecord[],
  config: Pick<Config, "cropFactors" | "dropFilters">,
  { logger, stats }: Pick<RunContext, "logger" | "stats">,
): LibraryTable {
  if (records.length === 0) {
    return createLibraryTable();
  }

  const dated = records.map((record) => ({
    record,
    createDate: parseCreateDate(record.createDate),
  }));
  const badDates = dated.filter(({ createDate }) => createDate === null);

  if (badDates.length > 0) {
    stats.badDates += badDates.length;
    logger.error("Sidecars with bad CreateDate found");
    for (const { record } of badDates) {
      logger.error(`  ${record.name}: ${JSON.stringify(record.createDate)}`);
    }
    logger.error("ignoring them");
  }

  if (badDates.length === records.length) {
    throw new EmptyLibraryError(badDates.length);
  }

  const cropFactors = new Map(Object.entries(config.cropFactors));
  const rows: LibraryRow[] = [];

  for (const { record, createDate } of dated) {
    if (createDate === null) {
      continue;
    }

    const focalLength = evaluateRational(record.focalLength);
    const fNumber = evaluateRational(record.fNumber);
    const flag = parseFlag(record.flag);

    if (focalLength === null || fNumber === null || flag === null) {
      stats.invalidValues += 1;
      logger.error(
        `Ignoring ${record.name}: FocalLength=${record.focalLength} FNumber=${record.fNumber} Flag=${record.flag}`,
      );
      continue;
    }

    const camera = record.camera.trimEnd();
    const cropFactor = cropFactors.get(camera) ?? 1;

    rows.push({
      name: record.name,
      createDate,
      focalLength,
      fNumber: correctFNumber(fNumber),
      camera,
      lens: record.lens ?? "",
      flag,
      keywords: [...record.keywords],
      cropFactor,
      equivalentFocalLength: formatFocalLength(focalLength * cropFactor),
      date: calendarDate(createDate),
    });
  }

  const kept = applyDropFilters(rows, config.dropFilters);
  stats.filtered += rows.length - kept.length;

  return createLibraryTable(kept);
}
