import { describe, expect, it } from "vitest";

import { createConfig } from "@/lib/config";
import { EmptyLibraryError } from "@/lib/errors";
import type { SidecarRecord } from "@/lib/sidecar/parser";
import { createTestLogger, messages } from "@/test/fixtures";

import {
  correctFNumber,
  evaluateRational,
  formatFocalLength,
  normalizeRecords,
  parseCreateDate,
  parseFlag,
} from "@/lib/library/normalize";
import { createRunStats } from "@/lib/library/run";

const config = createConfig({ basePath: "/photos" });

function record(overrides: Partial<SidecarRecord> = {}): SidecarRecord {
  return {
    name: "P9220001.jpg",
    createDate: "2021-09-22T15:08:33",
    focalLength: "12/1",
    fNumber: "28/10",
    camera: "OLYMPUS E-M5 MARK III ",
    lens: "OLYMPUS M.12-40mm F2.8",
    flag: "0",
    keywords: ["landscape", "mountain"],
    ...overrides,
  };
}

describe("parseCreateDate", () => {
  it("reads ISO and EXIF layouts", () => {
    expect(parseCreateDate("2021-09-22T15:08:33")?.toISOString()).toBe(
      "2021-09-22T15:08:33.000Z",
    );
    expect(parseCreateDate("2021:09:22 15:08:33")?.toISOString()).toBe(
      "2021-09-22T15:08:33.000Z",
    );
    expect(parseCreateDate("2021-09-22")?.toISOString()).toBe(
      "2021-09-22T00:00:00.000Z",
    );
  });

  it("applies a zone offset", () => {
    expect(parseCreateDate("2021-09-22T15:08:33.50+02:00")?.toISOString()).toBe(
      "2021-09-22T13:08:33.500Z",
    );
  });

  it("rejects impossible dates", () => {
    expect(parseCreateDate("2021-02-30T10:00:00")).toBeNull();
    expect(parseCreateDate("2021-13-01")).toBeNull();
    expect(parseCreateDate("not a date")).toBeNull();
    expect(parseCreateDate("")).toBeNull();
  });
});

describe("numeric fields", () => {
  it("evaluates rationals", () => {
    expect(evaluateRational("28/5")).toBe(5.6);
    expect(evaluateRational("12")).toBe(12);
    expect(evaluateRational("1/0")).toBeNull();
    expect(evaluateRational("f/2.8")).toBeNull();
  });

  it("scales f-numbers stored a hundred times too large", () => {
    expect(correctFNumber(2.8)).toBe(2.8);
    expect(correctFNumber(280)).toBe(2.8);
    expect(correctFNumber(28000)).toBe(2.8);
  });

  it("parses integer flags only", () => {
    expect(parseFlag("2")).toBe(2);
    expect(parseFlag("1.5")).toBeNull();
  });

  it("formats equivalent focal lengths", () => {
    expect(formatFocalLength(24)).toBe("24mm");
    expect(formatFocalLength(37.5)).toBe("37.5mm");
  });
});

describe("normalizeRecords", () => {
  it("derives the library row", () => {
    const table = normalizeRecords([record()], config, {
      logger: createTestLogger(),
      stats: createRunStats(),
    });

    expect(table.rows).toEqual([
      {
        name: "P9220001.jpg",
        createDate: new Date("2021-09-22T15:08:33.000Z"),
        focalLength: 12,
        fNumber: 2.8,
        camera: "OLYMPUS E-M5 MARK III",
        lens: "OLYMPUS M.12-40mm F2.8",
        flag: 0,
        keywords: ["landscape", "mountain"],
        cropFactor: 2,
        equivalentFocalLength: "24mm",
        date: "2021-09-22",
      },
    ]);
  });

  it("uses a crop factor of 1 for unknown cameras", () => {
    const table = normalizeRecords([record({ camera: "X-T4" })], config, {
      logger: createTestLogger(),
      stats: createRunStats(),
    });

    expect(table.rows[0].cropFactor).toBe(1);
    expect(table.rows[0].equivalentFocalLength).toBe("12mm");
  });

  it("drops rows matching a drop filter", () => {
    const stats = createRunStats();
    const table = normalizeRecords(
      [record(), record({ name: "P9220002.jpg", flag: "2" })],
      config,
      { logger: createTestLogger(), stats },
    );

    expect(table.rows.map((row) => row.name)).toEqual(["P9220001.jpg"]);
    expect(stats.filtered).toBe(1);
  });

  it("logs and skips records with a bad creation date", () => {
    const logger = createTestLogger();
    const stats = createRunStats();

    const table = normalizeRecords(
      [record(), record({ name: "P9220003.jpg", createDate: "yesterday" })],
      config,
      { logger, stats },
    );

    expect(table.rows).toHaveLength(1);
    expect(stats.badDates).toBe(1);
    expect(messages(logger.error)).toEqual([
      "Sidecars with bad CreateDate found",
      '  P9220003.jpg: "yesterday"',
      "ignoring them",
    ]);
  });

  it("skips records with unreadable numbers", () => {
    const stats = createRunStats();

    const table = normalizeRecords([record(), record({ fNumber: "n/a" })], config, {
      logger: createTestLogger(),
      stats,
    });

    expect(table.rows).toHaveLength(1);
    expect(stats.invalidValues).toBe(1);
  });

  it("fails when no record has a usable date", () => {
    expect(() =>
      normalizeRecords([record({ createDate: "" })], config, {
        logger: createTestLogger(),
        stats: createRunStats(),
      }),
    ).toThrow(EmptyLibraryError);
  });

  it("returns an empty table for no records", () => {
    expect(
      normalizeRecords([], config, {
        logger: createTestLogger(),
        stats: createRunStats(),
      }).rows,
    ).toEqual([]);
  });
});
