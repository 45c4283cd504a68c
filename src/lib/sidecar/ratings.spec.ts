import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError } from "@/lib/errors";
import {
  createTempDir,
  createTestLogger,
  removeTempDir,
  SCENARIO_FIELDS,
  SIDECAR_DIR,
  sidecarXml,
} from "@/test/fixtures";

import {
  findSidecarFile,
  setRatings,
  sidecarCandidates,
  updateRatingInXml,
  validateRating,
} from "@/lib/sidecar/ratings";

describe("validateRating", () => {
  it("accepts whole numbers from 0 to 5", () => {
    expect(validateRating(0)).toBe(0);
    expect(validateRating(5)).toBe(5);
  });

  it("rejects anything else", () => {
    expect(() => validateRating(6)).toThrow("Rating must be between 0 and 5 (got: 6)");
    expect(() => validateRating(2.5)).toThrow(ConfigError);
  });
});

describe("sidecarCandidates", () => {
  it("tries the full name, then the stem, then other JPEG casings", () => {
    expect(sidecarCandidates("P1.jpg", ["exposurex7", "exposurex6"])).toEqual([
      "P1.jpg.exposurex7",
      "P1.jpg.exposurex6",
      "P1.exposurex7",
      "P1.exposurex6",
      "P1.JPG.exposurex7",
      "P1.JPG.exposurex6",
    ]);
  });
});

describe("updateRatingInXml", () => {
  it("rewrites the rating and nothing else", () => {
    const xml = sidecarXml({ ...SCENARIO_FIELDS, rating: "1" });

    const result = updateRatingInXml(xml, 4);

    expect(result).toEqual({
      updated: true,
      previous: "1",
      xml: xml.replace('xmp:Rating="1"', 'xmp:Rating="4"'),
    });
  });

  it("reports sidecars without a rating", () => {
    expect(updateRatingInXml(sidecarXml(SCENARIO_FIELDS), 3)).toEqual({
      updated: false,
      reason: "No Rating attribute found",
    });
  });

  it("reports a rating that is already set", () => {
    expect(updateRatingInXml(sidecarXml({ ...SCENARIO_FIELDS, rating: "3" }), 3)).toEqual(
      { updated: false, reason: "No changes made to content" },
    );
  });
});

describe("setRatings", () => {
  let root: string;
  let sidecarDir: string;

  beforeEach(async () => {
    root = await createTempDir();
    sidecarDir = path.join(root, SIDECAR_DIR);
    await mkdir(sidecarDir, { recursive: true });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it("updates found sidecars and keeps a backup", async () => {
    const original = sidecarXml({ ...SCENARIO_FIELDS, rating: "0" });
    const sidecar = path.join(sidecarDir, "P1.JPG.exposurex7");
    await writeFile(sidecar, original);

    const summary = await setRatings(["P1.jpg", "P2.jpg"], root, 5, {
      logger: createTestLogger(),
    });

    expect(summary).toEqual({ updated: 1, skipped: 1, errors: 0, total: 2 });
    expect(await findSidecarFile("P1.jpg", sidecarDir, ["exposurex7"])).toBe(sidecar);
    expect(await readFile(sidecar, "utf8")).toContain('xmp:Rating="5"');
    expect(await readFile(path.join(sidecarDir, "backup", "P1.JPG.exposurex7"), "utf8")).toBe(
      original,
    );
  });

  it("requires the sidecar directory", async () => {
    await expect(
      setRatings(["P1.jpg"], path.join(root, "elsewhere"), 3, {
        logger: createTestLogger(),
      }),
    ).rejects.toThrow(ConfigError);
  });
});
