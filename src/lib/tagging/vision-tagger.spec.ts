import { writeFile } from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createTempDir, removeTempDir } from "@/test/fixtures";

import {
  DEFAULT_VOCABULARY,
  parseVocabulary,
  tagPhoto,
  type LabelAnnotator,
} from "@/lib/tagging/vision-tagger";

describe("tagPhoto", () => {
  let dir: string;
  let imagePath: string;

  beforeEach(async () => {
    dir = await createTempDir();
    imagePath = path.join(dir, "P0000001.jpg");
    await writeFile(imagePath, "image bytes");
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("splits confident labels into vocabulary tags and the rest", async () => {
    const annotator: LabelAnnotator = {
      detectLabels: vi.fn(async () => [
        { description: "Mountain", score: 0.93 },
        { description: "Sky", score: 0.9 },
        { description: "Landscape", score: 0.61 },
        { description: "City", score: 0.2 },
        { description: "mountain", score: 0.7 },
      ]),
    };

    expect(await tagPhoto(imagePath, { annotator })).toEqual({
      tags: ["mountain", "landscape"],
      additionalTags: ["sky"],
    });
  });

  it("sends the image bytes to the annotator", async () => {
    const detectLabels = vi.fn(async (_image: Buffer) => []);

    await tagPhoto(imagePath, { annotator: { detectLabels }, minScore: 0.9 });

    expect(detectLabels.mock.calls[0][0].toString("utf8")).toBe("image bytes");
  });

  it("honours a custom vocabulary and threshold", async () => {
    const annotator: LabelAnnotator = {
      detectLabels: async () => [
        { description: "Night", score: 0.5 },
        { description: "Stars", score: 0.45 },
      ],
    };

    expect(
      await tagPhoto(imagePath, { annotator, vocabulary: ["stars"], minScore: 0.4 }),
    ).toEqual({ tags: ["stars"], additionalTags: ["night"] });
  });
});

describe("parseVocabulary", () => {
  it("falls back to the default vocabulary", () => {
    expect(parseVocabulary(undefined)).toEqual([...DEFAULT_VOCABULARY]);
  });

  it("normalizes a comma separated list", () => {
    expect(parseVocabulary(" Landscape, BIF,,landscape ")).toEqual(["landscape", "bif"]);
  });
});
