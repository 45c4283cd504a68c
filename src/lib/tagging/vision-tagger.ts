import { readFile } from "node:fs/promises";

import vision from "@google-cloud/vision";

import { normalizeKeyword } from "@/lib/values";

export type DetectedLabel = {
  description: string;
  score: number;
};

export interface LabelAnnotator {
  detectLabels(image: Buffer): Promise<DetectedLabel[]>;
}

export type PhotoTags = {
  /** Labels in the vocabulary. */
  tags: string[];
  /** Confident labels outside the vocabulary. */
  additionalTags: string[];
};

export type TagPhotoOptions = {
  annotator: LabelAnnotator;
  vocabulary?: readonly string[];
  minScore?: number;
};

export const DEFAULT_VOCABULARY = [
  "landscape",
  "bif",
  "mountain",
  "city",
  "night",
  "stars",
  "golden-hour",
  "blue-hour",
] as const;

export function createVisionAnnotator(
  client = new vision.ImageAnnotatorClient(),
): LabelAnnotator {
  return {
    async detectLabels(image) {
      const [result] = await client.labelDetection({
        image: { content: image },
      });

      return (result.labelAnnotations ?? []).flatMap((annotation) =>
        annotation.description
          ? [{ description: annotation.description, score: annotation.score ?? 0 }]
          : [],
      );
    },
  };
}

export function parseVocabulary(raw: string | undefined): string[] {
  if (!raw) {
    return [...DEFAULT_VOCABULARY];
  }

  return [
    ...new Set(raw.split(",").map(normalizeKeyword).filter(Boolean)),
  ];
}

export async function tagPhoto(
  imagePath: string,
  { annotator, vocabulary = DEFAULT_VOCABULARY, minScore = 0.6 }: TagPhotoOptions,
): Promise<PhotoTags> {
  const image = await readFile(imagePath);
  const labels = await annotator.detectLabels(image);
  const allowed = new Set(vocabulary.map(normalizeKeyword));

  const confident = [
    ...new Set(
      labels
        .filter((label) => label.score >= minScore)
        .map((label) => normalizeKeyword(label.description))
        .filter(Boolean),
    ),
  ];

  return {
    tags: confident.filter((label) => allowed.has(label)),
    additionalTags: confident.filter((label) => !allowed.has(label)),
  };
}
