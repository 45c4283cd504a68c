import { z } from "zod";

import { normalizeKeyword } from "@/lib/values";
import type { StoredPhoto } from "@/lib/repositories/library-store";

export type LibraryFilters = {
  camera?: string;
  lens?: string;
  keyword?: string;
  /** Inclusive calendar dates, YYYY-MM-DD. */
  from?: string;
  to?: string;
};

export class FilterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FilterError";
  }
}

const calendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const filtersSchema = z
  .object({
    camera: optionalText,
    lens: optionalText,
    keyword: optionalText,
    from: calendarDateSchema.optional(),
    to: calendarDateSchema.optional(),
  })
  .refine(
    ({ from, to }) => from === undefined || to === undefined || from <= to,
    { message: "from must not be after to", path: ["from"] },
  );

/** Reads filters from a query string; empty parameters are ignored. */
export function parseLibraryFilters(params: URLSearchParams): LibraryFilters {
  const raw: Record<string, string> = {};
  for (const key of ["camera", "lens", "keyword", "from", "to"]) {
    const value = params.get(key);
    if (value !== null && value !== "") {
      raw[key] = value;
    }
  }

  const parsed = filtersSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FilterError(
      parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; "),
    );
  }

  const filters: LibraryFilters = {};
  const { camera, lens, keyword, from, to } = parsed.data;
  if (camera) filters.camera = camera;
  if (lens) filters.lens = lens;
  if (keyword) filters.keyword = normalizeKeyword(keyword);
  if (from) filters.from = from;
  if (to) filters.to = to;

  return filters;
}

export function filterLibrary(
  photos: readonly StoredPhoto[],
  filters: LibraryFilters,
): StoredPhoto[] {
  return photos.filter((photo) => {
    if (filters.camera && photo.camera !== filters.camera) {
      return false;
    }

    if (filters.lens && photo.lens !== filters.lens) {
      return false;
    }

    if (
      filters.keyword &&
      !photo.keywords.includes(filters.keyword) &&
      !photo.aiKeywords.includes(filters.keyword)
    ) {
      return false;
    }

    if (filters.from && photo.date < filters.from) {
      return false;
    }

    if (filters.to && photo.date > filters.to) {
      return false;
    }

    return true;
  });
}

export type CountField = "camera" | "lens" | "equivalentFocalLength" | "date";

export type FieldCount = {
  value: string;
  photos: number;
};

/** Photo counts per distinct value of `field`, largest first. */
export function countBy(
  photos: readonly StoredPhoto[],
  field: CountField,
): FieldCount[] {
  const counts = new Map<string, number>();

  for (const photo of photos) {
    counts.set(photo[field], (counts.get(photo[field]) ?? 0) + 1);
  }

  return [...counts]
    .map(([value, count]) => ({ value, photos: count }))
    .sort(
      (a, b) => b.photos - a.photos || (a.value < b.value ? -1 : a.value > b.value ? 1 : 0),
    );
}
