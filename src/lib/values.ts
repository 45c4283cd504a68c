export type RawItem = Record<string, unknown>;

export function isRecord(value: unknown): value is RawItem {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asString(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }

  if (typeof value === "number" || typeof value === "bigint") {
    return value.toString();
  }

  return undefined;
}

export function asNumber(value: unknown): number | undefined {
  const num = typeof value === "number" ? value : Number(value);

  if (value !== null && value !== "" && Number.isFinite(num)) {
    return num;
  }

  return undefined;
}

export function asStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value
    .map(asString)
    .filter((item): item is string => item !== undefined);
}

export function normalizeKeyword(keyword: string): string {
  return keyword.trim().toLowerCase().replace(/\s+/g, " ");
}
