import { isRecord } from "@/lib/values";

const KEYWORD_PREFIX = "kywd";

/** "kywd:||irina|" -> "irina" */
export function decodeKeyword(token: string): string {
  return token.replaceAll("kywd:||", "").replaceAll("|", "");
}

function itemText(item: unknown): string | undefined {
  if (typeof item === "string") {
    return item;
  }

  if (isRecord(item) && typeof item["#text"] === "string") {
    return item["#text"];
  }

  return undefined;
}

/**
 * Flattens the `rdf:Bag` / `rdf:li` structure of the keywords field into
 * the keyword texts it carries, in document order.
 *
 * Anything that is not shaped like a bag yields an empty list; sidecars
 * written by other tools routinely leave the field empty or lay it out
 * differently.
 */
export function extractKeywords(value: unknown): string[] {
  if (!isRecord(value)) {
    return [];
  }

  const bag = value["rdf:Bag"];
  if (!isRecord(bag)) {
    return [];
  }

  const listed: unknown = bag["rdf:li"];
  if (listed === undefined) {
    return [];
  }

  const items: unknown[] = Array.isArray(listed) ? listed : [listed];
  const keywords: string[] = [];

  for (const item of items) {
    const token = itemText(item);
    if (token?.startsWith(KEYWORD_PREFIX)) {
      keywords.push(decodeKeyword(token));
    }
  }

  return keywords;
}
