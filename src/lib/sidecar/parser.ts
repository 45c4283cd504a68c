import { XMLParser } from "fast-xml-parser";

import {
  type Config,
  type FieldDirective,
  type SchemaVariant,
  type SidecarField,
} from "@/lib/config";
import { asString, isRecord, type RawItem } from "@/lib/values";
import { extractKeywords } from "@/lib/sidecar/keywords";
import { sidecarPhotoName } from "@/lib/sidecar/paths";

export const SIDECAR_XML_PATH = [
  "x:xmpmeta",
  "rdf:RDF",
  "rdf:Description",
] as const;

export type SidecarRecord = {
  name: string;
  createDate: string;
  focalLength: string;
  fNumber: string;
  camera: string;
  lens?: string;
  flag: string;
  keywords: string[];
};

export type DescriptionLookup =
  | { ok: true; description: RawItem }
  | { ok: false; missingKey: string };

export type ExtractionResult =
  | { ok: true; record: SidecarRecord }
  | { ok: false; missingKey: string };

// attributes come back as "@prefix:name" keys, child elements under their tag
const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@",
  parseAttributeValue: false,
  parseTagValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true,
});

/**
 * Parses sidecar XML down to its `rdf:Description` node. Unparseable XML
 * and documents missing part of the envelope report the first missing
 * element instead of throwing.
 */
export function readDescription(xml: string): DescriptionLookup {
  let node: unknown;
  try {
    node = xmlParser.parse(xml);
  } catch {
    return { ok: false, missingKey: SIDECAR_XML_PATH[0] };
  }

  for (const element of SIDECAR_XML_PATH) {
    if (!isRecord(node) || !(element in node)) {
      return { ok: false, missingKey: element };
    }
    node = node[element];
  }

  if (!isRecord(node)) {
    return { ok: false, missingKey: SIDECAR_XML_PATH[SIDECAR_XML_PATH.length - 1] };
  }

  return { ok: true, description: node };
}

export function applyDirective(value: string, directive: FieldDirective): string {
  switch (directive) {
    case "trim":
      return value.trim();
    case "trimStart":
      return value.trimStart();
    case "trimEnd":
      return value.trimEnd();
  }
}

/**
 * Reads every field of `variant` from a description node. A required field
 * that is absent (or not a plain value) fails the whole variant; the
 * failure names the source key that was missing. Lens and keywords are
 * optional.
 */
export function extractRecord(
  variant: SchemaVariant,
  description: RawItem,
  fileName: string,
  config: Pick<Config, "fieldProcessing" | "sidecarExtensions">,
): ExtractionResult {
  const read = (field: Exclude<SidecarField, "keywords">): string | undefined => {
    const value = asString(description[variant.fields[field]]);
    const directive = config.fieldProcessing[field];

    return value !== undefined && directive
      ? applyDirective(value, directive)
      : value;
  };
  const missing = (field: SidecarField): ExtractionResult => ({
    ok: false,
    missingKey: variant.fields[field],
  });

  const createDate = read("createDate");
  if (createDate === undefined) return missing("createDate");
  const focalLength = read("focalLength");
  if (focalLength === undefined) return missing("focalLength");
  const fNumber = read("fNumber");
  if (fNumber === undefined) return missing("fNumber");
  const camera = read("camera");
  if (camera === undefined) return missing("camera");
  const flag = read("flag");
  if (flag === undefined) return missing("flag");

  const name = sidecarPhotoName(fileName, config.sidecarExtensions);
  if (name === undefined) {
    return { ok: false, missingKey: "name" };
  }

  return {
    ok: true,
    record: {
      name,
      createDate,
      focalLength,
      fNumber,
      camera,
      lens: read("lens"),
      flag,
      keywords: extractKeywords(description[variant.fields.keywords]),
    },
  };
}
