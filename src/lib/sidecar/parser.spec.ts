import { describe, expect, it } from "vitest";

import { createConfig } from "@/lib/config";
import { SCENARIO_FIELDS, sidecarXml } from "@/test/fixtures";

import { extractRecord, readDescription } from "@/lib/sidecar/parser";

const config = createConfig({ basePath: "/photos" });
const [primary, alternative] = config.schemaVariants;

function descriptionOf(xml: string) {
  const lookup = readDescription(xml);
  if (!lookup.ok) {
    throw new Error(`description missing: ${lookup.missingKey}`);
  }
  return lookup.description;
}

describe("readDescription", () => {
  it("finds the description node", () => {
    const lookup = readDescription(sidecarXml(SCENARIO_FIELDS));

    expect(lookup.ok).toBe(true);
  });

  it("names the first missing envelope element", () => {
    expect(readDescription("<x:xmpmeta><other/></x:xmpmeta>")).toEqual({
      ok: false,
      missingKey: "rdf:RDF",
    });
    expect(readDescription("<root/>")).toEqual({ ok: false, missingKey: "x:xmpmeta" });
  });
});

describe("extractRecord", () => {
  it("reads a complete sidecar with the primary mapping", () => {
    const result = extractRecord(
      primary,
      descriptionOf(sidecarXml(SCENARIO_FIELDS)),
      "P9220001.jpg.exposurex7",
      config,
    );

    expect(result).toEqual({
      ok: true,
      record: {
        name: "P9220001.jpg",
        createDate: "2021-09-22T15:08:33",
        focalLength: "12/1",
        fNumber: "28/10",
        camera: "OLYMPUS E-M5 MARK III",
        lens: "OLYMPUS M.12-40mm F2.8",
        flag: "0",
        keywords: ["landscape", "mountain"],
      },
    });
  });

  it("reports the missing source key", () => {
    const result = extractRecord(
      primary,
      descriptionOf(sidecarXml({ ...SCENARIO_FIELDS, createDate: undefined })),
      "P9220001.jpg.exposurex7",
      config,
    );

    expect(result).toEqual({ ok: false, missingKey: "@xmp:CreateDate" });
  });

  it("reads the creation date from the alternative key", () => {
    const result = extractRecord(
      alternative,
      descriptionOf(
        sidecarXml({
          ...SCENARIO_FIELDS,
          createDate: undefined,
          dateCreated: "2020-01-05",
        }),
      ),
      "P1050002.jpg.exposurex7",
      config,
    );

    expect(result.ok && result.record.createDate).toBe("2020-01-05");
  });

  it("treats lens and keywords as optional", () => {
    const result = extractRecord(
      primary,
      descriptionOf(sidecarXml({ ...SCENARIO_FIELDS, lens: undefined, keywords: undefined })),
      "P9220001.jpg.exposurex7",
      config,
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.record.lens).toBeUndefined();
      expect(result.record.keywords).toEqual([]);
    }
  });
});
