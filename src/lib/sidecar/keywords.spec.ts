import { describe, expect, it } from "vitest";

import { decodeKeyword, extractKeywords } from "@/lib/sidecar/keywords";

describe("decodeKeyword", () => {
  it("strips the keyword marker and separators", () => {
    expect(decodeKeyword("kywd:||irina|")).toBe("irina");
    expect(decodeKeyword("kywd:||golden hour|")).toBe("golden hour");
  });
});

describe("extractKeywords", () => {
  it("reads every keyword of a bag in order", () => {
    expect(
      extractKeywords({
        "rdf:Bag": { "rdf:li": ["kywd:||landscape|", "kywd:||mountain|"] },
      }),
    ).toEqual(["landscape", "mountain"]);
  });

  it("reads a bag holding a single keyword", () => {
    expect(extractKeywords({ "rdf:Bag": { "rdf:li": "kywd:||city|" } })).toEqual([
      "city",
    ]);
  });

  it("keeps only keyword entries", () => {
    expect(
      extractKeywords({
        "rdf:Bag": {
          "rdf:li": ["coll:||trip|", { "#text": "kywd:||night|" }, "kywd:||stars|"],
        },
      }),
    ).toEqual(["night", "stars"]);
  });

  it("returns nothing for missing or oddly shaped fields", () => {
    expect(extractKeywords(undefined)).toEqual([]);
    expect(extractKeywords("")).toEqual([]);
    expect(extractKeywords({ "rdf:Seq": { "rdf:li": "kywd:||city|" } })).toEqual([]);
    expect(extractKeywords({ "rdf:Bag": "" })).toEqual([]);
    expect(extractKeywords({ "rdf:Bag": {} })).toEqual([]);
  });
});
