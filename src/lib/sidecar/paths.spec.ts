import path from "node:path";

import { describe, expect, it } from "vitest";

import { matchSidecarExtension, photoPathForSidecar, sidecarPhotoName } from "@/lib/sidecar/paths";

const EXTENSIONS = ["exposurex6", "exposurex7"];

describe("sidecar paths", () => {
  it("matches configured extensions only", () => {
    expect(matchSidecarExtension("A.jpg.exposurex7", EXTENSIONS)).toBe("exposurex7");
    expect(matchSidecarExtension("A.jpg.xmp", EXTENSIONS)).toBeUndefined();
    expect(matchSidecarExtension(".exposurex7", EXTENSIONS)).toBeUndefined();
  });

  it("derives the photo name from the sidecar name", () => {
    expect(sidecarPhotoName("P9220001.jpg.exposurex7", EXTENSIONS)).toBe("P9220001.jpg");
    expect(sidecarPhotoName("P9220001.ORF.exposurex6", EXTENSIONS)).toBe("P9220001.ORF");
  });

  it("finds the photo two directories above its sidecar", () => {
    expect(
      photoPathForSidecar(
        path.join("/lib", "2021", "Exposure Software", "Exposure X7", "A.jpg.exposurex7"),
        EXTENSIONS,
      ),
    ).toBe(path.join("/lib", "2021", "A.jpg"));
  });
});
