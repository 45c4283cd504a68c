import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { vi } from "vitest";

import type { Logger } from "@/lib/logger";

export type SidecarFields = {
  createDate?: string;
  dateCreated?: string;
  captureTime?: string;
  focalLength?: string;
  fNumber?: string;
  camera?: string;
  lens?: string;
  flag?: string;
  rating?: string;
  keywords?: string[];
};

export const SCENARIO_FIELDS: SidecarFields = {
  createDate: "2021-09-22T15:08:33",
  focalLength: "12/1",
  fNumber: "28/10",
  camera: "OLYMPUS E-M5 MARK III",
  lens: "OLYMPUS M.12-40mm F2.8",
  flag: "0",
  keywords: ["kywd:||landscape|", "kywd:||mountain|"],
};

function attribute(name: string, value: string | undefined): string {
  return value === undefined ? "" : `\n   ${name}="${value}"`;
}

export function sidecarXml(fields: SidecarFields): string {
  const keywords = fields.keywords
    ? `
   <alienexposure:virtualpaths>
    <rdf:Bag>
${fields.keywords.map((keyword) => `     <rdf:li>${keyword}</rdf:li>`).join("\n")}
    </rdf:Bag>
   </alienexposure:virtualpaths>`
    : "";

  return `<?xml version="1.0" encoding="UTF-8"?>
<x:xmpmeta xmlns:x="adobe:ns:meta/">
 <rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">
  <rdf:Description rdf:about=""${attribute("xmp:CreateDate", fields.createDate)}${attribute(
    "photoshop:DateCreated",
    fields.dateCreated,
  )}${attribute("alienexposure:capture_time", fields.captureTime)}${attribute(
    "exif:FocalLength",
    fields.focalLength,
  )}${attribute("exif:FNumber", fields.fNumber)}${attribute(
    "tiff:Model",
    fields.camera,
  )}${attribute("alienexposure:lens", fields.lens)}${attribute(
    "alienexposure:pickflag",
    fields.flag,
  )}${attribute("xmp:Rating", fields.rating)}>${keywords}
  </rdf:Description>
 </rdf:RDF>
</x:xmpmeta>
`;
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), "sidecar-stats-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export const SIDECAR_DIR = path.join("Exposure Software", "Exposure X7");

/**
 * Writes a sidecar under `<root>/<folder>/Exposure Software/Exposure X7`
 * and, unless `withPhoto` is false, the photo it describes in `<folder>`.
 */
export async function writeSidecar(
  root: string,
  folder: string,
  fileName: string,
  contents: string,
  { withPhoto = true, photoName }: { withPhoto?: boolean; photoName?: string } = {},
): Promise<string> {
  const sidecarDir = path.join(root, folder, SIDECAR_DIR);
  await mkdir(sidecarDir, { recursive: true });

  const sidecarPath = path.join(sidecarDir, fileName);
  await writeFile(sidecarPath, contents, "utf8");

  if (withPhoto) {
    const name = photoName ?? fileName.slice(0, fileName.lastIndexOf("."));
    await writeFile(path.join(root, folder, name), "not really a jpeg");
  }

  return sidecarPath;
}

export function createTestLogger(): Logger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Every message passed to one level of a test logger, first argument only. */
export function messages(mock: ReturnType<typeof vi.fn>): string[] {
  return mock.mock.calls.map((call) => String(call[0]));
}
