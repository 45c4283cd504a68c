import path from "node:path";
import { parseArgs } from "node:util";

import { config as loadEnv } from "dotenv";

import { setRatings } from "../src/lib/sidecar/ratings";

loadEnv({ path: ".env.local" });
loadEnv();

const USAGE =
  "Usage: npm run set-rating -- --root-dir <dir> --rating <0-5> <photo> [photo...]";

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    "root-dir": { type: "string", short: "r" },
    rating: { type: "string", short: "R" },
  },
});

async function main() {
  const rootDir = values["root-dir"] ?? process.env.LIBRARY_PATH;

  if (!rootDir || values.rating === undefined || positionals.length === 0) {
    throw new Error(USAGE);
  }

  const summary = await setRatings(
    positionals,
    path.resolve(rootDir),
    Number(values.rating),
  );

  console.info("=".repeat(50));
  console.info("Summary:");
  console.info(`  Updated:  ${summary.updated}`);
  console.info(`  Skipped:  ${summary.skipped}`);
  console.info(`  Errors:   ${summary.errors}`);
  console.info(`  Total:    ${summary.total}`);
  console.info("=".repeat(50));

  if (summary.errors > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("Fatal rating error", error);
  process.exit(1);
});
