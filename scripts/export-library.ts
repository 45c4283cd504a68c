import path from "node:path";
import { parseArgs } from "node:util";

import { config as loadEnv } from "dotenv";

import { loadConfig } from "../src/lib/config";
import { writeLibraryExports } from "../src/lib/export/library-export";
import { buildLibrary } from "../src/lib/library/build-library";

loadEnv({ path: ".env.local" });
loadEnv();

const { values } = parseArgs({
  options: {
    out: { type: "string", short: "o", default: "data" },
    config: { type: "string", short: "c" },
  },
});

async function main() {
  const config = await loadConfig({ configPath: values.config });
  const library = await buildLibrary(config);

  const files = await writeLibraryExports(library, path.resolve(values.out));

  console.info(`Wrote ${library.table.rows.length} photos to ${files.library}`);
  console.info(`Wrote ${library.keywords.length} keyword rows to ${files.keywords}`);
  console.info(`Wrote keyword counts to ${files.keywordCounts}`);
}

main().catch((error) => {
  console.error("Fatal export error", error);
  process.exit(1);
});
