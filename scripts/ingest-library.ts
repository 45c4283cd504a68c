import { config as loadEnv } from "dotenv";

import { loadConfig } from "../src/lib/config";
import { buildLibrary } from "../src/lib/library/build-library";
import { saveLibrary } from "../src/lib/repositories/library-store";

loadEnv({ path: ".env.local" });
loadEnv();

async function main() {
  const config = await loadConfig();

  console.info(`Reading sidecars under ${config.basePath}...`);
  const library = await buildLibrary(config);

  console.info(
    `Found ${library.cameras.length} cameras and ${library.lenses.length} lenses.`,
  );
  console.table(library.stats);

  const saved = await saveLibrary(library);
  console.info(
    `Stored ${saved.photos} photos, ${saved.keywordLinks} keyword links and ${saved.keywords} keywords.`,
  );

  console.info("Ingestion complete.");
}

main().catch((error) => {
  console.error("Fatal ingestion error", error);
  process.exit(1);
});
