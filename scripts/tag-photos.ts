import path from "node:path";

import { config as loadEnv } from "dotenv";

import { loadConfig } from "../src/lib/config";
import { fileExists, findSidecars } from "../src/lib/library/files";
import {
  fetchAllPhotos,
  saveAiTags,
} from "../src/lib/repositories/library-store";
import { photoPathForSidecar } from "../src/lib/sidecar/paths";
import {
  createVisionAnnotator,
  parseVocabulary,
  tagPhoto,
} from "../src/lib/tagging/vision-tagger";

loadEnv({ path: ".env.local" });
loadEnv();

const MAX_ITEMS = Number(process.env.TAG_LIMIT ?? 100);
const MIN_SCORE = Number(process.env.TAGGER_MIN_SCORE ?? 0.6);

async function main() {
  const config = await loadConfig();
  const vocabulary = parseVocabulary(process.env.TAGGER_VOCABULARY);
  const annotator = createVisionAnnotator();

  // stored photos only carry their file name; the sidecar tree says where
  // each image lives
  const sidecars = await findSidecars(config.basePath, config, {
    logger: console,
  });
  const imagePaths = new Map(
    sidecars.map((sidecar) => {
      const imagePath = photoPathForSidecar(sidecar, config.sidecarExtensions);
      return [path.basename(imagePath), imagePath];
    }),
  );

  const photos = (await fetchAllPhotos())
    .filter((photo) => photo.aiKeywords.length === 0)
    .slice(0, MAX_ITEMS);
  console.info(`Found ${photos.length} untagged photos to process.`);

  for (const photo of photos) {
    const imagePath = imagePaths.get(photo.name);

    if (!imagePath || !(await fileExists(imagePath))) {
      console.warn(`Skipping ${photo.name}: image not found`);
      continue;
    }

    try {
      const { tags, additionalTags } = await tagPhoto(imagePath, {
        annotator,
        vocabulary,
        minScore: MIN_SCORE,
      });
      const stored = await saveAiTags(photo.name, tags);
      console.info(
        `Stored ${stored} tags for ${photo.name} (also seen: ${
          additionalTags.join(", ") || "nothing"
        })`,
      );
    } catch (error) {
      console.error(`Failed to tag ${photo.name}`, error);
    }
  }

  console.info("Tagging complete.");
}

main().catch((error) => {
  console.error("Fatal tagging error", error);
  process.exit(1);
});
