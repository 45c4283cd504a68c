import { LibraryDashboard } from "@/components/library/library-dashboard";
import {
  fetchAllPhotos,
  fetchKeywordSummaries,
} from "@/lib/repositories/library-store";

export const dynamic = "force-dynamic";

export default async function Home() {
  try {
    const [photos, keywords] = await Promise.all([
      fetchAllPhotos(),
      fetchKeywordSummaries(),
    ]);

    return (
      <main>
        <LibraryDashboard photos={photos} keywords={keywords} />
      </main>
    );
  } catch (error) {
    console.error("Failed to load library", error);

    return (
      <main>
        <h1>Configuration required</h1>
        <p className="muted">
          The app couldn&apos;t reach DynamoDB. Double-check AWS credentials and
          the <code>DYNAMO_PHOTOS_TABLE</code>,{" "}
          <code>DYNAMO_PHOTO_KEYWORDS_TABLE</code> and{" "}
          <code>DYNAMO_KEYWORD_SUMMARIES_TABLE</code> environment variables in
          your <code>.env</code> file, then run <code>npm run ingest</code>.
        </p>
      </main>
    );
  }
}
