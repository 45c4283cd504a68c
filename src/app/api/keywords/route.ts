import { NextResponse } from "next/server";

import { fetchKeywordSummaries } from "@/lib/repositories/library-store";

export async function GET() {
  try {
    const keywords = await fetchKeywordSummaries();

    return NextResponse.json({ keywords });
  } catch (error) {
    console.error("Failed to load keywords", error);

    return NextResponse.json(
      {
        error: "Unable to load keywords",
      },
      { status: 500 },
    );
  }
}
