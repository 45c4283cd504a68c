import { NextResponse } from "next/server";

import {
  countBy,
  FilterError,
  filterLibrary,
  parseLibraryFilters,
} from "@/lib/library/filters";
import { fetchAllPhotos } from "@/lib/repositories/library-store";

export async function GET(request: Request) {
  try {
    const filters = parseLibraryFilters(new URL(request.url).searchParams);
    const photos = filterLibrary(await fetchAllPhotos(), filters);

    return NextResponse.json({
      filters,
      total: photos.length,
      byLens: countBy(photos, "lens"),
      byFocalLength: countBy(photos, "equivalentFocalLength"),
      photos,
    });
  } catch (error) {
    if (error instanceof FilterError) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }

    console.error("Failed to load photos", error);

    return NextResponse.json(
      {
        error: "Unable to load photos",
      },
      { status: 500 },
    );
  }
}
