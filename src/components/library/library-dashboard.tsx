"use client";

import { useMemo, useState } from "react";

import {
  countBy,
  filterLibrary,
  type FieldCount,
  type LibraryFilters,
} from "@/lib/library/filters";
import type {
  KeywordSummary,
  StoredPhoto,
} from "@/lib/repositories/library-store";

type LibraryDashboardProps = {
  photos: StoredPhoto[];
  keywords: KeywordSummary[];
};

function distinct(photos: StoredPhoto[], field: "camera" | "lens"): string[] {
  return [...new Set(photos.map((photo) => photo[field]))].sort();
}

function CountTable({ title, counts }: { title: string; counts: FieldCount[] }) {
  return (
    <section>
      <h2>{title}</h2>
      {counts.length === 0 ? (
        <p className="muted">No photos match these filters.</p>
      ) : (
        <table>
          <tbody>
            {counts.map((count) => (
              <tr key={count.value}>
                <td>{count.value}</td>
                <td>{count.photos}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </section>
  );
}

export function LibraryDashboard({ photos, keywords }: LibraryDashboardProps) {
  const [filters, setFilters] = useState<LibraryFilters>({});

  const cameras = useMemo(() => distinct(photos, "camera"), [photos]);
  const lenses = useMemo(() => distinct(photos, "lens"), [photos]);

  const filteredPhotos = useMemo(
    () => filterLibrary(photos, filters),
    [photos, filters],
  );

  const byLens = useMemo(() => countBy(filteredPhotos, "lens"), [filteredPhotos]);
  const byFocalLength = useMemo(
    () => countBy(filteredPhotos, "equivalentFocalLength"),
    [filteredPhotos],
  );

  const update = (key: keyof LibraryFilters, value: string) => {
    setFilters((current) => {
      const next = { ...current };
      if (value) {
        next[key] = value;
      } else {
        delete next[key];
      }
      return next;
    });
  };

  const totalPhotosLabel = `${filteredPhotos.length} of ${photos.length} photo${
    photos.length === 1 ? "" : "s"
  }`;

  return (
    <div>
      <header>
        <h1>Sidecar Stats</h1>
        <p className="muted">
          Which cameras, lenses and focal lengths the library is shot with.
        </p>
      </header>

      <section className="filters">
        <label>
          Camera
          <select
            value={filters.camera ?? ""}
            onChange={(event) => update("camera", event.target.value)}
          >
            <option value="">All cameras</option>
            {cameras.map((camera) => (
              <option key={camera} value={camera}>
                {camera}
              </option>
            ))}
          </select>
        </label>
        <label>
          Lens
          <select
            value={filters.lens ?? ""}
            onChange={(event) => update("lens", event.target.value)}
          >
            <option value="">All lenses</option>
            {lenses.map((lens) => (
              <option key={lens} value={lens}>
                {lens}
              </option>
            ))}
          </select>
        </label>
        <label>
          Keyword
          <select
            value={filters.keyword ?? ""}
            onChange={(event) => update("keyword", event.target.value)}
          >
            <option value="">All keywords</option>
            {keywords.map((keyword) => (
              <option key={keyword.keyword} value={keyword.keyword}>
                {keyword.keyword} ({keyword.totalPhotos})
              </option>
            ))}
          </select>
        </label>
        <label>
          From
          <input
            type="date"
            value={filters.from ?? ""}
            onChange={(event) => update("from", event.target.value)}
          />
        </label>
        <label>
          To
          <input
            type="date"
            value={filters.to ?? ""}
            onChange={(event) => update("to", event.target.value)}
          />
        </label>
        <button type="button" onClick={() => setFilters({})}>
          Clear
        </button>
      </section>

      <p className="muted">{totalPhotosLabel}</p>

      <div className="panels">
        <CountTable title="Photos by lens" counts={byLens} />
        <CountTable title="Photos by focal length (35mm equivalent)" counts={byFocalLength} />
      </div>
    </div>
  );
}
