export interface ThumbnailCandidate {
  url: string;
  width?: number;
  height?: number;
  id?: string;
}

const END_OF_VIDEO_HINTS = ["final", "end", "last", "result"];

interface RankedThumbnail {
  url: string;
  position: number;
  key: [hint: number, area: number, ordinal: number];
}

function rankKey(thumb: ThumbnailCandidate): RankedThumbnail["key"] {
  const lower = thumb.url.toLowerCase();
  const hint = END_OF_VIDEO_HINTS.some((word) => lower.includes(word)) ? 1 : 0;
  const area = thumb.width && thumb.height ? thumb.width * thumb.height : 0;
  const ordinal = thumb.id && /^\d+$/.test(thumb.id) ? Number(thumb.id) : 0;
  return [hint, area, ordinal];
}

function compareRanked(a: RankedThumbnail, b: RankedThumbnail): number {
  for (let i = 0; i < a.key.length; i++) {
    if (a.key[i] !== b.key[i]) return b.key[i] - a.key[i];
  }
  return a.position - b.position;
}

/**
 * Picks the thumbnail most likely to show the finished dish. Rules in
 * priority order: end-of-video URL hint, then resolution, then numeric id
 * (later frames carry higher ids). Ties keep list order. Falls back to the
 * single `fallback` thumbnail when the list has no usable entry.
 */
export function selectBestThumbnail(candidates: readonly ThumbnailCandidate[], fallback = ""): string {
  const ranked = candidates
    .filter((thumb) => thumb.url)
    .map((thumb, position) => ({ url: thumb.url, position, key: rankKey(thumb) }))
    .sort(compareRanked);
  return ranked.length > 0 ? ranked[0].url : fallback;
}
