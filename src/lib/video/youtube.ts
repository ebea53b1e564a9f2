const VIDEO_ID_PATTERNS: readonly RegExp[] = [
  /youtube\.com\/watch\?v=([\w-]+)/,
  /youtu\.be\/([\w-]+)/,
  /youtube\.com\/embed\/([\w-]+)/,
  /youtube\.com\/v\/([\w-]+)/,
  /youtube\.com\/shorts\/([\w-]+)/,
];

const QUERY_HOSTS = ["www.youtube.com", "youtube.com", "m.youtube.com"];

/**
 * Video ID from watch, short-link, embed, /v/, Shorts and
 * query-parameter URLs (e.g. `watch?feature=share&v=ID`).
 */
export function getYouTubeVideoId(url: string): string | null {
  for (const pattern of VIDEO_ID_PATTERNS) {
    const match = url.match(pattern);
    if (match) return match[1];
  }

  let parsed: URL;
  try {
    parsed = new URL(/^https?:\/\//i.test(url) ? url : `https://${url}`);
  } catch {
    return null;
  }
  if (!QUERY_HOSTS.includes(parsed.hostname.toLowerCase())) return null;

  const v = parsed.searchParams.get("v");
  if (v) return v;

  const shorts = parsed.pathname.match(/\/shorts\/([\w-]+)/);
  return shorts ? shorts[1] : null;
}
