const ISO_DURATION = /^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?$/;

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

/**
 * "PT1H30M" → "1 hour 30 minutes". Anything without an hour or minute
 * component comes back unchanged.
 */
export function formatIsoDuration(value: string): string {
  const match = value.trim().match(ISO_DURATION);
  if (!match || (!match[1] && !match[2])) return value;

  const hours = Number(match[1] ?? 0);
  const minutes = Number(match[2] ?? 0);
  const parts: string[] = [];
  if (hours > 0) parts.push(plural(hours, "hour"));
  if (minutes > 0) parts.push(plural(minutes, "minute"));
  return parts.length > 0 ? parts.join(" ") : value;
}
