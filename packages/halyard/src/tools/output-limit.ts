export function truncationMarker(removed: number): string {
  return `[... truncated ${removed} characters ...]`;
}

/**
 * Cuts text longer than `maxChars`, leaving a marker with the number of
 * characters removed.
 */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars)}\n${truncationMarker(text.length - maxChars)}`;
}

/**
 * Like `truncateText`, but the result including its marker is at most
 * `maxChars` long. Returns "" when not even the marker fits.
 */
export function fitText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  // The marker for the whole text is at least as long as any shorter one
  const keep = maxChars - truncationMarker(text.length).length - 1;
  if (keep <= 0) {
    return "";
  }
  return `${text.slice(0, keep)}\n${truncationMarker(text.length - keep)}`;
}
