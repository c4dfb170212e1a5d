/**
 * Anchor lookup for `str_replace`: exact occurrences, plus near misses to
 * report when the anchor is not in the file.
 */

export interface NearMiss {
  /** 1-based line where the similar block starts */
  lineNumber: number;
  content: string;
  /** 0..1 */
  similarity: number;
}

const SUGGESTION_THRESHOLD = 0.6;
const MAX_SUGGESTIONS = 3;

/**
 * Non-overlapping exact occurrences of `anchor` in `content`.
 */
export function findOccurrences(content: string, anchor: string): number[] {
  const indices: number[] = [];
  let from = 0;
  while (true) {
    const index = content.indexOf(anchor, from);
    if (index === -1) break;
    indices.push(index);
    from = index + anchor.length;
  }
  return indices;
}

/**
 * Line blocks the same height as the anchor, ranked by similarity.
 */
export function findNearMisses(content: string, anchor: string): NearMiss[] {
  const anchorLines = anchor.split("\n");
  const contentLines = content.split("\n");
  const candidates: NearMiss[] = [];

  for (let i = 0; i <= contentLines.length - anchorLines.length; i++) {
    const windowLines = contentLines.slice(i, i + anchorLines.length);
    const similarity = lineSimilarity(anchorLines, windowLines);
    if (similarity >= SUGGESTION_THRESHOLD && similarity < 1) {
      candidates.push({ lineNumber: i + 1, content: windowLines.join("\n"), similarity });
    }
  }

  return candidates
    .sort((a, b) => b.similarity - a.similarity || a.lineNumber - b.lineNumber)
    .slice(0, MAX_SUGGESTIONS);
}

/**
 * 1-based line number of a character index.
 */
export function lineNumberAt(content: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index; i++) {
    if (content.charCodeAt(i) === 10) line++;
  }
  return line;
}

function lineSimilarity(a: string[], b: string[]): number {
  let total = 0;
  let weight = 0;
  for (let i = 0; i < a.length; i++) {
    // Longer lines weigh more
    const w = Math.max(a[i].trim().length, b[i].trim().length, 1);
    total += stringSimilarity(a[i].trim(), b[i].trim()) * w;
    weight += w;
  }
  return weight > 0 ? total / weight : 0;
}

function stringSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;
  return 1 - levenshteinDistance(a, b) / Math.max(a.length, b.length);
}

function levenshteinDistance(a: string, b: string): number {
  let previous = Array.from({ length: a.length + 1 }, (_, j) => j);
  for (let i = 1; i <= b.length; i++) {
    const current = [i];
    for (let j = 1; j <= a.length; j++) {
      current[j] =
        b.charAt(i - 1) === a.charAt(j - 1)
          ? previous[j - 1]
          : Math.min(previous[j - 1] + 1, current[j - 1] + 1, previous[j] + 1);
    }
    previous = current;
  }
  return previous[a.length];
}
