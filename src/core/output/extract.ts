export type MarkerSet = {
  start: readonly string[];
  stop: readonly string[];
};

/**
 * Keeps the lines of `text` between the last line holding a start marker
 * and the first following line holding a stop marker. Marker lines are
 * dropped. Without a start marker the window opens at the top, so output is
 * never lost to a missing banner. A line holding both kinds of marker counts
 * as a start.
 */
export function extractRelevantLines(
  text: string,
  startMarkers: readonly string[],
  stopMarkers: readonly string[]
): string {
  // Lines before any start marker are buffered rather than skipped; a start
  // marker discards them and opens a fresh window.
  const kept: string[] = [];

  for (const line of text.split("\n")) {
    if (containsAny(line, startMarkers)) {
      kept.length = 0;
      continue;
    }
    if (containsAny(line, stopMarkers)) {
      break;
    }
    kept.push(line);
  }

  return kept.join("\n");
}

export function extractWithMarkers(text: string, markers: MarkerSet): string {
  return extractRelevantLines(text, markers.start, markers.stop);
}

function containsAny(line: string, markers: readonly string[]): boolean {
  return markers.some((marker) => line.includes(marker));
}
