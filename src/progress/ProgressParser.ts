import { ProgressSample } from '../types';

// " Update state (0x61) downloading, progress: 45.23 (1234 / 5678)"
const BYTE_PROGRESS = /progress:\s*(\d+(?:\.\d+)?)\s*\(\s*(\d+)\s*\/\s*(\d+)\s*\)/;
// Archiver and generic tools: " 45% 12 + data/file.pak"
const PERCENT_ONLY = /(\d+)%/g;

function clampPercent(value: number): number {
  return Math.max(0, Math.min(100, value));
}

/**
 * Extract a progress sample from one line of tool output.
 * Returns null when the line carries no progress information.
 */
export function parseProgress(line: string): ProgressSample | null {
  const bytes = BYTE_PROGRESS.exec(line);
  if (bytes) {
    return {
      percent: clampPercent(parseFloat(bytes[1])),
      bytesDone: parseInt(bytes[2], 10),
      bytesTotal: parseInt(bytes[3], 10),
    };
  }

  // Tools that redraw with backspaces put several updates on one line; the last one wins
  const matches = Array.from(line.matchAll(PERCENT_ONLY));
  const last = matches[matches.length - 1];
  if (last) {
    return { percent: clampPercent(parseInt(last[1], 10)) };
  }

  return null;
}
