/**
 * SRT parsing and serialization
 */

import { LINE_BREAK, SubtitleEntry } from './subtitle-entry.js';

const TIME_LINE_RE =
  /(\d{1,2}):(\d{2}):(\d{2})[,.](\d{1,3})\s*-->\s*(\d{1,2}):(\d{2}):(\d{2})[,.](\d{1,3})/;

function toMilliseconds(hours: string, minutes: string, seconds: string, millis: string): number {
  return (
    parseInt(hours, 10) * 3600000 +
    parseInt(minutes, 10) * 60000 +
    parseInt(seconds, 10) * 1000 +
    parseInt(millis.padEnd(3, '0'), 10)
  );
}

/**
 * Format milliseconds as HH:MM:SS,mmm
 */
export function formatSrtTime(ms: number): string {
  const total = Math.max(0, Math.round(ms));
  const hours = Math.floor(total / 3600000);
  const minutes = Math.floor((total % 3600000) / 60000);
  const seconds = Math.floor((total % 60000) / 1000);
  const millis = total % 1000;

  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}:` +
    `${String(seconds).padStart(2, '0')},${String(millis).padStart(3, '0')}`;
}

/**
 * Parse SRT content; blocks without a time line are skipped
 * Text lines are joined with \N
 */
export function parseSrt(content: string): SubtitleEntry[] {
  const entries: SubtitleEntry[] = [];
  const normalized = content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
  const blocks = normalized.split(/\n\s*\n/);

  for (const block of blocks) {
    const lines = block.split('\n');
    while (lines.length > 0 && !lines[0].trim()) {
      lines.shift();
    }

    const timeIndex = lines.findIndex(line => TIME_LINE_RE.test(line));
    if (timeIndex < 0 || timeIndex > 1) continue;

    const timeMatch = lines[timeIndex].match(TIME_LINE_RE);
    if (!timeMatch) continue;

    const parsedIndex = timeIndex === 1 ? parseInt(lines[0].trim(), 10) : NaN;
    const text = lines
      .slice(timeIndex + 1)
      .map(line => line.trimEnd())
      .join(LINE_BREAK)
      .replace(/(\\N)+$/, '');

    entries.push(new SubtitleEntry({
      index: Number.isNaN(parsedIndex) ? entries.length + 1 : parsedIndex,
      startTime: toMilliseconds(timeMatch[1], timeMatch[2], timeMatch[3], timeMatch[4]),
      endTime: toMilliseconds(timeMatch[5], timeMatch[6], timeMatch[7], timeMatch[8]),
      text,
    }));
  }

  return entries;
}

/**
 * Serialize entries to SRT, numbered sequentially
 */
export function serializeSrt(entries: readonly SubtitleEntry[]): string {
  return entries
    .map((entry, i) => {
      const text = entry.text.split(LINE_BREAK).join('\n');
      return `${i + 1}\n${formatSrtTime(entry.startTime)} --> ${formatSrtTime(entry.endTime)}\n${text}\n`;
    })
    .join('\n');
}
