import type { Cue } from './types';

const BOM = '\ufeff';
const INDEX_PATTERN = /^\d+$/;
const TIMESTAMP = '(\\d{2}):(\\d{2}):(\\d{2}),(\\d{3})';
const TIMING_PATTERN = new RegExp(`^${TIMESTAMP}\\s+-->\\s+${TIMESTAMP}$`);

function toSeconds(hours: string, minutes: string, seconds: string, millis: string): number {
  return (
    Number.parseInt(hours, 10) * 3600 +
    Number.parseInt(minutes, 10) * 60 +
    Number.parseInt(seconds, 10) +
    Number.parseInt(millis, 10) / 1000
  );
}

function normaliseDocument(document: string): string {
  const withoutBom = document.startsWith(BOM) ? document.slice(BOM.length) : document;
  return withoutBom.replace(/\r\n?/g, '\n');
}

function splitBlocks(body: string): string[][] {
  const blocks: string[][] = [];
  let current: string[] = [];
  for (const line of body.split('\n')) {
    if (line.trim() === '') {
      if (current.length > 0) {
        blocks.push(current);
        current = [];
      }
      continue;
    }
    current.push(line);
  }
  if (current.length > 0) {
    blocks.push(current);
  }
  return blocks;
}

function parseBlock(lines: string[]): Cue | null {
  let cursor = 0;
  if (!TIMING_PATTERN.test(lines[0].trim())) {
    if (!INDEX_PATTERN.test(lines[0].trim())) {
      return null;
    }
    cursor = 1;
  }
  const timing = lines[cursor]?.trim().match(TIMING_PATTERN);
  if (!timing) {
    return null;
  }
  const start = toSeconds(timing[1], timing[2], timing[3], timing[4]);
  const end = toSeconds(timing[5], timing[6], timing[7], timing[8]);
  if (end < start) {
    return null;
  }
  const text = lines
    .slice(cursor + 1)
    .join('\n')
    .trim();
  if (!text) {
    return null;
  }
  return Object.freeze({ start, end, text });
}

/**
 * Parse an SRT caption document into cues sorted by start time.
 *
 * Blocks that do not follow the `[index] / HH:MM:SS,mmm --> HH:MM:SS,mmm / text`
 * shape, or that end before they start, are skipped; the remaining blocks still
 * parse. Never throws.
 */
export function parseSrtCaptions(document: string | null | undefined): readonly Cue[] {
  if (!document) {
    return Object.freeze([]);
  }
  const blocks = splitBlocks(normaliseDocument(document));
  const cues: Cue[] = [];
  for (const block of blocks) {
    const cue = parseBlock(block);
    if (cue) {
      cues.push(cue);
    }
  }
  if (cues.length === 0 && blocks.length > 0) {
    console.warn('Caption document contained no usable cues', { blocks: blocks.length });
  }
  cues.sort((a, b) => a.start - b.start);
  return Object.freeze(cues);
}
