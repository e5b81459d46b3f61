/**
 * Fenced code block parser.
 *
 * Scans the document line by line over its UTF-8 bytes so block offsets line
 * up with the byte cursor callers send. Fence syntax is ASCII, so each line is
 * matched in latin1 form, where one character is one byte.
 */

import type { Block } from './types.js';

/** Up to three spaces/tabs, 3+ backticks or tildes, optional tag, optional CR. */
const OPENING_FENCE = /^[ \t]{0,3}(`{3,}|~{3,})([A-Za-z0-9_+-]*)[ \t]*\r?$/;

const CLOSING_FENCE = /^[ \t\r\f\v]*(`+|~+)[ \t\r\f\v]*$/;

const NEWLINE = 0x0a;

interface Line {
  start: number;
  /** Index of the terminating LF, or the document length for the last line */
  end: number;
  terminated: boolean;
  text: string;
}

function splitLines(bytes: Buffer): Line[] {
  const lines: Line[] = [];
  let start = 0;
  while (start < bytes.length) {
    const lf = bytes.indexOf(NEWLINE, start);
    const terminated = lf >= 0;
    const end = terminated ? lf : bytes.length;
    lines.push({ start, end, terminated, text: bytes.toString('latin1', start, end) });
    start = end + 1;
  }
  return lines;
}

function isClosingFence(text: string, fence: string): boolean {
  const match = CLOSING_FENCE.exec(text);
  if (!match) return false;
  const run = match[1];
  return run[0] === fence[0] && run.length >= fence.length;
}

function toBuffer(text: string | Uint8Array): Buffer {
  if (typeof text === 'string') return Buffer.from(text, 'utf8');
  return Buffer.from(text.buffer, text.byteOffset, text.byteLength);
}

/**
 * Every complete fenced block in document order. Unterminated fences are
 * dropped; `\n` and `\r\n` documents parse the same.
 */
export function parseBlocks(text: string | Uint8Array): Block[] {
  const bytes = toBuffer(text);
  const lines = splitLines(bytes);
  const blocks: Block[] = [];

  let i = 0;
  while (i < lines.length) {
    const opener = lines[i];
    const match = opener.terminated ? OPENING_FENCE.exec(opener.text) : null;
    if (!match) {
      i++;
      continue;
    }

    const fence = match[1];
    let closeIndex = -1;
    for (let j = i + 1; j < lines.length; j++) {
      if (isClosingFence(lines[j].text, fence)) {
        closeIndex = j;
        break;
      }
    }
    if (closeIndex < 0) {
      i++;
      continue;
    }

    const closer = lines[closeIndex];
    const codeStart = opener.end + 1;
    const codeEnd = closer.start;
    let code = bytes.toString('utf8', codeStart, codeEnd).replace(/\r\n/g, '\n');
    if (code.endsWith('\n')) code = code.slice(0, -1);

    blocks.push({
      language: match[2],
      code,
      start: opener.start,
      end: closer.terminated ? closer.end + 1 : closer.end,
      codeStart,
      codeEnd,
    });
    i = closeIndex + 1;
  }

  return blocks;
}
