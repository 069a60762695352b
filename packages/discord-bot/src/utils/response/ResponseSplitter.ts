/**
 * @parley-module: ResponseSplitter
 * @parley-risk: moderate
 * @parley-scope: utility
 *
 * @description
 * Splits model output into Discord-sized chunks without breaking fenced code
 * blocks. Chunks concatenate back to the exact input; no continuation markers
 * are added.
 *
 * @impact
 * Risk: A split inside a fence leaves every following chunk rendered as code.
 */

export const DISCORD_MESSAGE_LIMIT = 2000;

export interface FencedBlock {
  /** Index of the opening fence line. */
  start: number;
  /** Index just past the closing fence line, excluding its newline. */
  end: number;
}

const OPENING_FENCE = /^[ \t]*(`{3,}|~{3,})(.*)$/;

// Split candidates, highest priority first. The chunk ends after the match.
const BREAK_PATTERNS: readonly RegExp[] = [
  /\n{2,}/g,
  /\n/g,
  /[.!?]["')\]]*\s+/g,
  /\s+/g
];

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number) => code >= 0xdc00 && code <= 0xdfff;

/**
 * Locates fenced code blocks (``` or ~~~), at any indentation. A block closes
 * on the first line that starts with a run of the same fence character at least
 * as long as the opener; text after the run stays with the block. A fence that
 * never closes is not a block.
 */
export function findFencedBlocks(text: string): FencedBlock[] {
  const blocks: FencedBlock[] = [];
  let lineStart = 0;

  while (lineStart < text.length) {
    const lineEnd = nextLineEnd(text, lineStart);
    const opening = OPENING_FENCE.exec(text.slice(lineStart, lineEnd));

    // Backtick info strings may not contain backticks.
    if (opening && !(opening[1][0] === '`' && opening[2].includes('`'))) {
      const fenceChar = opening[1][0];
      const closing = new RegExp(`^[ \\t]*\\${fenceChar}{${opening[1].length},}`);
      let searchStart = lineEnd + 1;
      let closed = false;

      while (searchStart <= text.length && lineEnd < text.length) {
        const searchEnd = nextLineEnd(text, searchStart);
        const line = text.slice(searchStart, searchEnd);
        if (closing.test(line)) {
          blocks.push({ start: lineStart, end: searchEnd });
          lineStart = searchEnd + 1;
          closed = true;
          break;
        }
        if (searchEnd >= text.length) break;
        searchStart = searchEnd + 1;
      }

      if (closed) continue;
    }

    lineStart = lineEnd + 1;
  }

  return blocks;
}

/**
 * Splits `text` into chunks of at most `maxChunkSize` characters. The only
 * chunk allowed to be longer is one made of a single fenced block that does
 * not fit on its own. Empty input yields one empty chunk.
 */
export function segment(text: string, maxChunkSize: number = DISCORD_MESSAGE_LIMIT): string[] {
  if (!Number.isInteger(maxChunkSize) || maxChunkSize < 1) {
    throw new RangeError(`maxChunkSize must be a positive integer, received ${maxChunkSize}`);
  }
  if (text.length <= maxChunkSize) {
    return [text];
  }

  const fences = findFencedBlocks(text);
  const insideFence = (position: number) => fences.some((fence) => position > fence.start && position < fence.end);
  const chunks: string[] = [];
  let start = 0;

  while (text.length - start > maxChunkSize) {
    let limit = start + maxChunkSize;
    const crossing = fences.find((fence) => fence.start < limit && fence.end > limit);

    if (crossing) {
      if (crossing.start <= start) {
        // Oversized block at the head of the remainder goes out whole.
        chunks.push(text.slice(start, crossing.end));
        start = crossing.end;
        continue;
      }
      limit = crossing.start;
    }

    const splitAt = findBreak(text, start, limit, insideFence) ?? hardCut(text, start, limit);
    chunks.push(text.slice(start, splitAt));
    start = splitAt;
  }

  if (start < text.length) {
    chunks.push(text.slice(start));
  }

  return chunks;
}

function nextLineEnd(text: string, from: number): number {
  const newline = text.indexOf('\n', from);
  return newline === -1 ? text.length : newline;
}

function findBreak(
  text: string,
  start: number,
  limit: number,
  insideFence: (position: number) => boolean
): number | undefined {
  const window = text.slice(start, limit);

  for (const pattern of BREAK_PATTERNS) {
    pattern.lastIndex = 0;
    let best: number | undefined;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(window)) !== null) {
      const position = start + match.index + match[0].length;
      if (!insideFence(position)) {
        best = position;
      }
    }
    if (best !== undefined) {
      return best;
    }
  }

  return undefined;
}

function hardCut(text: string, start: number, limit: number): number {
  if (isHighSurrogate(text.charCodeAt(limit - 1)) && isLowSurrogate(text.charCodeAt(limit))) {
    // Keep the pair together; with a one-character budget the pair goes out whole.
    return limit - 1 > start ? limit - 1 : limit + 1;
  }
  return limit;
}
