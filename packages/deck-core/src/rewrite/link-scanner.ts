/**
 * @module @deckwright/core/rewrite/link-scanner
 * Finds the destinations of inline markdown links and images.
 *
 * Fenced and indented code blocks and inline code spans are masked out first; brackets
 * inside a code span still belong to the surrounding link text, but a link
 * never spans a fence.
 */

export interface LinkDestination {
  /** Offset of the first destination character (inside `<>` when angled) */
  start: number;
  /** Offset just past the last destination character */
  end: number;
  target: string;
  angled: boolean;
  image: boolean;
}

const Mask = {
  Text: 0,
  CodeSpan: 1,
  Fence: 2,
} as const;

const FENCE = /^ {0,3}(`{3,}|~{3,})(.*)$/;
const LIST_ITEM = /^ {0,3}([-+*]|\d{1,9}[.)])([ \t]|$)/;
const ATX_HEADING = /^ {0,3}#{1,6}([ \t]|$)/;

interface ParsedLink {
  textStart: number;
  textEnd: number;
  destination: Omit<LinkDestination, 'image'>;
  end: number;
}

/**
 * Scan markdown for `[text](target)` and `![alt](target)` destinations,
 * returned in document order. Malformed syntax is skipped.
 */
export function scanLinkDestinations(markdown: string): LinkDestination[] {
  const mask = buildCodeMask(markdown);
  const found: LinkDestination[] = [];
  scanRange(markdown, mask, 0, markdown.length, found);
  return found.sort((a, b) => a.start - b.start);
}

function scanRange(
  text: string,
  mask: Uint8Array,
  from: number,
  to: number,
  found: LinkDestination[]
): void {
  let i = from;
  while (i < to) {
    if (mask[i] !== Mask.Text) {
      i++;
      continue;
    }

    const ch = text[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }

    if (ch === '[') {
      const link = parseInlineLink(text, mask, i, to);
      if (link) {
        found.push({ ...link.destination, image: i > 0 && text[i - 1] === '!' && !isEscaped(text, i - 1) });
        // Link text may hold an image: [![alt](a.png)](b.md)
        scanRange(text, mask, link.textStart, link.textEnd, found);
        i = link.end;
        continue;
      }
    }

    i++;
  }
}

function parseInlineLink(text: string, mask: Uint8Array, open: number, limit: number): ParsedLink | undefined {
  const close = findClosingBracket(text, mask, open, limit);
  if (close === undefined || text[close + 1] !== '(' || mask[close + 1] !== Mask.Text) {
    return undefined;
  }

  let k = skipWhitespace(text, close + 2, limit);
  if (k >= limit) {
    return undefined;
  }

  let start: number;
  let end: number;
  let angled = false;

  if (text[k] === '<') {
    angled = true;
    start = k + 1;
    let m = start;
    while (m < limit && text[m] !== '>') {
      if (text[m] === '\n' || text[m] === '<') {
        return undefined;
      }
      m += text[m] === '\\' ? 2 : 1;
    }
    if (m >= limit) {
      return undefined;
    }
    end = m;
    k = m + 1;
  } else {
    start = k;
    let depth = 0;
    let m = k;
    while (m < limit) {
      const ch = text[m];
      if (ch === '\\') {
        m += 2;
        continue;
      }
      if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
        break;
      }
      if (ch === '(') {
        depth++;
      } else if (ch === ')') {
        if (depth === 0) {
          break;
        }
        depth--;
      }
      m++;
    }
    if (depth !== 0 || m > limit) {
      return undefined;
    }
    end = m;
    k = m;
  }

  const afterDestination = k;
  k = skipWhitespace(text, k, limit);

  const opener = text[k];
  if (opener === '"' || opener === "'" || opener === '(') {
    if (k === afterDestination) {
      return undefined;
    }
    const closer = opener === '(' ? ')' : opener;
    let m = k + 1;
    while (m < limit && text[m] !== closer) {
      m += text[m] === '\\' ? 2 : 1;
    }
    if (m >= limit) {
      return undefined;
    }
    k = skipWhitespace(text, m + 1, limit);
  }

  if (text[k] !== ')') {
    return undefined;
  }

  return {
    textStart: open + 1,
    textEnd: close,
    destination: { start, end, target: text.slice(start, end), angled },
    end: k + 1,
  };
}

function findClosingBracket(text: string, mask: Uint8Array, open: number, limit: number): number | undefined {
  let depth = 0;
  let j = open + 1;
  while (j < limit) {
    if (mask[j] === Mask.Fence) {
      return undefined;
    }
    if (mask[j] === Mask.CodeSpan) {
      j++;
      continue;
    }
    const ch = text[j];
    if (ch === '\\') {
      j += 2;
      continue;
    }
    if (ch === '[') {
      depth++;
    } else if (ch === ']') {
      if (depth === 0) {
        return j;
      }
      depth--;
    }
    j++;
  }
  return undefined;
}

function skipWhitespace(text: string, from: number, limit: number): number {
  let k = from;
  while (k < limit && (text[k] === ' ' || text[k] === '\t' || text[k] === '\n' || text[k] === '\r')) {
    k++;
  }
  return k;
}

function isEscaped(text: string, index: number): boolean {
  let backslashes = 0;
  for (let i = index - 1; i >= 0 && text[i] === '\\'; i--) {
    backslashes++;
  }
  return backslashes % 2 === 1;
}

/**
 * Mark fenced and indented code blocks, then inline code spans
 */
function buildCodeMask(text: string): Uint8Array {
  const mask = new Uint8Array(text.length);
  markFences(text, mask);
  markIndentedBlocks(text, mask);
  markCodeSpans(text, mask);
  return mask;
}

/**
 * A line indented four columns or more is code when it follows a blank line,
 * a heading or another code line. It never interrupts a paragraph, and inside
 * a list it is item content instead.
 */
function markIndentedBlocks(text: string, mask: Uint8Array): void {
  let offset = 0;
  let canStart = true;
  let inCode = false;
  let inList = false;

  for (const line of text.split('\n')) {
    const lineEnd = offset + line.length;

    if (offset < text.length && mask[offset] === Mask.Fence) {
      canStart = true;
      inCode = false;
    } else if (line.trim() === '') {
      canStart = true;
    } else {
      const indented = indentWidth(line) >= 4;
      if (indented && (inCode || (canStart && !inList))) {
        mask.fill(Mask.Fence, offset, lineEnd);
        inCode = true;
        canStart = true;
      } else {
        if (!indented) {
          if (LIST_ITEM.test(line)) {
            inList = true;
          } else if (canStart && !inCode) {
            inList = false;
          }
        }
        inCode = false;
        canStart = !indented && ATX_HEADING.test(line);
      }
    }

    offset = lineEnd + 1;
  }
}

function indentWidth(line: string): number {
  let width = 0;
  for (const ch of line) {
    if (ch === ' ') {
      width++;
    } else if (ch === '\t') {
      width += 4 - (width % 4);
    } else {
      break;
    }
  }
  return width;
}

function markFences(text: string, mask: Uint8Array): void {
  let offset = 0;
  let open: { marker: string; length: number; start: number } | undefined;

  for (const line of text.split('\n')) {
    const lineEnd = offset + line.length;
    const match = FENCE.exec(line);
    const run = match?.[1];

    if (open) {
      if (run && run[0] === open.marker && run.length >= open.length && (match?.[2] ?? '').trim() === '') {
        mask.fill(Mask.Fence, open.start, Math.min(lineEnd + 1, text.length));
        open = undefined;
      }
    } else if (run && !(run[0] === '`' && (match?.[2] ?? '').includes('`'))) {
      open = { marker: run[0] ?? '`', length: run.length, start: offset };
    }

    offset = lineEnd + 1;
  }

  // An unclosed fence runs to the end of the document
  if (open) {
    mask.fill(Mask.Fence, open.start, text.length);
  }
}

function markCodeSpans(text: string, mask: Uint8Array): void {
  let i = 0;
  while (i < text.length) {
    if (mask[i] !== Mask.Text || text[i] !== '`') {
      i++;
      continue;
    }

    const runLength = backtickRun(text, i);
    if (isEscaped(text, i)) {
      i += 1;
      continue;
    }

    const closing = findClosingRun(text, mask, i + runLength, runLength);
    if (closing === undefined) {
      i += runLength;
      continue;
    }

    mask.fill(Mask.CodeSpan, i, closing + runLength);
    i = closing + runLength;
  }
}

function backtickRun(text: string, from: number): number {
  let n = 0;
  while (text[from + n] === '`') {
    n++;
  }
  return n;
}

function findClosingRun(text: string, mask: Uint8Array, from: number, length: number): number | undefined {
  let j = from;
  while (j < text.length) {
    if (mask[j] === Mask.Fence) {
      return undefined;
    }
    if (text[j] === '`') {
      const run = backtickRun(text, j);
      if (run === length) {
        return j;
      }
      j += run;
      continue;
    }
    j++;
  }
  return undefined;
}
