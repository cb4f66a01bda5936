/**
 * Result post-processing: fence stripping and body wrapping.
 */

/** Git convention for commit body line length. */
export const BODY_LINE_WIDTH = 72;

const OPENING_FENCE = /^```[\w.+-]*$/;

/**
 * Remove a surrounding ``` fence (optionally with a language tag).
 * Text that is not fenced on both ends is returned unchanged.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```") || !trimmed.endsWith("```")) {
    return text;
  }

  const firstNewline = trimmed.indexOf("\n");
  const closing = trimmed.lastIndexOf("```");
  if (firstNewline === -1 || closing <= firstNewline) {
    return text;
  }
  if (!OPENING_FENCE.test(trimmed.slice(0, firstNewline).trim())) {
    return text;
  }

  return trimmed.slice(firstNewline + 1, closing).trim();
}

function isSentenceEnd(ch: string): boolean {
  return ch === "." || ch === "?" || ch === "!";
}

/**
 * Pick where to break `line`: right after the last sentence end within
 * the last `width` characters, else after the last space, else the whole
 * line (a single word is never split).
 */
function findBreak(line: string, width: number): number {
  for (let i = line.length - 1; i >= 0 && i >= line.length - width; i--) {
    // "..." is not a sentence end
    if (i > 0 && isSentenceEnd(line[i]) && line[i - 1] !== ".") {
      if (i + 1 < line.length && line[i + 1] === " ") {
        return i + 2;
      }
      if (i + 1 >= line.length) {
        return i + 1;
      }
    }
  }

  const lastSpace = line.lastIndexOf(" ");
  return lastSpace > 0 ? lastSpace + 1 : line.length;
}

function wrapParagraph(paragraph: string, width: number): string[] {
  const words = paragraph.replace(/\n/g, " ").split(" ").filter(Boolean);
  const lines: string[] = [];
  let line = "";

  for (const word of words) {
    while (line.length > 0 && line.length + 1 + word.length > width) {
      const breakAt = findBreak(line, width);
      lines.push(line.slice(0, breakAt).trim());
      line = line.slice(breakAt).trimStart();
    }
    line = line ? `${line} ${word}` : word;
  }

  if (line) {
    lines.push(line);
  }
  return lines;
}

/**
 * Reflow a commit message to `width` columns.
 *
 * Paragraphs (separated by blank lines) are wrapped independently and
 * stay separated by one blank line; empty paragraphs are kept as blank
 * lines. The first line is always followed by a blank line, and a first
 * line followed by nothing but blank lines collapses to itself.
 */
export function wrapMessage(message: string, width: number = BODY_LINE_WIDTH): string {
  const paragraphs = message.split("\n\n").map((raw) => {
    const paragraph = raw.trim();
    return paragraph ? wrapParagraph(paragraph, width).join("\n") : "";
  });

  const result = paragraphs.join("\n\n");
  const firstBreak = result.indexOf("\n");
  if (firstBreak === -1) {
    return result;
  }

  const rest = result.slice(firstBreak + 1).replace(/^\n+/, "");
  if (!rest.trim()) {
    return result.slice(0, firstBreak);
  }
  return `${result.slice(0, firstBreak)}\n\n${rest}`;
}
