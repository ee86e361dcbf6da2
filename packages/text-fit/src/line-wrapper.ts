// ─── Text Normalization ───────────────────────────────────────────────

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Length in code points, so astral emoji count as one character. */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

// ─── Greedy Wrap ──────────────────────────────────────────────────────

/**
 * Greedy word wrap. Tokens are whitespace-delimited; a token longer than the
 * budget first fills the rest of the current line, then is cut into
 * budget-sized pieces. Never hyphenated.
 */
export function wrapLines(text: string, charsPerLine: number): string[] {
  const normalized = collapseWhitespace(text);
  if (!normalized) return [];

  const budget = Math.max(1, Math.floor(charsPerLine));
  const lines: string[] = [];
  let current: string[] = [];

  for (const token of normalized.split(' ')) {
    const chars = Array.from(token);

    if (chars.length > budget) {
      let remainder = chars;
      if (current.length > 0) {
        // Whatever room is left after the separating space takes the head of the token
        const room = budget - current.length - 1;
        if (room >= 1) {
          current = [...current, ' ', ...remainder.slice(0, room)];
          remainder = remainder.slice(room);
        }
        lines.push(current.join(''));
        current = [];
      }
      while (remainder.length > budget) {
        lines.push(remainder.slice(0, budget).join(''));
        remainder = remainder.slice(budget);
      }
      current = remainder;
      continue;
    }

    const candidateLength = current.length === 0 ? chars.length : current.length + 1 + chars.length;
    if (candidateLength <= budget) {
      current = current.length === 0 ? chars : [...current, ' ', ...chars];
    } else {
      lines.push(current.join(''));
      current = chars;
    }
  }

  if (current.length > 0) lines.push(current.join(''));
  return lines;
}
