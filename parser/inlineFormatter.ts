import { Run } from "./types";

const MARKER = "**";

/**
 * Splits a line into plain and bold runs. A `**` opener pairs with the first
 * `**` that starts at least one character after it. Text between pairs is a
 * single token: plain, unless the whole token is wrapped in markers (`****`
 * gives an empty bold run). Stray markers stay literal.
 */
export function formatInline(content: string): Run[] {
  const runs: Run[] = [];
  let cursor = 0;

  while (cursor < content.length) {
    const open = content.indexOf(MARKER, cursor);
    if (open === -1) break;

    const close = content.indexOf(MARKER, open + MARKER.length + 1);
    // No closer for this opener means none for any later opener either
    if (close === -1) break;

    pushToken(runs, content.slice(cursor, open));
    runs.push({ text: content.slice(open + MARKER.length, close), bold: true });
    cursor = close + MARKER.length;
  }

  pushToken(runs, content.slice(cursor));
  return runs;
}

function pushToken(runs: Run[], text: string): void {
  if (text.length >= 2 * MARKER.length && text.startsWith(MARKER) && text.endsWith(MARKER)) {
    runs.push({ text: text.slice(MARKER.length, -MARKER.length), bold: true });
  } else if (text) {
    runs.push({ text, bold: false });
  }
}

export function runsToText(runs: readonly Run[]): string {
  return runs.map(r => r.text).join("");
}
