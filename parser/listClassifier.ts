import { ListKind } from "./types";

export type ClassifiedLine =
  | { kind: ListKind; content: string }
  | { kind: "paragraph"; content: string };

const BULLET_PREFIX = "- ";
const NUMBERED_PREFIX = /^\d+\. /;

/**
 * Bullet is checked before numbered, numbered before paragraph.
 */
export function classifyLine(line: string): ClassifiedLine {
  const trimmed = line.trimStart();

  if (trimmed.startsWith(BULLET_PREFIX)) {
    return { kind: "bullet", content: trimmed.slice(BULLET_PREFIX.length) };
  }

  const numbered = NUMBERED_PREFIX.exec(trimmed);
  if (numbered) {
    return { kind: "numbered", content: trimmed.slice(numbered[0].length) };
  }

  return { kind: "paragraph", content: line };
}
