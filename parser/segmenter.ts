import { Segment } from "./types";

const HEADING_LINE = /^#+.+$/;

export function isHeadingLine(line: string): boolean {
  return HEADING_LINE.test(line);
}

/**
 * Splits text into heading lines and the body text between them, in order.
 */
export function segmentText(text: string): Segment[] {
  const segments: Segment[] = [];
  let body: string[] = [];

  const flushBody = () => {
    if (body.some(line => line.trim())) {
      segments.push({ kind: "body", lines: body });
    }
    body = [];
  };

  for (const line of text.replace(/\r\n?/g, "\n").split("\n")) {
    if (isHeadingLine(line)) {
      flushBody();
      segments.push({ kind: "heading", line });
    } else {
      body.push(line);
    }
  }
  flushBody();

  return segments;
}
