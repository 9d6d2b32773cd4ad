import { describe, expect, it } from "vitest";
import { formatInline, runsToText } from "./inlineFormatter";

describe("formatInline", () => {
  it("splits bold spans out of plain text", () => {
    expect(formatInline("This **changed**.")).toEqual([
      { text: "This ", bold: false },
      { text: "changed", bold: true },
      { text: ".", bold: false },
    ]);
  });

  it("returns a single bold run for a fully bold line", () => {
    expect(formatInline("**bold**")).toEqual([{ text: "bold", bold: true }]);
  });

  it("keeps an unterminated marker as literal text", () => {
    expect(formatInline("**unterminated bold")).toEqual([{ text: "**unterminated bold", bold: false }]);
  });

  it("pairs what it can and leaves the odd marker literal", () => {
    expect(formatInline("**a** and **b")).toEqual([
      { text: "a", bold: true },
      { text: " and **b", bold: false },
    ]);
  });

  it("turns a bare pair of markers into an empty bold run", () => {
    expect(formatInline("****")).toEqual([{ text: "", bold: true }]);
  });

  it("leaves three markers and markers inside other text literal", () => {
    expect(formatInline("***")).toEqual([{ text: "***", bold: false }]);
    expect(formatInline("x **** y")).toEqual([{ text: "x **** y", bold: false }]);
  });

  it("pairs an opener with the first closer after at least one character", () => {
    expect(formatInline("***a**")).toEqual([{ text: "*a", bold: true }]);
  });

  it("handles several bold spans on one line", () => {
    expect(formatInline("**x** then **y**!")).toEqual([
      { text: "x", bold: true },
      { text: " then ", bold: false },
      { text: "y", bold: true },
      { text: "!", bold: false },
    ]);
  });

  it("returns no runs for empty content", () => {
    expect(formatInline("")).toEqual([]);
  });
});

describe("runsToText", () => {
  it("reconstructs the visible text", () => {
    expect(runsToText(formatInline("Use **this** flag"))).toBe("Use this flag");
  });
});
