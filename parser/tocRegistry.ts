import { TocEntry } from "./types";

export class TocRegistry {
  private readonly items: TocEntry[] = [];

  /** Headings at nominal level 1 are the document title and are not listed. */
  add(nominalLevel: number, text: string): void {
    if (nominalLevel > 1) {
      this.items.push({ nominalLevel, text });
    }
  }

  get size(): number {
    return this.items.length;
  }

  entries(): readonly TocEntry[] {
    return Object.freeze(this.items.map(entry => Object.freeze({ ...entry })));
  }
}
