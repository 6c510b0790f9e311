import { describe, it, expect } from "vitest";
import {
  UNSTAMPED_VERSION,
  compareEntityVersions,
  compareWriterTags,
  formatEntityVersion,
  parseEntityVersion,
} from "../src/envelope.js";

describe("formatEntityVersion", () => {
  it("joins tag and counter with a dash", () => {
    expect(formatEntityVersion({ writerTag: "A", counter: 10 })).toBe("A-10");
  });

  it("formats multi-letter tags", () => {
    expect(formatEntityVersion({ writerTag: "AB", counter: 7 })).toBe("AB-7");
  });
});

describe("parseEntityVersion", () => {
  it("parses the on-disk form", () => {
    expect(parseEntityVersion("B-16")).toEqual({ writerTag: "B", counter: 16 });
  });

  it("parses multi-letter tags", () => {
    expect(parseEntityVersion("AA-3")).toEqual({ writerTag: "AA", counter: 3 });
  });

  it("rejects lower-case tags", () => {
    expect(parseEntityVersion("b-16")).toBeUndefined();
  });

  it("rejects composite knowledge strings", () => {
    expect(parseEntityVersion("A-10,B-3")).toBeUndefined();
  });

  it("rejects a missing counter", () => {
    expect(parseEntityVersion("A-")).toBeUndefined();
  });

  it("rejects counters beyond the safe integer range", () => {
    expect(parseEntityVersion("A-99999999999999999999")).toBeUndefined();
  });
});

describe("compareWriterTags", () => {
  it("orders single letters alphabetically", () => {
    expect(compareWriterTags("A", "B")).toBeLessThan(0);
    expect(compareWriterTags("C", "B")).toBeGreaterThan(0);
  });

  it("orders shorter tags first", () => {
    expect(compareWriterTags("Z", "AA")).toBeLessThan(0);
  });

  it("returns 0 for equal tags", () => {
    expect(compareWriterTags("AB", "AB")).toBe(0);
  });
});

describe("compareEntityVersions", () => {
  it("orders by counter regardless of writer", () => {
    expect(
      compareEntityVersions({ writerTag: "Z", counter: 10 }, { writerTag: "A", counter: 15 }),
    ).toBeLessThan(0);
  });

  it("breaks counter ties by writer tag", () => {
    expect(
      compareEntityVersions({ writerTag: "B", counter: 12 }, { writerTag: "A", counter: 12 }),
    ).toBeGreaterThan(0);
  });

  it("sorts the unstamped version before any minted one", () => {
    expect(compareEntityVersions(UNSTAMPED_VERSION, { writerTag: "A", counter: 1 })).toBeLessThan(0);
  });
});
