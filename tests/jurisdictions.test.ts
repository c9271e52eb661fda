import { describe, expect, it } from "vitest";
import { resolveJurisdictions, stateIdForCode, STATES } from "../src/crawl/jurisdictions";

describe("jurisdictions", () => {
  it("loads the fixed 57-code table with unique ids and codes", () => {
    expect(STATES).toHaveLength(57);
    expect(new Set(STATES.map((row) => row.id)).size).toBe(57);
    expect(new Set(STATES.map((row) => row.code)).size).toBe(57);
  });

  it("keeps the stable ids", () => {
    expect(stateIdForCode("AL")).toBe(1);
    expect(stateIdForCode("MA")).toBe(22);
    expect(stateIdForCode("UM")).toBe(57);
  });

  it("matches codes case-insensitively", () => {
    expect(stateIdForCode(" ma ")).toBe(22);
  });

  it("returns null for codes outside the table", () => {
    expect(stateIdForCode("ZZ")).toBeNull();
    expect(stateIdForCode("")).toBeNull();
  });

  it("splits annotations into ids and unknown codes", () => {
    expect(resolveJurisdictions(["MA", "ZZ", "ma", "XX"])).toEqual({
      stateIds: [22],
      unknownCodes: ["ZZ", "XX"]
    });
  });
});
