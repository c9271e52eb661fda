import { describe, expect, it } from "vitest";
import { classifyOutput, parseManifestFile, resolveOutputUrl } from "../src/crawl/manifestFile";
import { CrawlerError } from "../src/errors";

describe("parseManifestFile", () => {
  it("keeps output order and tolerates extra fields", () => {
    const manifest = parseManifestFile(
      JSON.stringify({
        transactionTime: "2026-03-01T11:59:00Z",
        request: "https://api.example.org/$bulk-publish",
        error: [],
        output: [
          { type: "Schedule", url: "https://api.example.org/schedules.ndjson" },
          { type: "Location", url: "https://api.example.org/locations.ndjson", extension: { state: ["MA", "RI"] } }
        ]
      })
    );

    expect(manifest.output.map(classifyOutput)).toEqual([
      { kind: "schedule", url: "https://api.example.org/schedules.ndjson", states: [] },
      { kind: "location", url: "https://api.example.org/locations.ndjson", states: ["MA", "RI"] }
    ]);
  });

  it("accepts malformed entries for later classification", () => {
    const manifest = parseManifestFile(JSON.stringify({ output: [{ type: "Slot" }, 7] }));
    expect(manifest.output).toEqual([{ type: "Slot" }, 7]);
  });

  it("rejects bodies that are not JSON", () => {
    expect(() => parseManifestFile("<html>")).toThrowError(
      new CrawlerError("PARSE_FAILED", "Manifest is not valid JSON")
    );
  });

  it("rejects documents without an output list", () => {
    try {
      parseManifestFile(JSON.stringify({ transactionTime: "2026-03-01T11:59:00Z" }));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CrawlerError);
      expect(error instanceof CrawlerError && error.code).toBe("PARSE_FAILED");
      expect(error instanceof Error && error.message).toBe("Manifest failed validation: output: Required");
    }
  });
});

describe("classifyOutput", () => {
  it("maps known types to leaf kinds", () => {
    expect(classifyOutput({ type: "Location", url: "a", extension: { state: ["VT"] } })).toEqual({
      kind: "location",
      url: "a",
      states: ["VT"]
    });
    expect(classifyOutput({ type: "Slot", url: "b" })).toEqual({ kind: "slot", url: "b", states: [] });
  });

  it("defaults a missing state list to empty", () => {
    expect(classifyOutput({ type: "Slot", url: "slots.ndjson", extension: { note: "x" } })).toEqual({
      kind: "slot",
      url: "slots.ndjson",
      states: []
    });
  });

  it("marks malformed entries invalid with the reason", () => {
    expect(classifyOutput({ type: "Slot", url: "slots.ndjson", extension: { state: "MA" } })).toEqual({
      kind: "invalid",
      url: "slots.ndjson",
      reason: "extension.state: Expected array, received string"
    });
    expect(classifyOutput({ type: "Location", url: "" })).toEqual({
      kind: "invalid",
      url: "",
      reason: "url: String must contain at least 1 character(s)"
    });
    expect(classifyOutput("Location")).toEqual({
      kind: "invalid",
      url: null,
      reason: "<entry>: Expected object, received string"
    });
  });

  it("marks every other type unsupported", () => {
    expect(classifyOutput({ type: "location", url: "c" })).toEqual({
      kind: "unsupported",
      fileType: "location",
      url: "c"
    });
    expect(classifyOutput({ type: "constructor", url: "d" }).kind).toBe("unsupported");
  });
});

describe("resolveOutputUrl", () => {
  const manifestUrl = "https://api.example.org/v1/$bulk-publish";

  it("resolves relative references against the manifest", () => {
    expect(resolveOutputUrl("data/slots.ndjson", manifestUrl)).toBe("https://api.example.org/v1/data/slots.ndjson");
    expect(resolveOutputUrl("/slots.ndjson", manifestUrl)).toBe("https://api.example.org/slots.ndjson");
  });

  it("rejects non-http schemes", () => {
    expect(resolveOutputUrl("ftp://files.example.org/slots.ndjson", manifestUrl)).toBeNull();
    expect(resolveOutputUrl("mailto:ops@example.org", manifestUrl)).toBeNull();
  });
});
