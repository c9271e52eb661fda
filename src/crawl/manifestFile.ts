import { z } from "zod";
import { CrawlerError } from "../errors";
import type { LeafKind } from "../types/records";

const ManifestOutputSchema = z.object({
  type: z.string(),
  url: z.string().min(1),
  extension: z
    .object({
      state: z.array(z.string()).default([])
    })
    .passthrough()
    .optional()
});

export const ManifestFileSchema = z
  .object({
    transactionTime: z.string().optional(),
    request: z.string().optional(),
    // Entries are checked one at a time by classifyOutput.
    output: z.array(z.unknown())
  })
  .passthrough();

export type ManifestFile = z.infer<typeof ManifestFileSchema>;

export type LeafDescriptor =
  | { kind: LeafKind; url: string; states: string[] }
  | { kind: "unsupported"; fileType: string; url: string }
  | { kind: "invalid"; url: string | null; reason: string };

const KIND_BY_FILE_TYPE: ReadonlyMap<string, LeafKind> = new Map<string, LeafKind>([
  ["Location", "location"],
  ["Schedule", "schedule"],
  ["Slot", "slot"]
]);

export function parseManifestFile(body: string): ManifestFile {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new CrawlerError("PARSE_FAILED", "Manifest is not valid JSON", { cause: error });
  }

  const parsed = ManifestFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`
    );
    throw new CrawlerError("PARSE_FAILED", `Manifest failed validation: ${issues.join("; ")}`, {
      details: { issues }
    });
  }
  return parsed.data;
}

/** Resolves `href` against the manifest URL; null when it is not an http(s) URL. */
export function resolveOutputUrl(href: string, manifestUrl: string): string | null {
  try {
    const resolved = new URL(href, manifestUrl);
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") return null;
    return resolved.toString();
  } catch {
    return null;
  }
}

function rawUrl(entry: unknown): string | null {
  if (typeof entry !== "object" || entry === null || !("url" in entry)) return null;
  return typeof entry.url === "string" ? entry.url : null;
}

/** Classifies one `output[]` entry; a malformed entry affects only itself. */
export function classifyOutput(entry: unknown): LeafDescriptor {
  const parsed = ManifestOutputSchema.safeParse(entry);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<entry>"}: ${issue.message}`)
      .join("; ");
    return { kind: "invalid", url: rawUrl(entry), reason };
  }

  const output = parsed.data;
  const kind = KIND_BY_FILE_TYPE.get(output.type);
  if (!kind) {
    return { kind: "unsupported", fileType: output.type, url: output.url };
  }
  return { kind, url: output.url, states: output.extension?.state ?? [] };
}
