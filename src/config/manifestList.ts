import { z } from "zod";
import { readText } from "../utils/fs";

const ManifestUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "must be an http(s) URL");

export interface ManifestListEntry {
  line: number;
  url: string;
}

export interface ManifestListIssue {
  line: number;
  text: string;
  message: string;
}

export interface ManifestList {
  urls: ManifestListEntry[];
  issues: ManifestListIssue[];
}

/** One URL per line; blank lines and `#` comments are ignored. */
export function parseManifestList(content: string): ManifestList {
  const urls: ManifestListEntry[] = [];
  const issues: ManifestListIssue[] = [];

  content.split(/\r?\n/).forEach((raw, index) => {
    const text = raw.trim();
    if (!text || text.startsWith("#")) return;
    const line = index + 1;
    const parsed = ManifestUrlSchema.safeParse(text);
    if (parsed.success) {
      urls.push({ line, url: parsed.data });
    } else {
      issues.push({ line, text, message: parsed.error.issues.map((issue) => issue.message).join("; ") });
    }
  });

  return { urls, issues };
}

export async function loadManifestList(filePath: string): Promise<ManifestList> {
  return parseManifestList(await readText(filePath));
}

export function validateManifestUrl(url: string): string {
  return ManifestUrlSchema.parse(url);
}
