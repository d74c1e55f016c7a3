import path from "node:path";
import { z } from "zod";
import { parse as parseYAML } from "yaml";
import { errorMessage } from "../utils/errors";
import { AssetLoadError, PromptStoreError } from "./errors";
import { computeFingerprint, type PromptTemplate } from "./template";

export const LATEST = "latest";

// YAML turns `1.0` or `2025` into numbers; versions, dates and authors are always strings here.
const scalarText = z.union([z.string(), z.number()]).transform(String);

// A blank `latest:` means no declared latest.
export const manifestEntrySchema = z.object({
  latest: scalarText.nullish(),
  description: z.string().nullish()
});

export type ManifestEntry = z.infer<typeof manifestEntrySchema>;

export const manifestSchema = z.object({
  prompts: z
    .record(z.string(), manifestEntrySchema.nullish().transform((entry): ManifestEntry => entry ?? {}))
    .nullish()
    .transform((prompts): Record<string, ManifestEntry> => prompts ?? {}),
  settings: z
    .record(z.string(), z.unknown())
    .nullish()
    .transform((settings): Record<string, unknown> => settings ?? {})
});

export type PromptManifest = z.infer<typeof manifestSchema>;

export const EMPTY_MANIFEST: PromptManifest = { prompts: {}, settings: {} };

export const assetHeaderSchema = z.object({
  author: scalarText.default("unknown"),
  date: scalarText.default("unknown"),
  changes: z.string().default(""),
  tags: z.array(scalarText).default([]),
  model_hints: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).default({})
});

export type AssetHeader = z.infer<typeof assetHeaderSchema>;

const FRONT_MATTER = /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n|$)/;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseManifest(text: string, source: string): PromptManifest {
  let data: unknown;
  try {
    data = parseYAML(text);
  } catch (error) {
    throw new PromptStoreError(`Manifest ${source} is not valid YAML: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = manifestSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw new PromptStoreError(`Manifest ${source} is invalid: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Splits an asset into its YAML header (absent header means `{}`) and trimmed body. */
export function splitFrontMatter(text: string): { header: string | undefined; body: string } {
  const normalized = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const match = FRONT_MATTER.exec(normalized);
  if (!match) {
    return { header: undefined, body: normalized.trim() };
  }
  return { header: match[1], body: normalized.slice(match[0].length).trim() };
}

export function parsePromptAsset(text: string, name: string, version: string, source: string): PromptTemplate {
  const { header, body } = splitFrontMatter(text);

  let data: unknown = {};
  if (header !== undefined) {
    try {
      data = parseYAML(header) ?? {};
    } catch (error) {
      throw new AssetLoadError(source, `invalid front matter: ${errorMessage(error)}`, { cause: error });
    }
  }

  const parsed = assetHeaderSchema.safeParse(data);
  if (!parsed.success) {
    throw new AssetLoadError(source, formatIssues(parsed.error));
  }

  const metadata = parsed.data;
  return Object.freeze({
    name,
    version,
    body,
    author: metadata.author,
    date: metadata.date,
    changes: metadata.changes,
    tags: Object.freeze([...metadata.tags]),
    modelHints: Object.freeze({ ...metadata.model_hints }),
    fingerprint: computeFingerprint(body),
    source
  });
}

export function versionFromFileName(fileName: string): string | undefined {
  return path.extname(fileName) === ".md" ? path.basename(fileName, ".md") : undefined;
}
