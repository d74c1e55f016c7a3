import path from "node:path";
import type { ModelHintValue, PromptTemplate } from "./template";

export type PromptAttributes = Record<string, ModelHintValue>;

export interface PromptTagMetadata {
  "metadata.prompt_name": string;
  "metadata.prompt_version": string;
  "metadata.prompt_author": string;
  "metadata.prompt_date": string;
  "metadata.prompt_tags": string;
  "metadata.prompt_hash": string;
  /** Name, version and the template's own tags, for filtering traces. */
  tags: string[];
}

/**
 * Flat attribute set describing a resolved template, for span attributes or analytics rows.
 * Model hints are namespaced under `model.hint.`.
 */
export function promptAttributes(template: PromptTemplate): PromptAttributes {
  const attributes: PromptAttributes = {
    "prompt.name": template.name,
    "prompt.version": template.version,
    "prompt.author": template.author,
    "prompt.date": template.date,
    "prompt.hash": template.fingerprint,
    "prompt.tags": template.tags.join(","),
    "prompt.file": path.basename(template.source)
  };

  for (const [key, value] of Object.entries(template.modelHints)) {
    attributes[`model.hint.${key}`] = value;
  }

  return attributes;
}

export function promptTagMetadata(template: PromptTemplate): PromptTagMetadata {
  return {
    "metadata.prompt_name": template.name,
    "metadata.prompt_version": template.version,
    "metadata.prompt_author": template.author,
    "metadata.prompt_date": template.date,
    "metadata.prompt_tags": template.tags.join(","),
    "metadata.prompt_hash": template.fingerprint,
    tags: [template.name, template.version, ...template.tags]
  };
}
