import { createHash } from "node:crypto";
import { MissingVariableError } from "./errors";

export type ModelHintValue = string | number | boolean;

export type TemplateVariables = Record<string, string | number | boolean>;

export interface PromptTemplate {
  readonly name: string;
  readonly version: string;
  readonly body: string;
  readonly author: string;
  readonly date: string;
  readonly changes: string;
  readonly tags: readonly string[];
  readonly modelHints: Readonly<Record<string, ModelHintValue>>;
  readonly fingerprint: string;
  readonly source: string;
}

export const FINGERPRINT_LENGTH = 12;

// `{{` and `}}` are literal braces; any other `{...}` is a placeholder named by its whole content.
const TOKEN_PATTERN = /\{\{|\}\}|\{([^{}]*)\}/g;

export function computeFingerprint(body: string): string {
  return createHash("sha256").update(body, "utf8").digest("hex").slice(0, FINGERPRINT_LENGTH);
}

/** Placeholder names in order of first appearance. */
export function listPlaceholders(body: string): string[] {
  const names: string[] = [];
  for (const match of body.matchAll(TOKEN_PATTERN)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

export function renderTemplate(template: PromptTemplate, variables: TemplateVariables): string {
  const missing = listPlaceholders(template.body).filter((name) => !Object.hasOwn(variables, name));
  if (missing.length) {
    throw new MissingVariableError(template.name, template.version, missing);
  }

  return template.body.replace(TOKEN_PATTERN, (token: string, name: string | undefined) => {
    if (name === undefined) {
      return token === "{{" ? "{" : "}";
    }
    return String(variables[name]);
  });
}
