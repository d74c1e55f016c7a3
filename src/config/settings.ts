import { z } from "zod";
import path from "node:path";
import dotenv from "dotenv";
import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";

const loadedEnvFiles = new Set<string>();

export const DEFAULT_PROMPTS_DIR = fileURLToPath(new URL("../../prompts", import.meta.url));

function loadEnvFile(envPath: string): void {
  if (!envPath || loadedEnvFiles.has(envPath)) {
    return;
  }
  if (!existsSync(envPath)) {
    return;
  }
  dotenv.config({ path: envPath, override: false });
  loadedEnvFiles.add(envPath);
}

export const modelConfigSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2).default(0),
  maxOutputTokens: z.number().int().positive().default(4096)
});

export type ModelConfig = z.infer<typeof modelConfigSchema>;

export const modelProfilesSchema = z.object({
  decision: modelConfigSchema,
  compression: modelConfigSchema,
  assessment: modelConfigSchema
});

export type ModelProfiles = z.infer<typeof modelProfilesSchema>;

export const runtimeConfigSchema = z.object({
  workspaceRoot: z.string(),
  promptsDir: z.string(),
  manifestPath: z.string().optional(),
  maxIterations: z.number().int().positive(),
  toolTimeoutMs: z.number().int().positive(),
  toolRetries: z.number().int().min(0),
  modelTimeoutMs: z.number().int().positive(),
  modelMaxRetries: z.number().int().min(0),
  verbose: z.boolean()
});

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

export const settingsSchema = z.object({
  openAiApiKey: z.string().min(1, "OPENAI_API_KEY must not be empty").or(z.undefined()),
  openAiBaseUrl: z.string().optional(),
  tavilyApiKey: z.string().min(1, "TAVILY_API_KEY must not be empty").or(z.undefined()),
  models: modelProfilesSchema,
  runtime: runtimeConfigSchema
});

export type Settings = z.infer<typeof settingsSchema>;

export interface SettingsOverrides {
  openAiApiKey?: string;
  openAiBaseUrl?: string;
  tavilyApiKey?: string;
  models?: { [K in keyof ModelProfiles]?: Partial<ModelConfig> };
  runtime?: Partial<RuntimeConfig>;
}

export const DEFAULT_MODELS: ModelProfiles = {
  decision: { model: "gpt-4.1", temperature: 0, maxOutputTokens: 4096 },
  compression: { model: "gpt-4.1", temperature: 0, maxOutputTokens: 32000 },
  assessment: { model: "gpt-4.1", temperature: 0, maxOutputTokens: 16000 }
};

function envInteger(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`Failed to load settings: ${name} must be an integer (got '${raw}')`);
  }
  return value;
}

function resolveModel(
  profile: keyof ModelProfiles,
  envVar: string,
  overrides: SettingsOverrides
): ModelConfig {
  const defaults = DEFAULT_MODELS[profile];
  const override = overrides.models?.[profile];
  return {
    model: override?.model ?? process.env[envVar] ?? defaults.model,
    temperature: override?.temperature ?? defaults.temperature,
    maxOutputTokens: override?.maxOutputTokens ?? defaults.maxOutputTokens
  };
}

export function loadSettings(overrides: SettingsOverrides = {}): Settings {
  const cwdEnv = path.resolve(process.cwd(), ".env");
  loadEnvFile(cwdEnv);

  const workspaceRoot = path.resolve(overrides.runtime?.workspaceRoot ?? process.env.RESEARCH_WORKSPACE ?? process.cwd());
  loadEnvFile(path.join(workspaceRoot, ".env"));

  const promptsDir = path.resolve(overrides.runtime?.promptsDir ?? process.env.RESEARCH_PROMPTS_DIR ?? DEFAULT_PROMPTS_DIR);
  const manifestPath = overrides.runtime?.manifestPath ?? process.env.RESEARCH_PROMPTS_MANIFEST;

  const payload = {
    openAiApiKey: overrides.openAiApiKey ?? process.env.OPENAI_API_KEY,
    openAiBaseUrl: overrides.openAiBaseUrl ?? process.env.OPENAI_BASE_URL,
    tavilyApiKey: overrides.tavilyApiKey ?? process.env.TAVILY_API_KEY,
    models: {
      decision: resolveModel("decision", "RESEARCH_DECISION_MODEL", overrides),
      compression: resolveModel("compression", "RESEARCH_COMPRESSION_MODEL", overrides),
      assessment: resolveModel("assessment", "RESEARCH_ASSESSMENT_MODEL", overrides)
    },
    runtime: {
      workspaceRoot,
      promptsDir,
      manifestPath: manifestPath === undefined ? undefined : path.resolve(manifestPath),
      maxIterations: overrides.runtime?.maxIterations ?? envInteger("RESEARCH_MAX_ITERATIONS") ?? 12,
      toolTimeoutMs: overrides.runtime?.toolTimeoutMs ?? 60_000,
      toolRetries: overrides.runtime?.toolRetries ?? 1,
      modelTimeoutMs: overrides.runtime?.modelTimeoutMs ?? 120_000,
      modelMaxRetries: overrides.runtime?.modelMaxRetries ?? 1,
      verbose: overrides.runtime?.verbose ?? false
    }
  } satisfies Settings;

  const parsed = settingsSchema.safeParse(payload);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new Error(`Failed to load settings: ${message}`);
  }

  return parsed.data;
}
