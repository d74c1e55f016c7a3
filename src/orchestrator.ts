import { loadSettings, type Settings } from "./config/settings";
import {
  ResearchSession,
  type PromptBindings,
  type ResearchModels,
  type ResearchObservers,
  type ResearchResult
} from "./agents";
import { OpenAIChatModel } from "./llm/openai-client";
import { PromptStore } from "./prompts/prompt-store";
import { ToolDispatcher } from "./tools/registry";
import type { ResearchTool } from "./tools/types";
import { thinkTool } from "./tools/think";
import { createAskModelTool } from "./tools/ask-model";
import { createWebSearchTool } from "./tools/web-search";
import type { Logger } from "./utils/logger";

export type ToolFactory = (models: ResearchModels, settings: Settings) => ResearchTool[];

export interface OrchestratorConfig {
  /** Replaces the OpenAI-backed profiles built from settings. */
  models?: ResearchModels;
  tools?: ToolFactory;
  prompts?: Partial<PromptBindings>;
  /** Shared store; opened from settings when omitted. */
  store?: PromptStore;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Wires settings into the shared pieces of a research run and starts sessions.
 *
 * The prompt store and the tool registry are built once and shared by every session; each
 * session keeps its own conversation state, so sessions may run concurrently.
 */
export class Orchestrator {
  private readonly settings: Settings;
  private readonly config: OrchestratorConfig;
  private storePromise: Promise<PromptStore> | undefined;
  private runtime: { models: ResearchModels; tools: ToolDispatcher } | undefined;

  constructor(settings?: Settings, config?: OrchestratorConfig) {
    this.settings = settings ?? loadSettings();
    this.config = config ?? {};
  }

  /** The shared prompt store, loaded on first use. */
  prompts(): Promise<PromptStore> {
    if (!this.storePromise) {
      const { runtime } = this.settings;
      this.storePromise = this.config.store
        ? Promise.resolve(this.config.store)
        : PromptStore.open({
            assetsRoot: runtime.promptsDir,
            manifestPath: runtime.manifestPath,
            logger: this.config.logger
          }).catch((error: unknown) => {
            this.storePromise = undefined;
            throw error;
          });
    }
    return this.storePromise;
  }

  async createSession(topic: string, observers?: ResearchObservers): Promise<ResearchSession> {
    if (!topic.trim()) {
      throw new Error("A research topic is required");
    }

    const store = await this.prompts();
    const { models, tools } = this.buildRuntime();
    return new ResearchSession(topic, {
      store,
      tools,
      models,
      prompts: this.config.prompts,
      maxIterations: this.settings.runtime.maxIterations,
      observers,
      now: this.config.now
    });
  }

  async run(topic: string, observers?: ResearchObservers): Promise<ResearchResult> {
    const session = await this.createSession(topic, observers);
    return session.run();
  }

  private buildRuntime(): { models: ResearchModels; tools: ToolDispatcher } {
    if (!this.runtime) {
      const models = this.config.models ?? this.defaultModels();
      const tools = (this.config.tools ?? defaultTools)(models, this.settings);
      this.runtime = {
        models,
        tools: new ToolDispatcher(tools, {
          timeoutMs: this.settings.runtime.toolTimeoutMs,
          retries: this.settings.runtime.toolRetries
        })
      };
    }
    return this.runtime;
  }

  private defaultModels(): ResearchModels {
    const { models } = this.settings;
    return {
      decision: new OpenAIChatModel(this.settings, models.decision, `decision:${models.decision.model}`),
      compression: new OpenAIChatModel(this.settings, models.compression, `compression:${models.compression.model}`),
      assessment: new OpenAIChatModel(this.settings, models.assessment, `assessment:${models.assessment.model}`)
    };
  }
}

/** think_tool and ask_model always; tavily_search when a Tavily key is configured. */
export const defaultTools: ToolFactory = (models, settings) => {
  const tools: ResearchTool[] = [thinkTool, createAskModelTool(models.assessment)];
  if (settings.tavilyApiKey) {
    tools.unshift(createWebSearchTool({ apiKey: settings.tavilyApiKey }));
  }
  return tools;
};
