import type { PromptStore } from "../prompts/prompt-store";
import type { PromptTemplate, TemplateVariables } from "../prompts/template";
import type { ResearchState } from "./research-state";

/** Which stored prompt a step uses. Without `version` the manifest's latest is taken. */
export interface PromptBinding {
  name: string;
  version?: string;
}

export interface PromptBindings {
  decision: PromptBinding;
  compressionSystem: PromptBinding;
  compressionHuman: PromptBinding;
  qa: PromptBinding;
}

export const DEFAULT_PROMPT_BINDINGS: PromptBindings = {
  decision: { name: "research_agent" },
  compressionSystem: { name: "compress_research_system" },
  compressionHuman: { name: "compress_research_human" },
  qa: { name: "research_qa" }
};

export interface AgentContext {
  store: PromptStore;
  prompts: PromptBindings;
  state: ResearchState;
  now: () => Date;
  /** Called with every template a step resolves, for the session's prompt report. */
  recordPrompt: (template: PromptTemplate) => void;
}

export abstract class Agent<TResult> {
  abstract readonly name: string;
  abstract readonly description: string;
  protected readonly context: AgentContext;

  constructor(context: AgentContext) {
    this.context = context;
  }

  abstract run(): Promise<TResult>;

  protected renderPrompt(binding: PromptBinding, variables: TemplateVariables): string {
    return renderBoundPrompt(this.context, binding, variables);
  }
}

export function renderBoundPrompt(
  context: Pick<AgentContext, "store" | "recordPrompt">,
  binding: PromptBinding,
  variables: TemplateVariables
): string {
  const template = context.store.resolve(binding.name, binding.version);
  context.recordPrompt(template);
  return context.store.render(template, variables);
}
