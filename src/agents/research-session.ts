import { DecisionEngine } from "../decision/engine";
import type { AssistantTurn, ChatModel, ConversationTurn, ToolCallRequest } from "../llm/types";
import type { PromptStore } from "../prompts/prompt-store";
import type { PromptTemplate } from "../prompts/template";
import { promptAttributes, type PromptAttributes } from "../prompts/telemetry";
import type { ToolDispatcher, ToolResult } from "../tools/registry";
import { errorMessage } from "../utils/errors";
import { DEFAULT_PROMPT_BINDINGS, type AgentContext, type PromptBindings } from "./agent-base";
import { CompressorAgent } from "./compressor-agent";
import { QualityAssessorAgent } from "./quality-assessor-agent";
import { ResearchPhase, ResearchState } from "./research-state";

export const DEFAULT_MAX_ITERATIONS = 12;

export interface ResearchModels {
  /** Must support tool calls. */
  decision: ChatModel;
  compression: ChatModel;
  assessment: ChatModel;
}

export interface ResearchObservers {
  onStateChange?: (from: ResearchPhase, to: ResearchPhase) => void;
  onDecision?: (turn: AssistantTurn) => void;
  onToolCall?: (request: ToolCallRequest) => void;
  onToolResult?: (result: ToolResult) => void;
  onForcedCompression?: (iterations: number) => void;
  onStatus?: (message: string) => void;
}

export interface ResearchSessionOptions {
  store: PromptStore;
  tools: ToolDispatcher;
  models: ResearchModels;
  prompts?: Partial<PromptBindings>;
  /** Tool batches allowed before compression is forced. */
  maxIterations?: number;
  observers?: ResearchObservers;
  now?: () => Date;
}

export interface ResearchResult {
  researchTopic: string;
  compressedResearch: string;
  rawNotes: string[];
  qaReport: string;
  iterations: number;
  turns: ConversationTurn[];
  /** Telemetry attributes of every template the session resolved, keyed `name@version`. */
  prompts: Record<string, PromptAttributes>;
}

export class ResearchSessionError extends Error {
  readonly phase: ResearchPhase;

  constructor(phase: ResearchPhase, cause: unknown) {
    super(`Research session failed during ${phase}: ${errorMessage(cause)}`, { cause });
    this.name = "ResearchSessionError";
    this.phase = phase;
  }
}

/**
 * One research run: INIT → DECIDE ⇄ TOOL_EXEC → COMPRESS → ASSESS → DONE.
 *
 * DECIDE branches only on whether the new assistant turn requested tools. After
 * `maxIterations` answered tool batches the session compresses instead of deciding again.
 * A failure in any phase ends the session: `step` and `run` reject with a
 * {@link ResearchSessionError} from then on.
 */
export class ResearchSession {
  readonly state: ResearchState;
  private phase = ResearchPhase.Init;
  private failure: ResearchSessionError | undefined;
  private readonly context: AgentContext;
  private readonly options: ResearchSessionOptions;
  private readonly maxIterations: number;
  private readonly resolvedPrompts = new Map<string, PromptTemplate>();

  constructor(researchTopic: string, options: ResearchSessionOptions) {
    const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer (got ${maxIterations})`);
    }

    this.options = options;
    this.maxIterations = maxIterations;
    this.state = new ResearchState(researchTopic);
    this.state.appendHuman(researchTopic);
    this.context = {
      store: options.store,
      prompts: { ...DEFAULT_PROMPT_BINDINGS, ...options.prompts },
      state: this.state,
      now: options.now ?? (() => new Date()),
      recordPrompt: (template) => {
        this.resolvedPrompts.set(`${template.name}@${template.version}`, template);
      }
    };
  }

  get currentPhase(): ResearchPhase {
    return this.phase;
  }

  /** Runs the current phase and moves to the next one. */
  async step(): Promise<ResearchPhase> {
    if (this.failure) {
      throw this.failure;
    }
    if (this.phase === ResearchPhase.Done) {
      return this.phase;
    }

    const from = this.phase;
    let next: ResearchPhase;
    try {
      next = await this.advance(from);
    } catch (error) {
      this.failure = new ResearchSessionError(from, error);
      throw this.failure;
    }

    this.phase = next;
    this.options.observers?.onStateChange?.(from, next);
    return next;
  }

  async run(): Promise<ResearchResult> {
    while (this.phase !== ResearchPhase.Done) {
      await this.step();
    }
    return this.result();
  }

  result(): ResearchResult {
    const snapshot = this.state.snapshot();
    const prompts: Record<string, PromptAttributes> = {};
    for (const [key, template] of this.resolvedPrompts) {
      prompts[key] = promptAttributes(template);
    }
    return {
      researchTopic: snapshot.researchTopic,
      compressedResearch: snapshot.compressedResearch,
      rawNotes: [...snapshot.rawNotes],
      qaReport: snapshot.qaReport,
      iterations: snapshot.iterations,
      turns: [...snapshot.turns],
      prompts
    };
  }

  private async advance(phase: ResearchPhase): Promise<ResearchPhase> {
    const { observers, models } = this.options;

    switch (phase) {
      case ResearchPhase.Init:
        return ResearchPhase.Decide;

      case ResearchPhase.Decide: {
        const engine = new DecisionEngine(this.context, models.decision, this.options.tools);
        const { turn, next } = await engine.decide();
        this.state.appendAssistant(turn);
        observers?.onDecision?.(turn);
        return next;
      }

      case ResearchPhase.ToolExec: {
        const pending = this.state.pendingToolCalls();
        pending.forEach((request) => observers?.onToolCall?.(request));
        const results = await this.options.tools.invoke(pending);
        this.state.appendToolResults(results);
        results.forEach((result) => observers?.onToolResult?.(result));

        if (this.state.iterations >= this.maxIterations) {
          observers?.onForcedCompression?.(this.state.iterations);
          return ResearchPhase.Compress;
        }
        return ResearchPhase.Decide;
      }

      case ResearchPhase.Compress: {
        observers?.onStatus?.("Compressing research findings...");
        const compression = await new CompressorAgent(this.context, models.compression).run();
        this.state.setCompression(compression.compressedResearch, compression.rawNotes);
        return ResearchPhase.Assess;
      }

      case ResearchPhase.Assess: {
        observers?.onStatus?.("Assessing report quality...");
        const report = await new QualityAssessorAgent(this.context, models.assessment).run();
        this.state.setQaReport(report);
        return ResearchPhase.Done;
      }

      case ResearchPhase.Done:
        return ResearchPhase.Done;
    }
  }
}
