import type { AgentContext } from "../agents/agent-base";
import { renderBoundPrompt } from "../agents/agent-base";
import { ResearchPhase } from "../agents/research-state";
import type { AssistantTurn, ChatModel } from "../llm/types";
import type { ToolDispatcher } from "../tools/registry";
import { formatResearchDate } from "../utils/date";

export type DecisionOutcome = ResearchPhase.ToolExec | ResearchPhase.Compress;

export interface DecisionResult {
  turn: AssistantTurn;
  next: DecisionOutcome;
}

/** Tool calls mean keep researching; an answer without tool calls ends the loop. */
export function nextPhaseAfterDecision(turn: AssistantTurn): DecisionOutcome {
  return turn.toolCalls.length > 0 ? ResearchPhase.ToolExec : ResearchPhase.Compress;
}

/**
 * One decision step: the decision prompt (rendered with today's date) goes in as the system
 * instruction ahead of the whole conversation, with the registered tools on offer.
 */
export class DecisionEngine {
  private readonly context: AgentContext;
  private readonly model: ChatModel;
  private readonly tools: ToolDispatcher;

  constructor(context: AgentContext, model: ChatModel, tools: ToolDispatcher) {
    this.context = context;
    this.model = model;
    this.tools = tools;
  }

  async decide(): Promise<DecisionResult> {
    const instruction = renderBoundPrompt(this.context, this.context.prompts.decision, {
      date: formatResearchDate(this.context.now())
    });

    const turn = await this.model.invoke(
      [{ role: "system", content: instruction }, ...this.context.state.turns],
      this.tools.definitions()
    );

    return { turn, next: nextPhaseAfterDecision(turn) };
  }
}
