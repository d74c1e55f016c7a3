import type { ChatModel, ConversationTurn } from "../llm/types";
import { formatResearchDate } from "../utils/date";
import { Agent, type AgentContext } from "./agent-base";

export interface CompressionResult {
  compressedResearch: string;
  rawNotes: string[];
}

export const RAW_NOTES_SEPARATOR = "\n";

/**
 * Every assistant and tool turn's content, in conversation order, joined with a newline.
 * Turns with empty content (e.g. an assistant turn that only requested tools) still count.
 */
export function collectRawNotes(turns: readonly ConversationTurn[]): string {
  return turns
    .filter((turn) => turn.role === "assistant" || turn.role === "tool")
    .map((turn) => turn.content)
    .join(RAW_NOTES_SEPARATOR);
}

export class CompressorAgent extends Agent<CompressionResult> {
  readonly name = "compressor";
  readonly description = "Synthesizes the gathered evidence into a report and keeps the raw notes.";
  private readonly model: ChatModel;

  constructor(context: AgentContext, model: ChatModel) {
    super(context);
    this.model = model;
  }

  async run(): Promise<CompressionResult> {
    const { state } = this.context;
    const system = this.renderPrompt(this.context.prompts.compressionSystem, {
      date: formatResearchDate(this.context.now())
    });
    const closing = this.renderPrompt(this.context.prompts.compressionHuman, {
      research_topic: state.researchTopic
    });

    const response = await this.model.invoke([
      { role: "system", content: system },
      ...state.turns,
      { role: "human", content: closing }
    ]);

    return {
      compressedResearch: response.content,
      rawNotes: [collectRawNotes(state.turns)]
    };
  }
}
