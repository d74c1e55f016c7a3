import type { ChatModel } from "../llm/types";
import { Agent, type AgentContext } from "./agent-base";

export class QualityAssessorAgent extends Agent<string> {
  readonly name = "quality-assessor";
  readonly description = "Reviews the compressed report on its own, without the research conversation.";
  private readonly model: ChatModel;

  constructor(context: AgentContext, model: ChatModel) {
    super(context);
    this.model = model;
  }

  async run(): Promise<string> {
    const prompt = this.renderPrompt(this.context.prompts.qa, {
      research_report: this.context.state.compressedResearch
    });
    const response = await this.model.invoke([{ role: "human", content: prompt }]);
    return response.content;
  }
}
