import type { AssistantTurn, ConversationTurn, HumanTurn, ToolCallRequest, ToolTurn } from "../llm/types";
import type { ToolResult } from "../tools/registry";

export enum ResearchPhase {
  Init = "INIT",
  Decide = "DECIDE",
  ToolExec = "TOOL_EXEC",
  Compress = "COMPRESS",
  Assess = "ASSESS",
  Done = "DONE"
}

export interface ResearchStateSnapshot {
  researchTopic: string;
  turns: readonly ConversationTurn[];
  iterations: number;
  compressedResearch: string;
  rawNotes: readonly string[];
  qaReport: string;
}

/**
 * Conversation and artifacts of one research session.
 *
 * Turns are append-only. Tool turns must answer, in order, exactly the requests of the assistant
 * turn right before them; a new assistant turn is refused while requests are still open.
 * Compression output and the QA report are each set once.
 */
export class ResearchState {
  readonly researchTopic: string;
  private readonly history: ConversationTurn[] = [];
  private view: readonly ConversationTurn[] = Object.freeze([]);
  private iterationCount = 0;
  private compressed: { text: string; rawNotes: readonly string[] } | undefined;
  private qa: string | undefined;

  constructor(researchTopic: string) {
    this.researchTopic = researchTopic;
  }

  /** Frozen copy, refreshed on every append. */
  get turns(): readonly ConversationTurn[] {
    return this.view;
  }

  get iterations(): number {
    return this.iterationCount;
  }

  get compressedResearch(): string {
    return this.compressed?.text ?? "";
  }

  get rawNotes(): readonly string[] {
    return this.compressed?.rawNotes ?? [];
  }

  get qaReport(): string {
    return this.qa ?? "";
  }

  appendHuman(content: string): void {
    const turn: HumanTurn = { role: "human", content };
    this.record(turn);
  }

  appendAssistant(turn: AssistantTurn): void {
    if (this.pendingToolCalls().length) {
      throw new Error("Cannot append an assistant turn while tool calls are unanswered");
    }
    this.record({ ...turn, toolCalls: turn.toolCalls.map((call) => Object.freeze({ ...call })) });
  }

  /** Requests of the latest assistant turn that have no tool turn yet, in request order. */
  pendingToolCalls(): ToolCallRequest[] {
    const assistantIndex = this.history.findLastIndex((turn) => turn.role === "assistant");
    if (assistantIndex === -1) {
      return [];
    }
    const assistant = this.history[assistantIndex];
    if (assistant.role !== "assistant") {
      return [];
    }
    const answered = this.history.length - assistantIndex - 1;
    return assistant.toolCalls.slice(answered);
  }

  appendToolResults(results: readonly ToolResult[]): void {
    const pending = this.pendingToolCalls();
    if (results.length !== pending.length) {
      throw new Error(`Expected ${pending.length} tool result(s), got ${results.length}`);
    }
    results.forEach((result, index) => {
      if (result.requestId !== pending[index].id) {
        throw new Error(`Tool result '${result.requestId}' does not answer pending request '${pending[index].id}'`);
      }
    });

    for (const result of results) {
      const turn: ToolTurn = { role: "tool", content: result.content, toolCallId: result.requestId, toolName: result.name };
      this.record(turn);
    }
    this.iterationCount += 1;
  }

  setCompression(compressedResearch: string, rawNotes: readonly string[]): void {
    if (this.compressed) {
      throw new Error("Research has already been compressed");
    }
    this.compressed = { text: compressedResearch, rawNotes: Object.freeze([...rawNotes]) };
  }

  setQaReport(report: string): void {
    if (this.qa !== undefined) {
      throw new Error("QA report has already been recorded");
    }
    this.qa = report;
  }

  private record(turn: ConversationTurn): void {
    this.history.push(Object.freeze(turn));
    this.view = Object.freeze([...this.history]);
  }

  snapshot(): ResearchStateSnapshot {
    return {
      researchTopic: this.researchTopic,
      turns: [...this.history],
      iterations: this.iterationCount,
      compressedResearch: this.compressedResearch,
      rawNotes: this.rawNotes,
      qaReport: this.qaReport
    };
  }
}
