export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface SystemTurn {
  role: "system";
  content: string;
}

export interface HumanTurn {
  role: "human";
  content: string;
}

export interface AssistantTurn {
  role: "assistant";
  content: string;
  toolCalls: ToolCallRequest[];
}

export interface ToolTurn {
  role: "tool";
  content: string;
  toolCallId: string;
  toolName: string;
}

export type ConversationTurn = SystemTurn | HumanTurn | AssistantTurn | ToolTurn;

/** A tool as advertised to the model: JSON-schema parameters. */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ChatModel {
  readonly name: string;
  invoke(turns: readonly ConversationTurn[], tools?: readonly ToolDefinition[]): Promise<AssistantTurn>;
}

export class ModelInvocationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ModelInvocationError";
  }
}
