import OpenAI from "openai";
import { jsonrepair } from "jsonrepair";
import type { ModelConfig, Settings } from "../config/settings";
import { errorMessage } from "../utils/errors";
import {
  ModelInvocationError,
  type AssistantTurn,
  type ChatModel,
  type ConversationTurn,
  type ToolCallRequest,
  type ToolDefinition
} from "./types";

type ChatMessageParam = OpenAI.Chat.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.ChatCompletionTool;

type CompletionToolCall = OpenAI.Chat.ChatCompletionMessageToolCall;

interface CompletionMessage {
  content: string | null;
  tool_calls?: CompletionToolCall[];
}

/** One configured model profile (decision, compression or assessment) on the chat completions API. */
export class OpenAIChatModel implements ChatModel {
  readonly name: string;
  private readonly client: OpenAI;
  private readonly profile: ModelConfig;

  constructor(settings: Settings, profile: ModelConfig, name: string = profile.model) {
    if (!settings.openAiApiKey) {
      throw new Error("OPENAI_API_KEY is required to run research sessions");
    }

    this.name = name;
    this.profile = profile;
    this.client = new OpenAI({
      apiKey: settings.openAiApiKey,
      baseURL: settings.openAiBaseUrl,
      timeout: settings.runtime.modelTimeoutMs,
      maxRetries: settings.runtime.modelMaxRetries
    });
  }

  async invoke(turns: readonly ConversationTurn[], tools: readonly ToolDefinition[] = []): Promise<AssistantTurn> {
    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.profile.model,
        temperature: this.profile.temperature,
        max_completion_tokens: this.profile.maxOutputTokens,
        messages: toChatMessages(turns),
        ...(tools.length ? { tools: tools.map(toChatTool) } : {})
      });
    } catch (error) {
      throw new ModelInvocationError(`Model '${this.name}' request failed: ${errorMessage(error)}`, { cause: error });
    }

    const choice = completion.choices.at(0);
    if (!choice) {
      throw new ModelInvocationError(`Model '${this.name}' returned no choices`);
    }
    return toAssistantTurn(choice.message);
  }
}

export function toChatMessages(turns: readonly ConversationTurn[]): ChatMessageParam[] {
  return turns.map((turn): ChatMessageParam => {
    switch (turn.role) {
      case "system":
        return { role: "system", content: turn.content };
      case "human":
        return { role: "user", content: turn.content };
      case "tool":
        return { role: "tool", tool_call_id: turn.toolCallId, content: turn.content };
      case "assistant":
        if (!turn.toolCalls.length) {
          return { role: "assistant", content: turn.content };
        }
        return {
          role: "assistant",
          content: turn.content || null,
          tool_calls: turn.toolCalls.map((call) => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.name, arguments: JSON.stringify(call.arguments) }
          }))
        };
    }
  });
}

export function toChatTool(tool: ToolDefinition): ChatTool {
  return {
    type: "function",
    function: { name: tool.name, description: tool.description, parameters: tool.parameters }
  };
}

export function toAssistantTurn(message: CompletionMessage): AssistantTurn {
  const toolCalls: ToolCallRequest[] = [];
  for (const call of message.tool_calls ?? []) {
    if (call.type !== "function") continue;
    toolCalls.push({
      id: call.id,
      name: call.function.name,
      arguments: parseToolArguments(call.function.arguments, call.function.name)
    });
  }
  return { role: "assistant", content: message.content ?? "", toolCalls };
}

/** Parses model-written tool arguments, repairing near-JSON (trailing commas, single quotes) when needed. */
export function parseToolArguments(raw: string, toolName: string): Record<string, unknown> {
  if (!raw.trim()) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    try {
      parsed = JSON.parse(jsonrepair(raw));
    } catch (repairError) {
      throw new ModelInvocationError(
        `Arguments for tool '${toolName}' are not valid JSON: ${errorMessage(repairError)} (original ${errorMessage(error)})\nRaw: ${raw}`
      );
    }
  }

  if (!isRecord(parsed)) {
    throw new ModelInvocationError(`Arguments for tool '${toolName}' must be a JSON object\nRaw: ${raw}`);
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
