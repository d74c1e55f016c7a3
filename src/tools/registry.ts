import { z } from "zod";
import type { ToolCallRequest, ToolDefinition } from "../llm/types";
import { errorMessage } from "../utils/errors";
import { ToolInvocationError, ToolLookupError, ToolRegistrationError, ToolTimeoutError } from "./errors";
import type { ResearchTool } from "./types";

export interface ToolDispatcherOptions {
  /** Per attempt. */
  timeoutMs?: number;
  /** Extra attempts after the first failure. */
  retries?: number;
}

export interface ToolResult {
  requestId: string;
  name: string;
  content: string;
}

export const DEFAULT_TOOL_TIMEOUT_MS = 60_000;
export const DEFAULT_TOOL_RETRIES = 1;

/**
 * Fixed registry of research tools, built once per orchestrator.
 *
 * A batch runs strictly in request order and yields one result per request. A lookup miss or
 * invalid arguments fail immediately; an execution failure is retried `retries` times, each
 * attempt bounded by `timeoutMs`, and then fails the batch.
 */
export class ToolDispatcher {
  private readonly tools: ReadonlyMap<string, ResearchTool>;
  private readonly timeoutMs: number;
  private readonly retries: number;

  constructor(tools: readonly ResearchTool[], options: ToolDispatcherOptions = {}) {
    const registry = new Map<string, ResearchTool>();
    for (const tool of tools) {
      if (registry.has(tool.name)) {
        throw new ToolRegistrationError(`Tool '${tool.name}' is registered twice`);
      }
      registry.set(tool.name, tool);
    }
    this.tools = registry;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.retries = options.retries ?? DEFAULT_TOOL_RETRIES;
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => {
      const { $schema: _dialect, ...parameters } = z.toJSONSchema(tool.schema, { io: "input" });
      return { name: tool.name, description: tool.description, parameters };
    });
  }

  async invoke(requests: readonly ToolCallRequest[]): Promise<ToolResult[]> {
    const results: ToolResult[] = [];
    for (const request of requests) {
      results.push(await this.invokeOne(request));
    }
    return results;
  }

  private async invokeOne(request: ToolCallRequest): Promise<ToolResult> {
    const tool = this.tools.get(request.name);
    if (!tool) {
      throw new ToolLookupError(request.name, this.names());
    }

    const parsed = tool.schema.safeParse(request.arguments);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => issue.message).join("; ");
      throw new ToolInvocationError(tool.name, `Invalid arguments for tool '${tool.name}': ${issues}`);
    }

    const attempts = this.retries + 1;
    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const content = await runWithTimeout(
          (signal) => tool.execute(parsed.data, { signal }),
          this.timeoutMs,
          tool.name
        );
        return { requestId: request.id, name: tool.name, content };
      } catch (error) {
        lastError = error;
      }
    }

    throw new ToolInvocationError(
      tool.name,
      `Tool '${tool.name}' failed after ${attempts} attempt(s): ${errorMessage(lastError)}`,
      { cause: lastError }
    );
  }
}

async function runWithTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  toolName: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ToolTimeoutError(toolName, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
