export class ToolRegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolRegistrationError";
  }
}

export class ToolLookupError extends Error {
  readonly toolName: string;

  constructor(toolName: string, available: readonly string[]) {
    super(`Unknown tool '${toolName}' (registered: ${available.length ? available.join(", ") : "none"})`);
    this.name = "ToolLookupError";
    this.toolName = toolName;
  }
}

export class ToolInvocationError extends Error {
  readonly toolName: string;

  constructor(toolName: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ToolInvocationError";
    this.toolName = toolName;
  }
}

export class ToolTimeoutError extends Error {
  constructor(toolName: string, timeoutMs: number) {
    super(`Tool '${toolName}' timed out after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}
