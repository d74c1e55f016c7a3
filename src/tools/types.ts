import type { z } from "zod";

export interface ToolExecutionContext {
  /** Aborted when the dispatcher gives up on the call (timeout). */
  signal: AbortSignal;
}

export interface ResearchTool<TSchema extends z.ZodType = z.ZodType> {
  readonly name: string;
  readonly description: string;
  readonly schema: TSchema;
  execute(args: z.infer<TSchema>, context: ToolExecutionContext): Promise<string>;
}

export function defineTool<TSchema extends z.ZodType>(tool: ResearchTool<TSchema>): ResearchTool<TSchema> {
  return tool;
}
