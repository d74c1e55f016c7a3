import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { ToolDispatcher } from "../registry";
import { defineTool } from "../types";
import { ToolInvocationError, ToolLookupError, ToolRegistrationError } from "../errors";
import { thinkTool } from "../think";

const echoTool = defineTool({
  name: "echo",
  description: "Echo the text back",
  schema: z.object({ text: z.string(), times: z.number().int().default(1) }),
  async execute({ text, times }) {
    return text.repeat(times);
  }
});

describe("ToolDispatcher", () => {
  it("answers every request in request order", async () => {
    const order: string[] = [];
    const slow = defineTool({
      name: "slow",
      description: "Resolves late",
      schema: z.object({ label: z.string() }),
      async execute({ label }) {
        await new Promise((resolve) => setTimeout(resolve, 10));
        order.push(label);
        return `slow:${label}`;
      }
    });
    const dispatcher = new ToolDispatcher([echoTool, slow]);

    const results = await dispatcher.invoke([
      { id: "call-1", name: "slow", arguments: { label: "first" } },
      { id: "call-2", name: "echo", arguments: { text: "ab", times: 2 } },
      { id: "call-3", name: "slow", arguments: { label: "third" } }
    ]);

    expect(results).toEqual([
      { requestId: "call-1", name: "slow", content: "slow:first" },
      { requestId: "call-2", name: "echo", content: "abab" },
      { requestId: "call-3", name: "slow", content: "slow:third" }
    ]);
    expect(order).toEqual(["first", "third"]);
  });

  it("returns nothing for an empty batch", async () => {
    await expect(new ToolDispatcher([echoTool]).invoke([])).resolves.toEqual([]);
  });

  it("fails on an unregistered tool name", async () => {
    const dispatcher = new ToolDispatcher([echoTool]);

    await expect(dispatcher.invoke([{ id: "call-1", name: "missing", arguments: {} }])).rejects.toThrow(ToolLookupError);
    await expect(dispatcher.invoke([{ id: "call-1", name: "missing", arguments: {} }])).rejects.toThrow(
      "Unknown tool 'missing' (registered: echo)"
    );
  });

  it("does not run later requests once one fails", async () => {
    const execute = vi.fn(async () => "ran");
    const counted = defineTool({ name: "counted", description: "Counts calls", schema: z.object({}), execute });
    const dispatcher = new ToolDispatcher([counted]);

    await expect(
      dispatcher.invoke([
        { id: "call-1", name: "counted", arguments: {} },
        { id: "call-2", name: "missing", arguments: {} },
        { id: "call-3", name: "counted", arguments: {} }
      ])
    ).rejects.toThrow(ToolLookupError);
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it("rejects arguments that do not match the tool schema", async () => {
    const dispatcher = new ToolDispatcher([echoTool]);

    await expect(dispatcher.invoke([{ id: "call-1", name: "echo", arguments: { text: 5 } }])).rejects.toThrow(
      ToolInvocationError
    );
  });

  it("refuses two tools with the same name", () => {
    expect(() => new ToolDispatcher([echoTool, echoTool])).toThrow(ToolRegistrationError);
  });

  it("retries a failing tool and returns the successful attempt", async () => {
    const execute = vi.fn().mockRejectedValueOnce(new Error("flaky")).mockResolvedValueOnce("second try");
    const flaky = defineTool({ name: "flaky", description: "Fails once", schema: z.object({}), execute });
    const dispatcher = new ToolDispatcher([flaky], { retries: 1 });

    const results = await dispatcher.invoke([{ id: "call-1", name: "flaky", arguments: {} }]);

    expect(results[0].content).toBe("second try");
    expect(execute).toHaveBeenCalledTimes(2);
  });

  it("gives up after the last retry", async () => {
    const execute = vi.fn().mockRejectedValue(new Error("down"));
    const broken = defineTool({ name: "broken", description: "Always fails", schema: z.object({}), execute });
    const dispatcher = new ToolDispatcher([broken], { retries: 2 });

    await expect(dispatcher.invoke([{ id: "call-1", name: "broken", arguments: {} }])).rejects.toThrow(
      "Tool 'broken' failed after 3 attempt(s): down"
    );
    expect(execute).toHaveBeenCalledTimes(3);
  });

  it("times out a stalled tool and aborts its signal", async () => {
    let signal: AbortSignal | undefined;
    const stalled = defineTool({
      name: "stalled",
      description: "Never settles",
      schema: z.object({}),
      execute(_args, context) {
        signal = context.signal;
        return new Promise<string>(() => undefined);
      }
    });
    const dispatcher = new ToolDispatcher([stalled], { timeoutMs: 20, retries: 0 });

    await expect(dispatcher.invoke([{ id: "call-1", name: "stalled", arguments: {} }])).rejects.toThrow(
      "Tool 'stalled' failed after 1 attempt(s): Tool 'stalled' timed out after 20ms"
    );
    expect(signal?.aborted).toBe(true);
  });

  it("describes tools with their input JSON schema", () => {
    const [definition] = new ToolDispatcher([echoTool]).definitions();

    expect(definition.name).toBe("echo");
    expect(definition.description).toBe("Echo the text back");
    expect(definition.parameters).toMatchObject({
      type: "object",
      properties: { text: { type: "string" }, times: { type: "integer", default: 1 } },
      required: ["text"]
    });
    expect(definition.parameters).not.toHaveProperty("$schema");
  });

  it("records reflections with the think tool", async () => {
    const dispatcher = new ToolDispatcher([thinkTool]);

    const [result] = await dispatcher.invoke([
      { id: "call-1", name: "think_tool", arguments: { reflection: "Need primary sources" } }
    ]);

    expect(result.content).toBe("Reflection recorded: Need primary sources");
  });
});
