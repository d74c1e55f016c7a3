import { z } from "zod";
import { defineTool } from "./types";

export const thinkTool = defineTool({
  name: "think_tool",
  description: [
    "Record a short reflection on the research so far: what was found, what is still missing,",
    "and whether to search again or answer. Use it after every search."
  ].join(" "),
  schema: z.object({
    reflection: z.string().min(1).describe("Your reflection on research progress and the next step")
  }),
  async execute({ reflection }) {
    return `Reflection recorded: ${reflection}`;
  }
});
