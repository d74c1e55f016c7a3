import { z } from "zod";
import type { ChatModel } from "../llm/types";
import { defineTool } from "./types";

/** Lets the decision model consult a second, independently configured model. */
export function createAskModelTool(model: ChatModel) {
  return defineTool({
    name: "ask_model",
    description: `Ask ${model.name} a self-contained question and get its answer as a second opinion. It has no access to the research so far.`,
    schema: z.object({
      question: z.string().min(1).describe("A complete, self-contained question")
    }),
    async execute({ question }) {
      const answer = await model.invoke([{ role: "human", content: question }]);
      return answer.content;
    }
  });
}
