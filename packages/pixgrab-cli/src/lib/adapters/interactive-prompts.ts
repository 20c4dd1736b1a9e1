import prompts from "prompts";
import type { PromptService } from "../ports/prompt.js";

/**
 * Real prompt service using the 'prompts' package.
 */
export const interactivePrompts: PromptService = {
  async select(message, choices) {
    const { value } = await prompts({
      type: "select",
      name: "value",
      message,
      choices,
    });
    // prompts leaves the answer undefined on cancel
    const picked = choices.find((choice) => choice.value === value);
    return picked?.value;
  },

  async text(message: string): Promise<string | undefined> {
    const { value } = await prompts({
      type: "text",
      name: "value",
      message,
    });
    return typeof value === "string" ? value : undefined;
  },
};
