import prompts from "prompts";
import type { PromptService } from "../ports/prompt.js";

/**
 * Real prompt service using the 'prompts' package.
 * Ctrl+C at the prompt counts as "no".
 */
export const interactivePrompts: PromptService = {
  async confirm(message: string, initial = false): Promise<boolean> {
    const { value } = await prompts({
      type: "confirm",
      name: "value",
      message,
      initial,
    });
    return value === true;
  },
};
