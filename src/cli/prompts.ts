/**
 * Interactive Prompt Utilities
 *
 * Wrapper functions around @clack/prompts providing consistent
 * cancellation and validation.
 */

import { text, isCancel, cancel } from "@clack/prompts";
import { normalizeAllyCode } from "../data/allyCode";
import { InvalidAllyCodeError } from "../errors";

/**
 * Validation message for an ally code, or undefined when it is valid
 */
export function validateAllyCode(value: string): string | undefined {
  try {
    normalizeAllyCode(value);
    return undefined;
  } catch (error) {
    if (error instanceof InvalidAllyCodeError) {
      return "Enter 9 digits, e.g. 123-456-789";
    }
    throw error;
  }
}

/**
 * Prompt for a string with validation.
 */
export async function promptString(
  message: string,
  options?: {
    validator?: (v: string) => string | undefined;
    placeholder?: string;
  }
): Promise<string> {
  const { validator, placeholder } = options ?? {};

  const result = await text({
    message,
    placeholder,
    validate: (v: string) => {
      if (v.trim() === "") {
        return "Value is required";
      }
      return validator ? validator(v) : undefined;
    },
  });

  if (isCancel(result)) {
    cancel("cancelled");
    throw new Error("Operation cancelled by user");
  }

  return result.trim();
}

/**
 * Use the given ally code, or ask for one when it is missing.
 */
export async function resolveAllyCode(allyCode: string | undefined): Promise<string> {
  if (allyCode !== undefined) {
    return normalizeAllyCode(allyCode);
  }

  const entered = await promptString("Ally code", {
    validator: validateAllyCode,
    placeholder: "123-456-789",
  });
  return normalizeAllyCode(entered);
}
