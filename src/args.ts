/**
 * Command-line tokenizer: positional arguments plus `-flag value` pairs.
 */
import { ArgumentSyntaxError } from "./core/exceptions.js";

export interface ParsedArguments {
  positional: string[];
  /** Flag name (dashes included) → the token that followed it. */
  flags: Record<string, string>;
}

/**
 * Any token starting with `-` is a flag and consumes the next token as its
 * value, whatever that token looks like. A repeated flag keeps its last value.
 */
export function parseArguments(tokens: readonly string[]): ParsedArguments {
  const positional: string[] = [];
  const flags: Record<string, string> = {};

  let index = 0;
  while (index < tokens.length) {
    const token = tokens[index];
    if (token.startsWith("-")) {
      if (index + 1 >= tokens.length) {
        throw new ArgumentSyntaxError(
          `flag '${token}' has no corresponding value`,
        );
      }
      flags[token] = tokens[index + 1];
      index += 2;
    } else {
      positional.push(token);
      index += 1;
    }
  }

  return { positional, flags };
}
