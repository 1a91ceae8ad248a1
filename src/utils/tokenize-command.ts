import { ConfigError } from "./config-error";

type Quote = '"' | "'";

/**
 * Split a command line into argv tokens without invoking a shell
 *
 * Whitespace separates tokens, single and double quotes group characters,
 * and a backslash escapes the next character outside single quotes.
 * Inside double quotes a backslash only escapes `"` and `\`.
 *
 * @example
 * tokenizeCommand(`im-colorfx -c "rgb(255, 0, 0)"`)
 * // ["im-colorfx", "-c", "rgb(255, 0, 0)"]
 */
export function tokenizeCommand(command: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let quote: Quote | null = null;

  for (let i = 0; i < command.length; i++) {
    const char = command[i];

    if (quote === "'") {
      if (char === "'") {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (char === "\\") {
      const next = command.charAt(i + 1);
      inToken = true;
      if (next === "" || (quote === '"' && next !== '"' && next !== "\\")) {
        current += char;
        continue;
      }
      current += next;
      i++;
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      inToken = true;
      continue;
    }

    if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
      continue;
    }

    current += char;
    inToken = true;
  }

  if (quote) {
    const kind = quote === '"' ? "double" : "single";
    throw new ConfigError(`Unterminated ${kind} quote in command: ${command}`, "command");
  }

  if (inToken) {
    tokens.push(current);
  }

  return tokens;
}
