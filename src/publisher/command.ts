/**
 * Command contracts
 *
 * External collaborators are argv arrays with {placeholder} tokens. Tokens are
 * substituted per argument; nothing is ever passed through a shell.
 */

import type { ShellExecutor } from "#/core";
import type { Command } from "#/schemas";

export type CommandVariables = Record<string, string>;

const PLACEHOLDER_REGEX = /\{([a-zA-Z]+)\}/g;

/**
 * @example expandTemplate("docs/{version}", { version: "1.4.0" }) → "docs/1.4.0"
 * @example expandTemplate("{unknown}", {}) → "{unknown}"
 */
export function expandTemplate(template: string, variables: CommandVariables): string {
  return template.replace(PLACEHOLDER_REGEX, (token, name: string) => variables[name] ?? token);
}

export function expandCommand(command: Command, variables: CommandVariables): Command {
  return command.map((arg) => expandTemplate(arg, variables));
}

/**
 * Run a command contract. Throws whatever the executor throws on failure.
 */
export function runCommand(shell: ShellExecutor, command: Command, variables: CommandVariables): string {
  const [executable, ...args] = expandCommand(command, variables);
  if (executable === undefined) {
    throw new Error("Empty command");
  }
  return shell.execFile(executable, args);
}

/**
 * Run a command whose exit status answers a yes/no question.
 */
export function commandSucceeds(shell: ShellExecutor, command: Command, variables: CommandVariables): boolean {
  try {
    runCommand(shell, command, variables);
    return true;
  } catch {
    return false;
  }
}
