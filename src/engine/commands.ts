/**
 * Slash-command prefix parser
 *
 *   "/clean /structure n=2 hello world"
 *     → commands: [clean {}, structure { n: "2" }], text: "hello world"
 *
 * Only the leading run of tokens is considered. key=value tokens attach to
 * the command before them; the first other token starts the text.
 */

export interface ParsedCommand {
  name: string;
  args: Record<string, string>;
}

export interface ParsedInput {
  commands: ParsedCommand[];
  /** All command arguments merged; later commands win */
  args: Record<string, string>;
  text: string;
}

const COMMAND = /^\/([a-z][\w-]*)$/i;
const ARGUMENT = /^([a-z_][\w-]*)=(\S*)$/i;

export function parseCommands(input: string): ParsedInput {
  const commands: ParsedCommand[] = [];
  const token = /\s*(\S+)/y;
  let textStart = input.length;

  for (;;) {
    const start = token.lastIndex;
    const match = token.exec(input);
    if (!match) break;

    const value = match[1];
    const command = COMMAND.exec(value);
    if (command) {
      commands.push({ name: command[1].toLowerCase(), args: {} });
      continue;
    }

    const argument = commands.length > 0 ? ARGUMENT.exec(value) : null;
    if (argument) {
      commands[commands.length - 1].args[argument[1]] = argument[2];
      continue;
    }

    textStart = start;
    break;
  }

  const args: Record<string, string> = {};
  for (const command of commands) {
    Object.assign(args, command.args);
  }

  return {
    commands,
    args,
    text: input.slice(textStart).trim(),
  };
}
