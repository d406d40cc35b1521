import { ParseError } from '@/core/errors';
import { CommandNameSchema, describeIssue, OptionSchema } from '@/core/schema';
import type { Command } from '@/types';

function invalid(command: Command, message: string): ParseError {
  return new ParseError('InvalidCommandDefinition', command.name, message);
}

/**
 * Check a command node before it becomes current.
 * Only the node itself is checked; children are checked when reached.
 */
export function validateCommand(command: Command): void {
  if (command.subcommands === undefined) {
    if (command.action === undefined) {
      throw invalid(
        command,
        `command '${command.name}' has neither subcommands nor an action assigned`,
      );
    }
  } else if (command.action !== undefined) {
    throw invalid(
      command,
      `command '${command.name}' has subcommands and an action assigned; ` +
        'commands with subcommands are not allowed to have an action',
    );
  }

  validateOptions(command);
  validateSubcommandNames(command);
}

function validateOptions(command: Command): void {
  const prefix = `command '${command.name}'`;
  // help and h are not reserved here; lookup resolves them to the implicit option first
  const longNames = new Set<string>();
  const aliases = new Set<string>();

  for (const [index, option] of (command.options ?? []).entries()) {
    const result = OptionSchema.safeParse(option);
    if (!result.success) {
      throw invalid(command, `${prefix}: options[${index}].${describeIssue(result.error)}`);
    }

    if (longNames.has(option.longName)) {
      throw invalid(command, `${prefix}: duplicate option --${option.longName}`);
    }
    longNames.add(option.longName);

    if (option.shortAlias !== undefined) {
      if (aliases.has(option.shortAlias)) {
        throw invalid(command, `${prefix}: duplicate option alias -${option.shortAlias}`);
      }
      aliases.add(option.shortAlias);
    }
  }
}

function validateSubcommandNames(command: Command): void {
  const prefix = `command '${command.name}'`;
  const names = new Set<string>();

  for (const [index, subcommand] of (command.subcommands ?? []).entries()) {
    const result = CommandNameSchema.safeParse(subcommand.name);
    if (!result.success) {
      throw invalid(command, `${prefix}: subcommands[${index}]: ${describeIssue(result.error)}`);
    }
    if (names.has(subcommand.name)) {
      throw invalid(command, `${prefix}: duplicate subcommand '${subcommand.name}'`);
    }
    names.add(subcommand.name);
  }
}
