import { bool } from '@/core/values';
import type { Command, Option } from '@/types';

/**
 * Implicit help option, visible on every command.
 * It takes precedence over anything a command declares.
 */
export const HELP_OPTION: Option = Object.freeze({
  longName: 'help',
  shortAlias: 'h',
  help: 'Show this help',
  default: bool(false),
});

export function isHelpOption(option: Option): boolean {
  return option === HELP_OPTION;
}

export function findSubcommand(command: Command, name: string): Command | undefined {
  return command.subcommands?.find((sc) => sc.name === name);
}

export function findOptionByName(command: Command, longName: string): Option | undefined {
  if (longName === HELP_OPTION.longName) {
    return HELP_OPTION;
  }
  return command.options?.find((opt) => opt.longName === longName);
}

export function findOptionByAlias(command: Command, alias: string): Option | undefined {
  if (alias === HELP_OPTION.shortAlias) {
    return HELP_OPTION;
  }
  return command.options?.find((opt) => opt.shortAlias === alias);
}

/** Declared options followed by the implicit help option. */
export function getVisibleOptions(command: Command): readonly Option[] {
  return [...(command.options ?? []), HELP_OPTION];
}
