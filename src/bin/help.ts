import { getVisibleOptions } from '@/core/lookup';
import type { Command, Option, OptionValue } from '@/types';
import { colors } from './utils/colors';

const INDENT = '  ';

/**
 * Format option flags with optional argument.
 * e.g., "-o, --out <string>" or "--json"
 */
function formatOptionFlags(option: Option): string {
  const names = option.shortAlias
    ? `-${option.shortAlias}, --${option.longName}`
    : `--${option.longName}`;
  return option.default.kind === 'bool' ? names : `${names} <${option.default.kind}>`;
}

function formatValue(value: OptionValue): string {
  switch (value.kind) {
    case 'bool':
      return String(value.value);
    case 'string':
      return JSON.stringify(value.value);
    case 'int':
      return value.value.toString();
    case 'float':
      return String(value.value);
  }
}

function formatOptionDescription(option: Option): string {
  const { default: value } = option;
  if (value.kind === 'bool' || (value.kind === 'string' && value.value === '')) {
    return option.help;
  }
  return `${option.help} ${colors.dim(`(default: ${formatValue(value)})`)}`;
}

/** Build the help text for a command reached through `path`. */
export function formatCommandHelp(command: Command, path: readonly Command[]): string {
  const invocation = [...path, command].map((cmd) => cmd.name).join(' ');
  const lines: string[] = [];

  // Header
  lines.push(colors.bold(invocation));
  lines.push('');
  if (command.description) {
    lines.push(`${INDENT}${command.description}`);
    lines.push('');
  }

  // Usage
  lines.push('USAGE:');
  const tail = command.subcommands ? '<command>' : '[args...]';
  lines.push(`${INDENT}${invocation} [options] ${tail}`);
  lines.push('');

  // Subcommands
  const subcommands = command.subcommands ?? [];
  if (subcommands.length > 0) {
    lines.push('COMMANDS:');
    const nameWidth = Math.max(...subcommands.map((sc) => sc.name.length));
    for (const sc of subcommands) {
      lines.push(`${INDENT}${sc.name.padEnd(nameWidth + 2)}${sc.description ?? ''}`.trimEnd());
    }
    lines.push('');
  }

  // Options
  const options = getVisibleOptions(command);
  lines.push('OPTIONS:');
  const optWidth = Math.max(...options.map((opt) => formatOptionFlags(opt).length));
  for (const opt of options) {
    const flags = formatOptionFlags(opt);
    lines.push(`${INDENT}${flags.padEnd(optWidth + 2)}${formatOptionDescription(opt)}`);
  }

  return lines.join('\n');
}

/**
 * Print help for a command. Default renderer used by `run`.
 */
export function printCommandHelp(command: Command, path: readonly Command[]): void {
  console.log(formatCommandHelp(command, path));
}
