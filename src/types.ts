/**
 * Shared types for the argtree command parser.
 */

import type { OptionValues } from '@/core/values';

/** Typed value of an option. The tag of an option's default fixes its type. */
export type OptionValue =
  | { kind: 'bool'; value: boolean }
  | { kind: 'string'; value: string }
  | { kind: 'int'; value: bigint }
  | { kind: 'float'; value: number };

export type OptionKind = OptionValue['kind'];

/** Option declared on a command, visible while that command is current. */
export interface Option {
  /** Long name without dashes, e.g. "verbose" for --verbose */
  longName: string;
  /** Single character alias without the dash, e.g. "v" for -v */
  shortAlias?: string;
  /** Human-readable description */
  help: string;
  /** Declared default value */
  default: OptionValue;
}

/** What an action receives besides its positional arguments. */
export interface ActionContext {
  /** The resolved leaf command */
  command: Command;
  /** Ancestors of the leaf, root first */
  path: readonly Command[];
  /** Option values captured during the parse */
  values: OptionValues;
}

export type Action = (args: readonly string[], context: ActionContext) => unknown;

/**
 * Node of the command tree.
 * Exactly one of `action` and `subcommands` must be set.
 */
export interface Command {
  /** Name matched against the argument token, unique among siblings */
  name: string;
  /** One-line description shown in help */
  description?: string;
  action?: Action;
  subcommands?: readonly Command[];
  options?: readonly Option[];
}

/** Renders usage for a command; `path` holds its ancestors, root first. */
export type HelpRenderer = (command: Command, path: readonly Command[]) => void;
