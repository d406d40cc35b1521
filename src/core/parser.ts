/**
 * Single-pass parser walking the command tree one token at a time.
 */

import { coerceOptionValue } from '@/core/coerce';
import { isParseError, ParseError } from '@/core/errors';
import {
  findOptionByAlias,
  findOptionByName,
  findSubcommand,
  isHelpOption,
} from '@/core/lookup';
import type { ArgumentSource } from '@/core/sources';
import { validateCommand } from '@/core/validate';
import { OptionValues } from '@/core/values';
import type { Action, Command, Option } from '@/types';

export type ParseOutcome =
  | {
      kind: 'action';
      command: Command;
      path: readonly Command[];
      action: Action;
      args: readonly string[];
      values: OptionValues;
    }
  | { kind: 'help'; command: Command; path: readonly Command[] }
  | { kind: 'error'; error: ParseError };

/** Classified token; `null` for tokens that are skipped. */
type ArgParseResult =
  | { kind: 'command'; command: Command }
  | { kind: 'option'; option: Option }
  | { kind: 'arg'; value: string };

class Parser {
  private current: Command;
  private readonly path: Command[] = [];
  private readonly args: string[] = [];
  private readonly values = new OptionValues();

  constructor(
    root: Command,
    private readonly source: ArgumentSource,
  ) {
    this.current = root;
  }

  parse(): ParseOutcome {
    try {
      return this.walk();
    } catch (error) {
      if (isParseError(error)) {
        return { kind: 'error', error };
      }
      throw error;
    }
  }

  private walk(): ParseOutcome {
    validateCommand(this.current);
    // Program name
    this.source.next();

    for (let arg = this.source.next(); arg !== undefined; arg = this.source.next()) {
      const parsed = this.parseArg(arg);
      if (!parsed) continue;
      if (parsed.kind === 'option' && isHelpOption(parsed.option)) {
        // Nothing after the help option is read
        return { kind: 'help', command: this.current, path: [...this.path] };
      }
      this.processArg(parsed);
    }

    const { action } = this.current;
    if (!action) {
      throw new ParseError(
        'NoActionReachable',
        this.current.name,
        `command '${this.current.name}': no subcommand provided`,
      );
    }
    return {
      kind: 'action',
      command: this.current,
      path: [...this.path],
      action,
      args: [...this.args],
      values: this.values,
    };
  }

  private processArg(arg: ArgParseResult): void {
    switch (arg.kind) {
      case 'command':
        validateCommand(arg.command);
        this.path.push(this.current);
        this.current = arg.command;
        break;
      case 'option':
        this.processOption(arg.option);
        break;
      case 'arg':
        this.args.push(arg.value);
        break;
    }
  }

  private processOption(option: Option): void {
    if (option.default.kind === 'bool') {
      this.values.set(option, { kind: 'bool', value: true });
      return;
    }

    const raw = this.source.next();
    if (raw === undefined) {
      throw new ParseError(
        'MissingOptionArgument',
        option.longName,
        `missing argument for ${option.longName}`,
      );
    }
    this.values.set(option, coerceOptionValue(option, raw));
  }

  private parseArg(arg: string): ArgParseResult | null {
    if (arg.length === 0) return null;

    if (arg.startsWith('-')) {
      if (arg.length === 1) return { kind: 'arg', value: arg };
      return arg[1] === '-' ? this.parseLongName(arg) : this.parseShortAlias(arg);
    }

    if (this.current.subcommands) {
      const subcommand = findSubcommand(this.current, arg);
      if (!subcommand) {
        throw new ParseError('UnknownSubcommand', arg, `no such subcommand '${arg}'`);
      }
      return { kind: 'command', command: subcommand };
    }

    return { kind: 'arg', value: arg };
  }

  private parseLongName(arg: string): ArgParseResult {
    // A bare "--" is kept as a positional argument, not an end-of-options marker
    if (arg.length === 2) return { kind: 'arg', value: arg };

    const option = findOptionByName(this.current, arg.slice(2));
    if (!option) {
      throw new ParseError('UnknownOption', arg, `unknown option ${arg}`);
    }
    return { kind: 'option', option };
  }

  private parseShortAlias(arg: string): ArgParseResult {
    if (arg.length > 2) {
      throw new ParseError('IllegalShortOption', arg, `illegal short option ${arg}`);
    }

    const option = findOptionByAlias(this.current, arg.slice(1));
    if (!option) {
      throw new ParseError('UnknownOption', arg, `unknown option ${arg}`);
    }
    return { kind: 'option', option };
  }
}

/**
 * Parse the tokens of `source` against the tree rooted at `root`.
 *
 * The first token is the program name and is discarded. The tree is only read;
 * captured option values are returned in the outcome, so the same tree can be
 * parsed any number of times.
 */
export function parse(root: Command, source: ArgumentSource): ParseOutcome {
  return new Parser(root, source).parse();
}
