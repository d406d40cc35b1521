import { expect, type Mock, vi } from 'vitest';
import type { ParseErrorKind } from '@/core/errors';
import { type ParseOutcome, parse } from '@/core/parser';
import { fromList } from '@/core/sources';
import { bool, float, int, string } from '@/core/values';
import type { Action, Command, Option } from '@/types';

export interface TestTree {
  root: Command;
  debug: Option;
  count: Option;
  price: Option;
  label: Option;
  all: Option;
  verbose: Option;
  itemAction: Mock<Action>;
  tagAction: Mock<Action>;
  listAction: Mock<Action>;
}

/**
 * Fresh tree for each test:
 *   app [--debug] add item [--count int --price float --label string]
 *   app add tag
 *   app list [--all --verbose]
 */
export function buildTree(): TestTree {
  const debug: Option = {
    longName: 'debug',
    shortAlias: 'd',
    help: 'Debug output',
    default: bool(),
  };
  const count: Option = {
    longName: 'count',
    shortAlias: 'c',
    help: 'Number of items',
    default: int(1),
  };
  const price: Option = {
    longName: 'price',
    shortAlias: 'p',
    help: 'Unit price',
    default: float(0),
  };
  const label: Option = {
    longName: 'label',
    shortAlias: 'l',
    help: 'Label text',
    default: string(),
  };
  const all: Option = {
    longName: 'all',
    shortAlias: 'a',
    help: 'Show everything',
    default: bool(),
  };
  const verbose: Option = {
    longName: 'verbose',
    help: 'More detail',
    default: bool(),
  };

  const itemAction = vi.fn<Action>(() => 'item');
  const tagAction = vi.fn<Action>(() => 'tag');
  const listAction = vi.fn<Action>(() => 'list');

  const root: Command = {
    name: 'app',
    description: 'Test application',
    options: [debug],
    subcommands: [
      {
        name: 'add',
        description: 'Add things',
        subcommands: [
          {
            name: 'item',
            description: 'Add an item',
            options: [count, price, label],
            action: itemAction,
          },
          { name: 'tag', description: 'Tag things', action: tagAction },
        ],
      },
      { name: 'list', options: [all, verbose], action: listAction },
    ],
  };

  return { root, debug, count, price, label, all, verbose, itemAction, tagAction, listAction };
}

/** Parse `tokens` as if typed after the program name "app". */
export function parseTokens(root: Command, ...tokens: string[]): ParseOutcome {
  return parse(root, fromList(['app', ...tokens]));
}

export function expectAction(outcome: ParseOutcome): Extract<ParseOutcome, { kind: 'action' }> {
  if (outcome.kind !== 'action') {
    throw new Error(`expected an action outcome, got ${outcome.kind}`);
  }
  return outcome;
}

export function expectParseError(
  outcome: ParseOutcome,
  kind: ParseErrorKind,
  message: string,
): void {
  expect(outcome.kind).toBe('error');
  if (outcome.kind !== 'error') return;
  expect(outcome.error.kind).toBe(kind);
  expect(outcome.error.message).toBe(message);
}

/**
 * Capture console.log output during a function call.
 */
export function captureOutput(fn: () => void): string {
  const originalLog = console.log;
  let output = '';
  console.log = (...args: unknown[]) => {
    output += `${args.map(String).join(' ')}\n`;
  };
  try {
    fn();
  } finally {
    console.log = originalLog;
  }
  return output;
}

export class ExitCalled extends Error {
  constructor(readonly code: number) {
    super(`exit(${code})`);
  }
}

/** Stand-in for process.exit that unwinds instead of exiting. */
export function throwingExit(code: number): never {
  throw new ExitCalled(code);
}
