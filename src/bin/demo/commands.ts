/**
 * Command tree of the demo CLI.
 */

import { quote } from 'shell-quote';
import { bool, float, int, string } from '@/core/values';
import type { ActionContext, Command, Option } from '@/types';

const upperOption: Option = {
  longName: 'upper',
  shortAlias: 'u',
  help: 'Print arguments in upper case',
  default: bool(false),
};

const repeatOption: Option = {
  longName: 'repeat',
  shortAlias: 'r',
  help: 'Number of times to print the line',
  default: int(1),
};

const quantityOption: Option = {
  longName: 'qty',
  shortAlias: 'q',
  help: 'Quantity to add',
  default: int(1),
};

const noteOption: Option = {
  longName: 'note',
  help: 'Free-form note attached to the item',
  default: string(),
};

const factorOption: Option = {
  longName: 'factor',
  shortAlias: 'f',
  help: 'Multiplier applied to every number',
  default: float(1),
};

/** Arguments joined back into a shell-safe line. @internal Exported for testing */
export function echoLine(args: readonly string[], context: ActionContext): string {
  const upper = context.values.getBool(upperOption);
  const words = upper ? args.map((a) => a.toUpperCase()) : args;
  return quote([...words]);
}

function echo(args: readonly string[], context: ActionContext): number {
  const times = Number(context.values.getInt(repeatOption));
  const line = echoLine(args, context);
  for (let i = 0; i < times; i++) {
    console.log(line);
  }
  return 0;
}

/** @internal Exported for testing */
export function describeItem(args: readonly string[], context: ActionContext): string {
  const count = context.values.getInt(quantityOption);
  const note = context.values.getString(noteOption);
  const suffix = note ? ` (${note})` : '';
  return `added ${count.toString()} x ${quote([...args])}${suffix}`;
}

function addItem(args: readonly string[], context: ActionContext): number {
  if (args.length === 0) {
    console.error('Error: add item requires at least one name');
    return 1;
  }
  console.log(describeItem(args, context));
  return 0;
}

/** @internal Exported for testing */
export function scaleNumbers(args: readonly string[], context: ActionContext): number[] {
  const factor = context.values.getFloat(factorOption);
  return args.map((a) => Number(a) * factor);
}

function scale(args: readonly string[], context: ActionContext): number {
  const results = scaleNumbers(args, context);
  if (results.some((n) => Number.isNaN(n))) {
    console.error('Error: scale only accepts numbers');
    return 1;
  }
  console.log(results.join(' '));
  return 0;
}

export const demoCommand: Command = {
  name: 'argtree-demo',
  description: 'Example command tree built with argtree',
  subcommands: [
    {
      name: 'echo',
      description: 'Print the arguments back, shell-quoted',
      options: [upperOption, repeatOption],
      action: echo,
    },
    {
      name: 'add',
      description: 'Add things',
      subcommands: [
        {
          name: 'item',
          description: 'Add an item by name',
          options: [quantityOption, noteOption],
          action: addItem,
        },
      ],
    },
    {
      name: 'scale',
      description: 'Multiply numbers by a factor',
      options: [factorOption],
      action: scale,
    },
  ],
};
