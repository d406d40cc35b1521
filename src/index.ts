export { formatCommandHelp, printCommandHelp } from './bin/help';
export { type RunOptions, run } from './bin/run';
export { coerceOptionValue, parseFloat64, parseInt64 } from './core/coerce';
export { isParseError, ParseError, type ParseErrorKind } from './core/errors';
export {
  findOptionByAlias,
  findOptionByName,
  findSubcommand,
  getVisibleOptions,
  HELP_OPTION,
} from './core/lookup';
export { type ParseOutcome, parse } from './core/parser';
export { type ArgumentSource, fromList, fromProcess, ListSource } from './core/sources';
export { validateCommand } from './core/validate';
export { bool, float, int, OptionValues, string } from './core/values';
export type {
  Action,
  ActionContext,
  Command,
  HelpRenderer,
  Option,
  OptionKind,
  OptionValue,
} from './types';
