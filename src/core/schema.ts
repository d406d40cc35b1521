import * as z from 'zod';

const OptionValueSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('bool'), value: z.boolean() }),
  z.object({ kind: z.literal('string'), value: z.string() }),
  z.object({ kind: z.literal('int'), value: z.bigint() }),
  z.object({ kind: z.literal('float'), value: z.number() }),
]);

export const OptionSchema = z.object({
  longName: z
    .string()
    .min(1, 'long name must not be empty')
    .regex(/^[^-]/, 'long name must not start with a dash'),
  shortAlias: z
    .string()
    .length(1, 'short alias must be a single character')
    .regex(/^[^-]$/, 'short alias must not be a dash')
    .optional(),
  help: z.string(),
  default: OptionValueSchema,
});

export const CommandNameSchema = z
  .string()
  .min(1, 'subcommand name must not be empty')
  .regex(/^[^-]/, 'subcommand name must not start with a dash');

/** First issue of a failed parse as "<path>: <message>". */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return error.message;
  }
  const path = issue.path.map(String).join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}
