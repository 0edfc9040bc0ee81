import { z } from 'zod';

import { ControlParseError, ControlValidationError } from '../shared/errors/engine-errors';

const CONTROL_BLOCK_PATTERN = /<control>([\s\S]*?)<\/control>/i;
const CONTROL_BLOCK_GLOBAL_PATTERN = /<control>[\s\S]*?<\/control>/gi;

export const objectiveCompleteSchema = z
  .object({
    objective_complete: z.boolean(),
  })
  .strict();

export const prereqCompleteSchema = z
  .object({
    prereq_complete: z.boolean(),
  })
  .strict();

export const genericControlSchema = z.record(z.string(), z.boolean());

export type ObjectiveCompleteSignal = z.infer<typeof objectiveCompleteSchema>;
export type PrereqCompleteSignal = z.infer<typeof prereqCompleteSchema>;
export type GenericControlSignal = z.infer<typeof genericControlSchema>;

const formatIssues = (error: z.ZodError): string => {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
};

/**
 * Finds the single `<control>…</control>` directive in model text and validates
 * its JSON body against `schema`.
 *
 * Returns `null` when the text carries no directive. Throws `ControlParseError`
 * when the body is not JSON and `ControlValidationError` when it does not match
 * the schema or when more than one directive is present.
 */
export const extractControlSignal = <TSchema extends z.ZodTypeAny>(
  text: string,
  schema: TSchema,
): z.infer<TSchema> | null => {
  const blocks = text.match(CONTROL_BLOCK_GLOBAL_PATTERN) ?? [];

  if (blocks.length === 0) {
    return null;
  }

  if (blocks.length > 1) {
    throw new ControlValidationError(`Expected one control block, found ${blocks.length}.`);
  }

  const match = CONTROL_BLOCK_PATTERN.exec(text);
  const rawBlock = (match?.[1] ?? '').trim();

  let payload: unknown;
  try {
    payload = JSON.parse(rawBlock);
  } catch (error: unknown) {
    throw new ControlParseError(rawBlock, { cause: error });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new ControlValidationError(`Control block rejected: ${formatIssues(parsed.error)}`, {
      details: parsed.error.issues,
    });
  }

  return parsed.data;
};

export const stripControlBlocks = (text: string): string => {
  return text
    .replace(CONTROL_BLOCK_GLOBAL_PATTERN, '')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
};
