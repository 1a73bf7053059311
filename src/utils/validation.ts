import { z } from 'zod';

const isBlank = (value: unknown): boolean => typeof value === 'string' && value.trim() === '';

// Query-string values: blank means "no constraint"
export const blankToUndefined = (value: unknown) => (isBlank(value) ? undefined : value);

/**
 * Optional free text stored as NULL when missing or blank
 */
export const nullableText = (maxLength?: number) => {
  const text = z.string().trim();
  return z.preprocess(
    value => (value === undefined || isBlank(value) ? null : value),
    (maxLength === undefined ? text : text.max(maxLength)).nullable()
  );
};

export const idParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});
