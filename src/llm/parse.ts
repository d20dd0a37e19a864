import { z, ZodError } from 'zod';
import { logger } from '../shared/logger.js';
import { SummaryValidationError, errorMessage } from '../shared/errors.js';
import type { LlmClient } from './client.js';
import { buildRepairPrompt } from './prompts.js';

const text = z.string().trim().min(1);

export const SummarySchema = z.object({
  eli5: text,
  eli16: text,
  why_this_matters: text,
  what_changed: text,
  // Models sometimes return extra quotes; keep the first two.
  key_quotes: z
    .array(z.string())
    .transform((quotes) => quotes.slice(0, 2))
    .optional(),
  confidence_unknowns: text,
});

export type Summary = z.infer<typeof SummarySchema>;

/** Suffixes tried, in order, to close an object the model stopped mid-way. */
const CLOSING_SUFFIXES = ['"}\n}', '"\n}', '"]\n}', ']\n}', '\n}', '}'];

export function stripCodeFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```\s*$/, '')
    .trim();
}

/**
 * Describe a failure without echoing the payload. JSON.parse messages quote
 * the offending input, so only the error class is reported for those.
 */
function describeFailure(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
  }
  if (err instanceof SyntaxError) return 'response is not valid JSON';
  return errorMessage(err);
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    if (!raw.startsWith('{')) throw err;
    for (const suffix of CLOSING_SUFFIXES) {
      try {
        return JSON.parse(raw + suffix);
      } catch {
        continue;
      }
    }
    throw err;
  }
}

/**
 * Parse and validate model output. Returns the data, or a content-free
 * description of what was wrong.
 */
export function tryParse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): T | string {
  try {
    return schema.parse(parseJson(stripCodeFences(raw)));
  } catch (err) {
    return describeFailure(err);
  }
}

/**
 * Parse LLM JSON output with exactly one repair request on failure. Neither
 * the raw output nor the article text is logged or carried on the error.
 */
export async function parseWithRetry<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rawOutput: string,
  client: LlmClient,
  systemMessage: string,
): Promise<T> {
  const first = tryParse(schema, rawOutput);
  if (typeof first !== 'string') return first;

  logger.warn({ error: first }, 'LLM output invalid, attempting repair');

  const repair = await client.chat([
    { role: 'system', content: systemMessage },
    { role: 'user', content: buildRepairPrompt(first, stripCodeFences(rawOutput)) },
  ]);

  const second = tryParse(schema, repair.content);
  if (typeof second !== 'string') return second;

  throw new SummaryValidationError('LLM output invalid after repair attempt', {
    first_error: first,
    repair_error: second,
  });
}
