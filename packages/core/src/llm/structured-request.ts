import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { createChildLogger } from '@gleaner/shared/src/logger.js';
import { toError } from '@gleaner/shared/src/utils/errors.js';
import { formatZodErrors } from '@gleaner/schemas/src/validators.js';
import type { GenerateOptions, TextClient } from './text-client.js';

const log = createChildLogger('llm:structured-request');

export interface StructuredRequestOptions<T extends z.ZodTypeAny> {
  readonly textClient: TextClient;
  readonly prompt: string;
  readonly schema: T;
  readonly strategyName: string;
  readonly generateOptions?: GenerateOptions;
}

/** Renders the JSON Schema of `schema` for inclusion in a prompt. */
export function describeResponseShape(schema: z.ZodTypeAny, name: string): string {
  return JSON.stringify(zodToJsonSchema(schema, { name, $refStrategy: 'none' }), null, 2);
}

/**
 * Asks for a JSON object and validates it. Service failures, unparseable
 * output and schema mismatches all resolve to `null`.
 */
export async function requestStructured<T extends z.ZodTypeAny>(
  options: StructuredRequestOptions<T>,
): Promise<z.infer<T> | null> {
  const { textClient, prompt, schema, strategyName, generateOptions } = options;

  let response: Record<string, unknown>;
  try {
    response = await textClient.generateJson(prompt, generateOptions);
  } catch (error) {
    const cause = toError(error);
    log.warn(
      { strategyName, errorName: cause.name, error: cause.message },
      'Text service call failed, contributing no records',
    );
    return null;
  }

  const result = schema.safeParse(response);
  if (result.success) {
    // eslint-disable-next-line @typescript-eslint/no-unsafe-return
    return result.data;
  }

  log.warn(
    { strategyName, errors: formatZodErrors(result.error) },
    'Structured response failed validation, contributing no records',
  );
  return null;
}

/**
 * Validates list entries one at a time. Entries that fail are logged and
 * skipped so the rest of the response still counts.
 */
export function parseEntries<T>(
  entries: readonly unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  strategyName: string,
): T[] {
  const parsed: T[] = [];

  entries.forEach((entry, index) => {
    const result = schema.safeParse(entry);
    if (result.success) {
      parsed.push(result.data);
      return;
    }
    log.warn(
      { strategyName, index, errors: formatZodErrors(result.error) },
      'Skipping malformed response entry',
    );
  });

  return parsed;
}
