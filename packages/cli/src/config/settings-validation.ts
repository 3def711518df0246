/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

const positiveInt = z.number().int().positive();

export const settingsZodSchema = z
  .object({
    maxLines: positiveInt.optional(),
    maxLineLength: positiveInt.optional(),
    tabWidth: positiveInt.max(32).optional(),
    viewportRows: positiveInt.optional(),
    debug: z.boolean().optional(),
  })
  .strict();

export type Settings = z.infer<typeof settingsZodSchema>;

export function validateSettings(
  data: unknown,
): z.SafeParseReturnType<unknown, Settings> {
  return settingsZodSchema.safeParse(data);
}

const MAX_ERRORS_TO_DISPLAY = 5;

/**
 * Format a Zod error into a helpful error message
 */
export function formatValidationError(
  error: z.ZodError,
  filePath: string,
): string {
  const lines: string[] = [`Invalid configuration in ${filePath}:`];

  for (const issue of error.issues.slice(0, MAX_ERRORS_TO_DISPLAY)) {
    const path = issue.path.reduce<string>(
      (acc, curr) =>
        typeof curr === 'number'
          ? `${acc}[${curr}]`
          : `${acc ? acc + '.' : ''}${curr}`,
      '',
    );
    lines.push(`  ${path || '(root)'}: ${issue.message}`);
  }

  if (error.issues.length > MAX_ERRORS_TO_DISPLAY) {
    lines.push(
      `  ...and ${error.issues.length - MAX_ERRORS_TO_DISPLAY} more error(s)`,
    );
  }

  return lines.join('\n');
}
