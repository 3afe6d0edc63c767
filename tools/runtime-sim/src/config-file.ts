import { readFileSync } from 'node:fs';

import JSON5 from 'json5';
import { z } from 'zod';

import type { EngineConfigOverrides } from '@epochs/core';

const finite = z.number().finite();

const configOverridesSchema = z
  .object({
    time: z
      .object({
        startYear: finite.int(),
        yearsPerRealSecond: finite.positive(),
        defaultSpeed: finite.positive(),
        minSpeed: finite.positive(),
        maxSpeed: finite.positive(),
      })
      .partial()
      .strict()
      .optional(),
    timeSkip: z
      .object({ secondsPerYear: finite.nonnegative() })
      .partial()
      .strict()
      .optional(),
    events: z
      .object({
        equalityEpsilon: finite.nonnegative(),
        pauseTimeWhileActive: z.boolean(),
      })
      .partial()
      .strict()
      .optional(),
    resources: z
      .object({ startAmountMultiplier: finite.nonnegative() })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

export function parseConfigOverrides(value: unknown): EngineConfigOverrides {
  const result = configOverridesSchema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid engine config:\n${details}`);
  }
  return result.data;
}

export function loadConfigOverrides(file: string): EngineConfigOverrides {
  return parseConfigOverrides(JSON5.parse(readFileSync(file, 'utf8')));
}
