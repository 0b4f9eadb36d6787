import type { Logger } from 'pino';
import { z } from 'zod';

import { InvalidArgumentError } from '../errors/invalid-argument-error.js';
import { createChildLogger, createLogger } from '../logger/logger.js';
import { extractFieldErrors } from '../validation/extract-field-errors.js';

export const DEFAULT_UNKNOWN_ROOT_CAUSE_TEXT = 'unknown root cause';

export const exceptionsSettingsSchema = z.object({
  rootCauseBackfill: z.boolean(),
  unknownRootCauseText: z
    .string()
    .refine((text) => text.trim().length > 0, 'Unknown root cause text must not be blank'),
});

export type ExceptionsSettings = z.infer<typeof exceptionsSettingsSchema>;

export interface ExceptionsConfig extends ExceptionsSettings {
  readonly logger: Logger;
}

export type ExceptionsConfigOverrides = Partial<ExceptionsSettings> & { logger?: Logger };

function defaultConfig(): ExceptionsConfig {
  return Object.freeze({
    rootCauseBackfill: true,
    unknownRootCauseText: DEFAULT_UNKNOWN_ROOT_CAUSE_TEXT,
    logger: createChildLogger(createLogger(), { module: 'exceptions' }),
  });
}

let current: ExceptionsConfig = defaultConfig();

export function getExceptionsConfig(): ExceptionsConfig {
  return current;
}

/**
 * Validate and merge configuration overrides.
 * Invalid overrides throw InvalidArgumentError and leave the current configuration in place.
 */
export function configureExceptions(overrides: ExceptionsConfigOverrides): ExceptionsConfig {
  const { logger, ...settings } = overrides;
  const result = exceptionsSettingsSchema.partial().safeParse(settings);
  if (!result.success) {
    throw InvalidArgumentError.fromDetails(
      'exceptions configuration',
      extractFieldErrors(result.error.issues),
    );
  }

  current = Object.freeze({
    rootCauseBackfill: result.data.rootCauseBackfill ?? current.rootCauseBackfill,
    unknownRootCauseText: result.data.unknownRootCauseText ?? current.unknownRootCauseText,
    logger: logger ?? current.logger,
  });
  return current;
}

export function resetExceptionsConfig(): void {
  current = defaultConfig();
}
