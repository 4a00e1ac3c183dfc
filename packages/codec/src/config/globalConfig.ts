// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Every configuration key the codec reads, with its parser and default.
 * Values are taken from the process environment under the same name.
 */
export const GlobalConfig = z.object({
  LOG_LEVEL: logLevelSchema.default('info'),
  LOG_NAME: z.string().trim().min(1).default('envelope-codec'),
});

export type ParsedConfig = z.output<typeof GlobalConfig>;

export type ConfigKey = keyof ParsedConfig;
