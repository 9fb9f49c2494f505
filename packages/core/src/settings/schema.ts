/**
 * @fileoverview Settings Schema
 *
 * Zod schema for the user settings file. Every key is optional; unknown keys
 * are rejected so typos surface instead of being ignored.
 */

import { z, type ZodError } from 'zod';
import { LOG_LEVELS } from '../logging/index.js';

const logLevelSchema = z.enum(LOG_LEVELS);

export const userSettingsSchema = z
  .object({
    prompt: z.string(),
    history: z
      .object({
        capacity: z.number().int().min(1).max(100_000),
        persist: z.boolean(),
        file: z.string().min(1),
      })
      .partial()
      .strict(),
    logging: z
      .object({
        level: logLevelSchema,
        file: z.string().min(1),
        pretty: z.boolean(),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type UserSettings = z.infer<typeof userSettingsSchema>;

/**
 * Format zod issues as `path: message` lines
 */
export function formatSettingsIssues(error: ZodError): string[] {
  return error.errors.map((issue) => {
    const where = issue.path.join('.') || 'settings';
    return `${where}: ${issue.message}`;
  });
}
