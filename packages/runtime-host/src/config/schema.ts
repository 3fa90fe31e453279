/**
 * render-dash Runtime Host — Config File Schema
 *
 * Structural shape of config.yaml. Cross-record rules (unique ids, unique
 * aliases, non-empty store) are checked after parsing in load.ts.
 */

import { z } from 'zod';
import { DEFAULT_PRIORITY } from '@render-dash/core';

export const DEFAULT_REFRESH_INTERVAL_SECONDS = 30;
export const MIN_REFRESH_INTERVAL_SECONDS = 5;
export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 30;

export const ServiceEntrySchema = z.object({
  id: z.string().trim().min(1, 'id must be a non-empty string'),
  name: z.string().trim().min(1).optional(),
  aliases: z
    .array(z.string().trim().min(1, 'aliases must be non-empty strings'))
    .min(1, 'at least one alias is required'),
  priority: z.number().int('priority must be an integer').default(DEFAULT_PRIORITY),
});

export const RenderSectionSchema = z.object({
  api_key: z.string().optional(),
  refresh_interval: z
    .number()
    .min(MIN_REFRESH_INTERVAL_SECONDS, `refresh_interval must be at least ${MIN_REFRESH_INTERVAL_SECONDS} seconds`)
    .default(DEFAULT_REFRESH_INTERVAL_SECONDS),
  request_timeout: z
    .number()
    .positive('request_timeout must be a positive number of seconds')
    .default(DEFAULT_REQUEST_TIMEOUT_SECONDS),
});

export const ConfigFileSchema = z.object({
  render: RenderSectionSchema.default({}),
  services: z.array(ServiceEntrySchema).nullish(),
});

export type ServiceEntry = z.infer<typeof ServiceEntrySchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** One line per issue, prefixed with the dotted path into the document. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('\n');
}
