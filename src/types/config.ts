// Settings file schema (resolve_slack_settings.json).
// Keys stay snake_case to match the file operators edit by hand.

import { z } from 'zod';

/** Values written into a freshly bootstrapped settings file. */
export const CONFIG_PLACEHOLDERS = {
  slack_token: 'xoxb-REPLACE_WITH_YOUR_TOKEN',
  channel_name: 'CXXXXXXXX',
  log_directory: '~/Desktop',
} as const;

const requiredString = (field: keyof typeof CONFIG_PLACEHOLDERS, placeholderAllowed = false) =>
  z
    .string({ required_error: 'is missing', invalid_type_error: 'must be a string' })
    .trim()
    .min(1, 'is empty')
    .refine(
      (value) => placeholderAllowed || value !== CONFIG_PLACEHOLDERS[field],
      'still holds the template placeholder',
    );

export const NotifierConfigSchema = z.object({
  slack_token: requiredString('slack_token'),
  channel_name: requiredString('channel_name'),
  // The template's log directory is a usable default, so it may stay as written.
  log_directory: requiredString('log_directory', true),

  // Coerced: env overrides arrive as strings.
  timeout_ms: z.coerce.number().int().min(1000).default(10_000),
  notification_title: z.string().trim().min(1).default('DaVinci Resolve'),
  log_prefix: z
    .string()
    .regex(/^[A-Za-z0-9._-]+$/, 'may only contain letters, digits, ".", "_" and "-"')
    .default('resolve_slack_deliver'),
});

export type NotifierConfig = z.infer<typeof NotifierConfigSchema>;
