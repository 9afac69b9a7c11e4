import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import { z } from 'zod';

/**
 * E-mail section of the run configuration.
 *
 * Values stay strings, as they come from the JSON file; each key is
 * checked individually by the mailer so every gap is reported.
 */
export const emailConfigSchema = z.object({
  sender: z.string().min(1),
  receiver: z.string().regex(/[^,\s]/, 'Must name at least one recipient'),
  password: z.string().min(1),
  'smtp-server': z.string().min(1),
  port: z.string().regex(/^\d+$/, 'Must be a numeric port'),
  subject: z.string().optional(),
  'send-emails': z.string().optional(),
});

export type EmailConfig = z.infer<typeof emailConfigSchema>;

/** Raw e-mail map as supplied by the caller, before validation. */
export type RawEmailConfig = Record<string, string>;

export const mattermostConfigSchema = z.object({
  webhookUrl: z.string().url().optional(),
  channel: z.string().min(1).optional(),
  username: z.string().min(1).optional(),
});

export type MattermostConfig = z.infer<typeof mattermostConfigSchema>;

/** JSON scalars are accepted and kept as strings, e.g. `"port": 587`. */
const emailValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

export const runConfigSchema = z.object({
  email: z.record(z.string(), emailValueSchema).optional(),
  notifications: z.string().optional(),
  mattermost: mattermostConfigSchema.optional(),
});

export type RunConfig = z.infer<typeof runConfigSchema>;

/**
 * Loads the run configuration from a JSON file.
 *
 * Falls back to an empty config (no e-mail, no chat) if the file is
 * missing, not JSON, or does not match the schema; the reason is logged
 * when a logger is given.
 */
export function loadRunConfig(configPath: string, log?: Logger): RunConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err: unknown) {
    log?.warn({ err, configPath }, 'Run config unreadable, using empty config');
    return {};
  }

  const parsed = runConfigSchema.safeParse(raw);
  if (!parsed.success) {
    log?.warn(
      { configPath, issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
      'Run config invalid, using empty config',
    );
    return {};
  }
  return parsed.data;
}

/**
 * Reads Mattermost settings, filling gaps from MATTERMOST_WEBHOOK_URL
 * and MATTERMOST_CHANNEL.
 */
export function resolveMattermostConfig(config: MattermostConfig = {}): MattermostConfig {
  return {
    webhookUrl: config.webhookUrl ?? process.env['MATTERMOST_WEBHOOK_URL'],
    channel: config.channel ?? process.env['MATTERMOST_CHANNEL'],
    username: config.username,
  };
}
