import { z } from 'zod';
import type { Logger } from './logger';
import type { ApiVersion, Credentials } from './types';

export const DEFAULT_TIMEOUT_MS = 15000;
export const DEFAULT_V2_REQUEST_SPACING_MS = 1000;
export const TOKEN_REFRESH_BUFFER_MS = 60 * 1000; // Re-authenticate 1 minute before expiry
export const FALLBACK_SESSION_TTL_MS = 60 * 60 * 1000; // When the server declares no expiry
export const USER_AGENT = 'heatpump-cloud-client/1.0';

export const DEFAULT_BASE_URLS: Record<ApiVersion, string> = {
  v1: 'https://mastertherm.vip-it.cz',
  v2: 'https://mastertherm.online',
};

export interface VersionSpec {
  version: ApiVersion;
  baseUrl: string;
  /** Minimum gap between two outbound calls; 0 disables the gate. */
  minSpacingMs: number;
  timeoutMs: number;
}

const clientOptionsSchema = z.object({
  username: z.string().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
  apiVersion: z.enum(['v1', 'v2']).default('v1'),
  redactSensitive: z.boolean().default(false),
  requestSpacingMs: z.number().int().nonnegative().optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  refreshBufferMs: z.number().int().nonnegative().default(TOKEN_REFRESH_BUFFER_MS),
  baseUrl: z.string().url().optional(),
});

export type ClientOptions = z.input<typeof clientOptionsSchema> & {
  logger?: Logger;
};

export interface ResolvedOptions {
  credentials: Credentials;
  versionSpec: VersionSpec;
  redactSensitive: boolean;
  refreshBufferMs: number;
}

export function resolveOptions(options: ClientOptions): ResolvedOptions {
  const { logger: _logger, ...rest } = options;
  const result = clientOptionsSchema.safeParse(rest);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('; ');
    throw new TypeError(`Invalid client options: ${details}`);
  }

  const parsed = result.data;
  // Only the 2022+ backend penalizes request bursts.
  const minSpacingMs =
    parsed.apiVersion === 'v2' ? parsed.requestSpacingMs ?? DEFAULT_V2_REQUEST_SPACING_MS : 0;

  return {
    credentials: Object.freeze({ username: parsed.username, password: parsed.password }),
    versionSpec: {
      version: parsed.apiVersion,
      baseUrl: (parsed.baseUrl ?? DEFAULT_BASE_URLS[parsed.apiVersion]).replace(/\/+$/, ''),
      minSpacingMs,
      timeoutMs: parsed.timeoutMs,
    },
    redactSensitive: parsed.redactSensitive,
    refreshBufferMs: parsed.refreshBufferMs,
  };
}
