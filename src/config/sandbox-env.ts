import { readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { ConfigValidationError } from '../core/errors.js';
import type { Credentials } from '../core/types.js';
import { PROVIDER_ENV_KEYS, PROVIDER_TOGGLE_KEYS } from './default-config.js';

/** Where GCP service account credentials land inside the sandbox. */
export const GCP_CREDENTIALS_SANDBOX_PATH = '/home/user/.config/gcloud/service_account.json';

export interface ResolvedCredentials {
  anthropicApiKey?: string;
  e2bApiKey: string;
  openrouterApiKey?: string;
}

/**
 * Request keys win over environment variables. Throws when the sandbox
 * provider key is missing or no model provider is reachable.
 */
export function resolveCredentials(
  request: Credentials,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedCredentials {
  const anthropicApiKey = request.anthropicApiKey || env.ANTHROPIC_API_KEY || undefined;
  const openrouterApiKey = request.openrouterApiKey || env.OPENROUTER_API_KEY || undefined;
  const e2bApiKey = request.e2bApiKey || env.E2B_API_KEY || undefined;

  const usesAlternateProvider = PROVIDER_TOGGLE_KEYS.some((key) => Boolean(env[key]));
  const usesCustomBaseUrl = Boolean(env.ANTHROPIC_BASE_URL);
  if (!anthropicApiKey && !usesAlternateProvider && !usesCustomBaseUrl) {
    throw new ConfigValidationError(
      'anthropicApiKey is required: pass it in the request or set ANTHROPIC_API_KEY in the environment'
    );
  }
  if (!e2bApiKey) {
    throw new ConfigValidationError(
      'e2bApiKey is required: pass it in the request or set E2B_API_KEY in the environment'
    );
  }

  return { anthropicApiKey, e2bApiKey, openrouterApiKey };
}

export function buildSandboxEnv(
  credentials: ResolvedCredentials,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const sandboxEnv: Record<string, string> = {};
  if (credentials.anthropicApiKey) {
    sandboxEnv.ANTHROPIC_API_KEY = credentials.anthropicApiKey;
  }
  for (const key of PROVIDER_ENV_KEYS) {
    const value = env[key];
    if (value) sandboxEnv[key] = value;
  }

  if (credentials.openrouterApiKey) {
    sandboxEnv.ANTHROPIC_AUTH_TOKEN = credentials.openrouterApiKey;
  }

  // With a custom base URL plus auth token the SDK must not see a real
  // Anthropic key, or it validates model names against Anthropic's API.
  if (sandboxEnv.ANTHROPIC_BASE_URL && sandboxEnv.ANTHROPIC_AUTH_TOKEN) {
    sandboxEnv.ANTHROPIC_API_KEY = '';
  }

  return sandboxEnv;
}

/**
 * Read the GCP service account JSON when Vertex AI is enabled. Read eagerly,
 * before provisioning, and uploaded later.
 */
export function readGcpCredentials(
  env: NodeJS.ProcessEnv = process.env,
  cwd = process.cwd(),
): string | null {
  if (!env.CLAUDE_CODE_USE_VERTEX) return null;

  const configured = env.GOOGLE_APPLICATION_CREDENTIALS;
  if (!configured) {
    throw new ConfigValidationError(
      'GOOGLE_APPLICATION_CREDENTIALS is required when using Vertex AI: set it to the path of a service account JSON key'
    );
  }

  const path = isAbsolute(configured) ? configured : resolve(cwd, configured);
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigValidationError(`GOOGLE_APPLICATION_CREDENTIALS file not found: ${configured}`, { cause: err });
  }
}
