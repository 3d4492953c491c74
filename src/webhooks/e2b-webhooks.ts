// Sandbay E2B Webhooks - Register, list and delete sandbox lifecycle webhooks

import { createHmac, randomBytes } from 'node:crypto';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import { WebhookError, describeError } from '../core/errors.js';

export const E2B_WEBHOOK_API = 'https://api.e2b.app/events/webhooks';
export const WEBHOOK_PATH = '/webhooks/e2b';
export const WEBHOOK_SECRET_ENV = 'SANDBAY_WEBHOOK_SECRET';
export const AUTO_WEBHOOK_NAME = 'sandbay-auto';

export const LIFECYCLE_EVENTS = [
  'sandbox.lifecycle.created',
  'sandbox.lifecycle.updated',
  'sandbox.lifecycle.killed',
] as const;

const API_TIMEOUT_MS = 30_000;
const TEST_TIMEOUT_MS = 10_000;

const webhookSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    url: z.string().optional(),
    enabled: z.boolean().optional(),
  })
  .passthrough();

export type Webhook = z.infer<typeof webhookSchema>;

/** Ensure the URL ends with the receiver path. */
export function normalizeWebhookUrl(url: string): string {
  const trimmed = url.replace(/\/+$/, '');
  return trimmed.endsWith(WEBHOOK_PATH) ? trimmed : `${trimmed}${WEBHOOK_PATH}`;
}

export function generateWebhookSecret(): string {
  return randomBytes(32).toString('hex');
}

/** Value of the `e2b-signature` header for `body`. */
export function signWebhookPayload(secret: string, body: string): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

export interface WebhookClientOptions {
  apiKey: string;
  baseUrl?: string;
  fetch?: typeof fetch;
}

export class WebhookClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: WebhookClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? E2B_WEBHOOK_API;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async register(url: string, secret: string, name = 'sandbay'): Promise<Webhook> {
    const result = await this.request('POST', '', {
      name,
      url,
      enabled: true,
      signatureSecret: secret,
      events: [...LIFECYCLE_EVENTS],
    });
    const parsed = webhookSchema.safeParse(result);
    if (!parsed.success) {
      throw new WebhookError('E2B API returned an unexpected webhook registration response', null);
    }
    return parsed.data;
  }

  async list(): Promise<Webhook[]> {
    const result = await this.request('GET', '');
    if (result === null) return [];
    const parsed = z.array(webhookSchema).safeParse(Array.isArray(result) ? result : [result]);
    if (!parsed.success) {
      throw new WebhookError('E2B API returned an unexpected webhook list', null);
    }
    return parsed.data;
  }

  async delete(webhookId: string): Promise<void> {
    await this.request('DELETE', `/${encodeURIComponent(webhookId)}`);
  }

  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: { 'X-API-Key': this.apiKey, 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(API_TIMEOUT_MS),
      });
    } catch (err) {
      throw new WebhookError(`Failed to reach E2B API: ${describeError(err)}`, null, { cause: err });
    }

    const text = await response.text();
    if (!response.ok) {
      throw new WebhookError(`E2B API returned ${response.status}: ${text}`, response.status);
    }
    if (!text) return null;
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new WebhookError(`E2B API returned invalid JSON (${response.status})`, response.status, { cause: err });
    }
  }
}

export interface TestDelivery {
  ok: boolean;
  status: number;
  body: string;
}

/** POST a synthetic lifecycle event to a receiver, signed when a secret is given. */
export async function sendTestEvent(url: string, secret: string, fetchImpl: typeof fetch = fetch): Promise<TestDelivery> {
  const body = JSON.stringify({
    type: 'sandbox.lifecycle.test',
    sandboxId: 'test-sandbox-000',
    eventData: { sandbox_metadata: { request_id: 'test0000' } },
  });
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (secret) {
    headers['e2b-signature'] = signWebhookPayload(secret, body);
  }

  const response = await fetchImpl(url, {
    method: 'POST',
    headers,
    body,
    signal: AbortSignal.timeout(TEST_TIMEOUT_MS),
  });
  return { ok: response.ok, status: response.status, body: await response.text() };
}

/** Set `key` in a dotenv file, replacing an existing assignment. */
export function saveEnvValue(path: string, key: string, value: string): void {
  const lines = existsSync(path) ? readFileSync(path, 'utf-8').split('\n') : [];
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

  const entry = `${key}=${value}`;
  const index = lines.findIndex((line) => line.startsWith(`${key}=`));
  if (index >= 0) {
    lines[index] = entry;
  } else {
    lines.push(entry);
  }
  writeFileSync(path, lines.join('\n') + '\n');
}

export interface WebhookRegistration {
  id: string;
  apiKey: string;
}

/**
 * Register `webhook_url` for the lifetime of a long-running process. Skipped
 * without a URL or an E2B key; failures are logged and yield null.
 */
export async function autoRegisterWebhook(
  webhookUrl: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  fetchImpl: typeof fetch = fetch,
): Promise<WebhookRegistration | null> {
  const apiKey = env.E2B_API_KEY ?? '';
  if (!webhookUrl || !apiKey) return null;

  const url = normalizeWebhookUrl(webhookUrl);
  let secret = env[WEBHOOK_SECRET_ENV] ?? '';
  if (!secret) {
    secret = generateWebhookSecret();
    console.info(`[Webhook] Generated a webhook secret (set ${WEBHOOK_SECRET_ENV} to persist one)`);
  }

  try {
    const webhook = await new WebhookClient({ apiKey, fetch: fetchImpl }).register(url, secret, AUTO_WEBHOOK_NAME);
    console.info(`[Webhook] Registered E2B webhook id=${webhook.id} url=${url}`);
    return { id: webhook.id, apiKey };
  } catch (err) {
    console.warn(`[Webhook] Failed to register E2B webhook: ${describeError(err)}`);
    return null;
  }
}

/** Best-effort removal of an auto-registered webhook. */
export async function deregisterWebhook(
  registration: WebhookRegistration | null,
  fetchImpl: typeof fetch = fetch,
): Promise<void> {
  if (!registration) return;
  try {
    await new WebhookClient({ apiKey: registration.apiKey, fetch: fetchImpl }).delete(registration.id);
    console.info(`[Webhook] Deregistered E2B webhook id=${registration.id}`);
  } catch (err) {
    console.warn(`[Webhook] Failed to deregister E2B webhook id=${registration.id}: ${describeError(err)}`);
  }
}
