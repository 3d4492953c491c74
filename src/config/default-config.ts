export const CONFIG_FILE_NAME = 'sandbay.json';

export const RUN_STORE_PATH = '.sandbay/runs.jsonl';
export const RUN_STORE_MAX_RUNS = 200;

/** One pool entry per active conversation thread. */
export const MAX_POOL_ENTRIES = 1000;

export const DEFAULT_REQUEST_TIMEOUT_SECS = 300;

/** Provider env vars forwarded from the host environment into the sandbox. */
export const PROVIDER_ENV_KEYS: readonly string[] = [
  // Google Vertex AI
  'CLAUDE_CODE_USE_VERTEX',
  'CLOUD_ML_REGION',
  'ANTHROPIC_VERTEX_PROJECT_ID',
  // Amazon Bedrock
  'CLAUDE_CODE_USE_BEDROCK',
  'AWS_REGION',
  'AWS_ACCESS_KEY_ID',
  'AWS_SECRET_ACCESS_KEY',
  'AWS_SESSION_TOKEN',
  // Microsoft Foundry
  'CLAUDE_CODE_USE_FOUNDRY',
  'AZURE_FOUNDRY_RESOURCE',
  'AZURE_API_KEY',
  // Custom base URL (proxy, self-hosted, OpenRouter)
  'ANTHROPIC_BASE_URL',
  'ANTHROPIC_AUTH_TOKEN',
  // Model alias remapping
  'ANTHROPIC_DEFAULT_SONNET_MODEL',
  'ANTHROPIC_DEFAULT_OPUS_MODEL',
  'ANTHROPIC_DEFAULT_HAIKU_MODEL',
];

export const PROVIDER_TOGGLE_KEYS: readonly string[] = [
  'CLAUDE_CODE_USE_VERTEX',
  'CLAUDE_CODE_USE_BEDROCK',
  'CLAUDE_CODE_USE_FOUNDRY',
];

export interface SlackBotConfig {
  enabled: boolean;
  botToken: string;
  appToken: string;
  signingSecret: string;
  model?: string;
  timeout: number;
}

export function slackConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SlackBotConfig {
  const timeout = Number.parseInt(env.SANDBAY_SLACK_TIMEOUT ?? '', 10);
  return {
    enabled: Boolean(env.SLACK_BOT_TOKEN && env.SLACK_APP_TOKEN),
    botToken: env.SLACK_BOT_TOKEN ?? '',
    appToken: env.SLACK_APP_TOKEN ?? '',
    signingSecret: env.SLACK_SIGNING_SECRET ?? '',
    model: env.SANDBAY_SLACK_MODEL || undefined,
    timeout: Number.isNaN(timeout) ? DEFAULT_REQUEST_TIMEOUT_SECS : timeout,
  };
}
