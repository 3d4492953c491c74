#!/usr/bin/env node

import 'dotenv/config';
import { basename, dirname, join, resolve } from 'node:path';
import { Command } from 'commander';
import { SlackBot } from './channels/slack/slack-bot.js';
import type { ChannelStatusChange } from './channels/types.js';
import { readHostFiles } from './cli/host-files.js';
import { renderEvent } from './cli/render-event.js';
import { loadBaseConfig } from './config/config-loader.js';
import { CONFIG_FILE_NAME, slackConfigFromEnv } from './config/default-config.js';
import { validateExecutionRequest } from './config/schema.js';
import { describeError, isAbortError } from './core/errors.js';
import { errorLine, parseStreamEvent } from './core/stream-events.js';
import { ExecutionPool } from './pool/execution-pool.js';
import { AgentRunner, newRequestId } from './sandbox/agent-runner.js';
import { E2BSandboxProvider } from './sandbox/e2b-provider.js';
import { SandboxProvisioner } from './sandbox/provisioner.js';
import { RunStore } from './store/run-store.js';
import {
  WEBHOOK_SECRET_ENV,
  WebhookClient,
  autoRegisterWebhook,
  deregisterWebhook,
  generateWebhookSecret,
  normalizeWebhookUrl,
  saveEnvValue,
  sendTestEvent,
} from './webhooks/e2b-webhooks.js';

function createRunner(): AgentRunner {
  return new AgentRunner(new SandboxProvisioner(new E2BSandboxProvider()));
}

function parseOptionalInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function webhookClient(explicitKey: string | undefined): WebhookClient | null {
  const apiKey = explicitKey || process.env.E2B_API_KEY || '';
  if (!apiKey) {
    console.error('Error: E2B API key required (--e2b-api-key or E2B_API_KEY)');
    process.exitCode = 1;
    return null;
  }
  return new WebhookClient({ apiKey });
}

const program = new Command();

program
  .name('sandbay')
  .description('Run an AI agent in an isolated cloud sandbox and stream its output')
  .version('0.1.0');

program
  .command('run')
  .description('Run the agent once and stream its output')
  .argument('<prompt>', 'Task for the agent')
  .option('-m, --model <model>', 'Model override')
  .option('--max-turns <number>', 'Maximum agent turns')
  .option('-t, --timeout <seconds>', 'Sandbox lifetime in seconds', '300')
  .option('-f, --file <path...>', 'Upload files into the sandbox working directory')
  .option('--json', 'Print raw JSON event lines')
  .option('-v, --verbose', 'Show stderr and system events')
  .action(
    async (
      prompt: string,
      options: { model?: string; maxTurns?: string; timeout: string; file?: string[]; json?: boolean; verbose?: boolean },
    ) => {
      const requestId = newRequestId();

      let raw: Record<string, unknown>;
      try {
        const files = options.file ? readHostFiles(options.file) : undefined;
        raw = {
          prompt,
          model: options.model,
          maxTurns: parseOptionalInt(options.maxTurns, '--max-turns'),
          timeout: parseOptionalInt(options.timeout, '--timeout'),
          files,
        };
      } catch (err) {
        console.error(describeError(err));
        process.exitCode = 1;
        return;
      }

      const validation = validateExecutionRequest(raw);
      if (!validation.success || !validation.data) {
        console.error('Invalid request:');
        for (const err of validation.errors ?? []) {
          console.error(`  - ${err}`);
        }
        process.exitCode = 1;
        return;
      }
      const request = validation.data;

      const store = new RunStore();
      store.create(requestId, request.prompt, request.model ?? null, Object.keys(request.files ?? {}).length);
      const started = Date.now();
      const elapsed = () => Math.round((Date.now() - started) / 100) / 10;

      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once('SIGINT', onSigint);

      try {
        for await (const line of createRunner().run(request, { requestId, signal: controller.signal })) {
          const event = parseStreamEvent(line);
          if (options.json) {
            process.stdout.write(line + '\n');
          } else if (event) {
            const rendered = renderEvent(event, { verbose: options.verbose });
            if (rendered.stdout) process.stdout.write(rendered.stdout + '\n');
            if (rendered.stderr) process.stderr.write(rendered.stderr + '\n');
          }

          if (event?.type === 'result') {
            store.complete(requestId, {
              costUsd: event.total_cost_usd ?? event.cost_usd ?? null,
              numTurns: event.num_turns ?? null,
              durationSecs: elapsed(),
              model: event.model,
            });
          } else if (event?.type === 'error') {
            store.fail(requestId, event.error, elapsed());
            process.exitCode = 1;
          }
        }
      } catch (err) {
        const message = isAbortError(err) ? 'Cancelled' : describeError(err);
        store.fail(requestId, message, elapsed());
        if (options.json) {
          process.stdout.write(errorLine(message, requestId) + '\n');
        } else {
          console.error(`Error: ${message}`);
        }
        process.exitCode = isAbortError(err) ? 130 : 1;
      } finally {
        process.off('SIGINT', onSigint);
      }
    },
  );

program
  .command('config')
  .description('Show or validate sandbay.json')
  .option('-s, --show', 'Show the effective base configuration')
  .option('-v, --validate [path]', 'Validate a configuration file')
  .action((options: { show?: boolean; validate?: string | boolean }) => {
    if (options.validate) {
      const path = resolve(typeof options.validate === 'string' ? options.validate : CONFIG_FILE_NAME);
      const config = loadBaseConfig(dirname(path), basename(path));
      if (config === null) {
        console.error(`Configuration could not be loaded from ${path}.`);
        process.exitCode = 1;
        return;
      }
      console.log(`Configuration loaded: ${Object.keys(config).length} field(s) accepted.`);
    } else if (options.show) {
      const config = loadBaseConfig();
      if (config === null) {
        console.log(`No usable ${CONFIG_FILE_NAME} in ${process.cwd()}.`);
        return;
      }
      console.log(JSON.stringify(config, null, 2));
    } else {
      console.log('Use --show to display the effective config or --validate [path] to validate a config file.');
    }
  });

program
  .command('runs')
  .description('List recent runs')
  .option('-n, --lines <number>', 'Number of runs to show', '20')
  .action((options: { lines: string }) => {
    const limit = Number.parseInt(options.lines, 10) || 20;
    const runs = new RunStore().list(limit);
    if (runs.length === 0) {
      console.log('No runs recorded yet.');
      return;
    }
    for (const run of runs) {
      const cost = run.costUsd === null ? '-' : `$${run.costUsd.toFixed(4)}`;
      const detail = run.error ? ` error=${run.error}` : '';
      console.log(`[${run.startedAt}] ${run.id} ${run.status} model=${run.model ?? '-'} cost=${cost} "${run.prompt}"${detail}`);
    }
  });

const webhook = program.command('webhook').description('Manage E2B sandbox lifecycle webhooks');

webhook
  .command('register')
  .description('Register a lifecycle webhook (the receiver path /webhooks/e2b is appended when missing)')
  .argument('<url>', 'Public endpoint of the webhook receiver')
  .option('--secret <secret>', `Signature secret [env: ${WEBHOOK_SECRET_ENV}]`)
  .option('--e2b-api-key <key>', 'E2B API key [env: E2B_API_KEY]')
  .option('--no-save', 'Do not write the secret to .env')
  .action(async (rawUrl: string, options: { secret?: string; e2bApiKey?: string; save: boolean }) => {
    const client = webhookClient(options.e2bApiKey);
    if (!client) return;

    const url = normalizeWebhookUrl(rawUrl);
    if (url !== rawUrl) {
      console.error(`Using webhook URL: ${url}`);
    }

    let secret = options.secret || process.env[WEBHOOK_SECRET_ENV] || '';
    if (!secret) {
      secret = generateWebhookSecret();
      console.error(`Generated webhook secret: ${secret}`);
      console.error('Save this secret securely; it will not be shown again.');
    }

    const result = await client.register(url, secret);
    console.log(`Webhook registered: ${JSON.stringify(result, null, 2)}`);

    if (options.save) {
      saveEnvValue(join(process.cwd(), '.env'), WEBHOOK_SECRET_ENV, secret);
      console.error(`Saved ${WEBHOOK_SECRET_ENV} to .env`);
    }
  });

webhook
  .command('list')
  .description('List registered webhooks')
  .option('--e2b-api-key <key>', 'E2B API key [env: E2B_API_KEY]')
  .action(async (options: { e2bApiKey?: string }) => {
    const client = webhookClient(options.e2bApiKey);
    if (!client) return;

    const webhooks = await client.list();
    if (webhooks.length === 0) {
      console.log('No webhooks registered.');
      return;
    }
    for (const item of webhooks) {
      console.log(`  ${item.id}  ${(item.name ?? '?').padEnd(20)}  ${item.url ?? '?'}  enabled=${item.enabled ?? '?'}`);
    }
  });

webhook
  .command('delete')
  .description('Delete a webhook by id')
  .argument('<id>', 'Webhook id')
  .option('--e2b-api-key <key>', 'E2B API key [env: E2B_API_KEY]')
  .action(async (id: string, options: { e2bApiKey?: string }) => {
    const client = webhookClient(options.e2bApiKey);
    if (!client) return;

    await client.delete(id);
    console.log(`Webhook ${id} deleted.`);
  });

webhook
  .command('test')
  .description('Send a signed test event to a webhook receiver')
  .argument('<url>', 'Receiver endpoint')
  .option('--secret <secret>', `Signature secret [env: ${WEBHOOK_SECRET_ENV}]`)
  .action(async (url: string, options: { secret?: string }) => {
    try {
      const delivery = await sendTestEvent(url, options.secret || process.env[WEBHOOK_SECRET_ENV] || '');
      if (delivery.ok) {
        console.log(`OK ${delivery.status}: ${delivery.body}`);
      } else {
        console.error(`Failed ${delivery.status}: ${delivery.body}`);
        process.exitCode = 1;
      }
    } catch (err) {
      console.error(`Unreachable: ${describeError(err)}`);
      process.exitCode = 1;
    }
  });

program
  .command('slack')
  .description('Start the Slack bot (Socket Mode)')
  .action(async () => {
    const bot = new SlackBot(slackConfigFromEnv(), {
      runner: createRunner(),
      pool: new ExecutionPool(),
      store: new RunStore(),
    });
    bot.on('status', (change: ChannelStatusChange) => {
      console.info(`[SlackBot] ${change.previous} -> ${change.status}`);
    });

    try {
      await bot.connect();
    } catch (err) {
      console.error(`Failed to start Slack bot: ${describeError(err)}`);
      process.exitCode = 1;
      return;
    }
    const registration = await autoRegisterWebhook(loadBaseConfig()?.webhookUrl);
    console.log('Sandbay Slack bot running. Press Ctrl+C to stop.');

    const shutdown = async () => {
      console.log('\nShutting down Slack bot...');
      await deregisterWebhook(registration);
      try {
        await bot.disconnect();
      } catch (err) {
        console.error(`Failed to stop cleanly: ${describeError(err)}`);
      }
      process.exit(0);
    };
    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  });

program.parseAsync().catch((err: unknown) => {
  console.error(describeError(err));
  process.exit(1);
});
