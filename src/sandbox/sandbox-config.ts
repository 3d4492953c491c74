// Sandbay Sandbox Configuration

export interface SandboxConfig {
  /** Pre-baked template with the agent SDK installed. */
  template: string;
  /** Generic template used when `template` does not exist; needs a runtime SDK install. */
  fallbackTemplate: string;
  sdkVersion: string;
  /** Seconds. */
  sdkInstallTimeout: number;
  /** Seconds. */
  runnerTimeout: number;
  /** Seconds, for mkdir and other housekeeping commands. */
  setupTimeout: number;
  queueCapacity: number;
  workdir: string;
  runnerDir: string;
}

export const DEFAULT_SANDBOX_CONFIG: SandboxConfig = {
  template: process.env.SANDBAY_TEMPLATE || 'sandbay-agent',
  fallbackTemplate: 'claude-code',
  sdkVersion: '0.2.42',
  sdkInstallTimeout: 120,
  runnerTimeout: 1800,
  setupTimeout: 10,
  queueCapacity: 10_000,
  workdir: '/home/user',
  runnerDir: '/opt/agent-runner',
};

export function sdkInstallCommand(config: SandboxConfig): string {
  return [
    `mkdir -p ${config.runnerDir}`,
    `cd ${config.runnerDir}`,
    'npm init -y',
    `npm install @anthropic-ai/claude-agent-sdk@${config.sdkVersion}`,
  ].join(' && ');
}

export function runnerCommand(config: SandboxConfig): string {
  return `node ${config.runnerDir}/runner.mjs`;
}
