import { posix } from 'node:path';
import { z } from 'zod';
import { ConfigValidationError } from '../core/errors.js';
import type { ExecutionRequest } from '../core/types.js';

export const MAX_FILES = 20;
export const MAX_TOTAL_FILE_BYTES = 10_000_000;
export const NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

const jsonObjectSchema = z.record(z.string(), z.unknown());

// ─────────────────────────────────────────────────
// Base configuration (sandbay.json)
// ─────────────────────────────────────────────────

/**
 * One schema per recognized key. Fields are checked independently so a bad
 * value drops only that field.
 */
export const baseConfigFieldSchemas = {
  system_prompt: z.string(),
  model: z.string(),
  max_turns: z.number().int(),
  output_format: jsonObjectSchema,
  agents: z.union([z.record(z.string(), jsonObjectSchema), z.array(z.unknown())]),
  mcp_servers: jsonObjectSchema,
  skills_dir: z.string(),
  allowed_tools: z.array(z.string()),
  webhook_url: z.string(),
  template_skills: z.boolean(),
} as const;

export type BaseConfigKey = keyof typeof baseConfigFieldSchemas;

export const baseConfigFieldTypes: Record<BaseConfigKey, string> = {
  system_prompt: 'string',
  model: 'string',
  max_turns: 'integer',
  output_format: 'object',
  agents: 'object or array',
  mcp_servers: 'object',
  skills_dir: 'string',
  allowed_tools: 'array of strings',
  webhook_url: 'string',
  template_skills: 'boolean',
};

export function isBaseConfigKey(key: string): key is BaseConfigKey {
  return Object.hasOwn(baseConfigFieldSchemas, key);
}

// ─────────────────────────────────────────────────
// Execution requests
// ─────────────────────────────────────────────────

const filesSchema = z
  .record(z.string(), z.string())
  .transform((files, ctx) => {
    const entries = Object.entries(files);
    if (entries.length > MAX_FILES) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Too many files: ${entries.length} (max ${MAX_FILES})` });
      return z.NEVER;
    }

    const totalBytes = entries.reduce((sum, [, content]) => sum + Buffer.byteLength(content, 'utf-8'), 0);
    if (totalBytes > MAX_TOTAL_FILE_BYTES) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Total file size ${totalBytes} bytes exceeds ${MAX_TOTAL_FILE_BYTES} byte limit`,
      });
      return z.NEVER;
    }

    const safe: Record<string, string> = {};
    for (const [path, content] of entries) {
      const normalized = posix.normalize(path).replace(/^\/+/, '');
      if (normalized.startsWith('..') || normalized === '.' || normalized === '') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Path traversal not allowed: ${path}` });
        return z.NEVER;
      }
      safe[normalized] = content;
    }
    return safe;
  });

const allowListSchema = z.array(z.string()).nullable().optional();

const agentDefinitionSchema = z
  .object({
    description: z.string(),
    prompt: z.string(),
    tools: z.array(z.string()).optional(),
    model: z.string().optional(),
  })
  .passthrough();

export const executionRequestSchema = z.object({
  prompt: z.string().min(1).max(1_000_000),
  model: z.string().min(1).optional(),
  maxTurns: z.number().int().positive().optional(),
  outputFormat: jsonObjectSchema.nullable().optional(),
  timeout: z.number().int().min(5).max(3600).default(300),
  files: filesSchema.optional(),
  extraSkills: z.record(z.string(), z.string()).optional(),
  extraAgents: z.record(z.string(), agentDefinitionSchema).optional(),
  allowedMcpServers: allowListSchema,
  allowedSkills: allowListSchema,
  allowedTools: allowListSchema,
  allowedAgents: allowListSchema,
  anthropicApiKey: z.string().optional(),
  e2bApiKey: z.string().optional(),
  openrouterApiKey: z.string().optional(),
});

export function validateExecutionRequest(data: unknown): {
  success: boolean;
  data?: ExecutionRequest;
  errors?: string[];
} {
  const result = executionRequestSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const errors = result.error.issues.map(
    (issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
  );
  return { success: false, errors };
}

export function parseExecutionRequest(data: unknown): ExecutionRequest {
  const result = validateExecutionRequest(data);
  if (!result.success || !result.data) {
    throw new ConfigValidationError(`Invalid request: ${(result.errors ?? []).join('; ')}`);
  }
  return result.data;
}
