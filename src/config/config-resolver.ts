// Sandbay Config Resolver - Merges base config, request overrides and allow-lists

import { ConfigValidationError } from '../core/errors.js';
import type {
  AgentsConfig,
  AllowList,
  BaseConfig,
  ExecutionRequest,
  ResolvedExecution,
  SkillSet,
} from '../core/types.js';
import { DEFAULT_SANDBOX_CONFIG } from '../sandbox/sandbox-config.js';
import { SKILL_MANIFEST, isAgentMap } from './config-loader.js';
import { NAME_PATTERN } from './schema.js';

export const SKILL_TOOL_NAME = 'Skill';

/** Keep only keys on the allow-list. `null`/`undefined` keeps everything. */
export function filterByAllowList<T>(items: Record<string, T>, allowList: AllowList | undefined): Record<string, T> {
  if (allowList === null || allowList === undefined) return { ...items };
  const allowed = new Set(allowList);
  const filtered: Record<string, T> = {};
  for (const [name, value] of Object.entries(items)) {
    if (allowed.has(name)) filtered[name] = value;
  }
  return filtered;
}

function assertValidNames(kind: string, names: string[]): void {
  for (const name of names) {
    if (!NAME_PATTERN.test(name)) {
      throw new ConfigValidationError(
        `Invalid ${kind} name "${name}": only letters, digits, "_" and "-" are allowed`
      );
    }
  }
}

export function mergeSkills(
  diskSkills: SkillSet,
  extraSkills: Record<string, string> | undefined,
  allowedSkills: AllowList | undefined,
): SkillSet {
  const merged: SkillSet = { ...diskSkills };
  for (const [name, content] of Object.entries(extraSkills ?? {})) {
    merged[name] = { [SKILL_MANIFEST]: content };
  }
  return filterByAllowList(merged, allowedSkills);
}

function resolveAgents(base: AgentsConfig | undefined, request: ExecutionRequest): AgentsConfig | undefined {
  const wantsNamedAccess = request.extraAgents !== undefined
    || (request.allowedAgents !== undefined && request.allowedAgents !== null);

  if (base !== undefined && !isAgentMap(base)) {
    if (wantsNamedAccess) {
      throw new ConfigValidationError(
        'extraAgents/allowedAgents require "agents" in the base config to be an object keyed by name, not a list'
      );
    }
    return base;
  }

  if (base === undefined && !wantsNamedAccess) return undefined;

  const merged = { ...(base ?? {}), ...(request.extraAgents ?? {}) };
  return filterByAllowList(merged, request.allowedAgents);
}

function resolveAllowedTools(
  base: string[] | undefined,
  requested: AllowList | undefined,
  hasSkills: boolean,
): string[] | undefined {
  if (requested !== undefined && requested !== null) {
    return [...requested];
  }
  if (base === undefined) return undefined;
  if (hasSkills && !base.includes(SKILL_TOOL_NAME)) {
    return [...base, SKILL_TOOL_NAME];
  }
  return [...base];
}

/**
 * Resolve the ExecutionSpec sent to the sandbox and the skill set to upload.
 * Throws ConfigValidationError synchronously, before anything is provisioned.
 */
export function resolveExecution(
  request: ExecutionRequest,
  base: BaseConfig,
  diskSkills: SkillSet = {},
  cwd = DEFAULT_SANDBOX_CONFIG.workdir,
): ResolvedExecution {
  assertValidNames('skill', Object.keys(request.extraSkills ?? {}));
  assertValidNames('agent', Object.keys(request.extraAgents ?? {}));

  const skills = mergeSkills(diskSkills, request.extraSkills, request.allowedSkills);
  const hasSkills = Object.keys(skills).length > 0 || base.templateSkills === true;

  const mcpServers = base.mcpServers === undefined
    ? undefined
    : filterByAllowList(base.mcpServers, request.allowedMcpServers);

  const outputFormat = request.outputFormat !== undefined && request.outputFormat !== null
    ? request.outputFormat
    : base.outputFormat;

  return {
    spec: {
      prompt: request.prompt,
      cwd,
      model: request.model || base.model,
      maxTurns: request.maxTurns ?? base.maxTurns,
      systemPrompt: base.systemPrompt,
      outputFormat,
      agents: resolveAgents(base.agents, request),
      mcpServers,
      hasSkills,
      allowedTools: resolveAllowedTools(base.allowedTools, request.allowedTools, hasSkills),
    },
    skills,
  };
}

/** snake_case document written to agent_config.json for the runner. */
export function toAgentConfig(spec: ResolvedExecution['spec']): Record<string, unknown> {
  return {
    prompt: spec.prompt,
    cwd: spec.cwd,
    model: spec.model ?? null,
    max_turns: spec.maxTurns ?? null,
    system_prompt: spec.systemPrompt ?? null,
    output_format: spec.outputFormat ?? null,
    agents: spec.agents ?? null,
    mcp_servers: spec.mcpServers ?? null,
    has_skills: spec.hasSkills,
    allowed_tools: spec.allowedTools ?? null,
  };
}
