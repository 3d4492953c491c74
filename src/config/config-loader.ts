// Sandbay Config Loader - Lenient sandbay.json validation and skills directory reader

import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { join, relative, resolve, sep } from 'node:path';
import type { AgentsConfig, BaseConfig, JsonObject, SkillFiles, SkillSet } from '../core/types.js';
import { CONFIG_FILE_NAME } from './default-config.js';
import {
  NAME_PATTERN,
  baseConfigFieldSchemas,
  baseConfigFieldTypes,
  isBaseConfigKey,
} from './schema.js';

export const SKILL_MANIFEST = 'SKILL.md';
const IGNORED_SKILL_FILES = new Set(['.DS_Store']);

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number' && !Number.isInteger(value)) return 'float';
  return typeof value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Keep recognized, well-typed fields; drop everything else with a warning.
 * Never throws.
 */
export function validateBaseConfig(raw: Record<string, unknown>, cwd = process.cwd()): BaseConfig {
  const config: BaseConfig = {};

  for (const [key, value] of Object.entries(raw)) {
    if (!isBaseConfigKey(key)) {
      console.warn(`[Config] ${CONFIG_FILE_NAME}: unknown field "${key}", ignoring`);
      continue;
    }

    const expected = baseConfigFieldTypes[key];
    const drop = () =>
      console.warn(
        `[Config] ${CONFIG_FILE_NAME}: field "${key}" should be ${expected}, got ${typeName(value)}, skipping`
      );

    switch (key) {
      case 'system_prompt': {
        const parsed = baseConfigFieldSchemas.system_prompt.safeParse(value);
        if (parsed.success) config.systemPrompt = parsed.data;
        else drop();
        break;
      }
      case 'model': {
        const parsed = baseConfigFieldSchemas.model.safeParse(value);
        if (parsed.success) config.model = parsed.data;
        else drop();
        break;
      }
      case 'max_turns': {
        const parsed = baseConfigFieldSchemas.max_turns.safeParse(value);
        if (parsed.success) config.maxTurns = parsed.data;
        else drop();
        break;
      }
      case 'output_format': {
        const parsed = baseConfigFieldSchemas.output_format.safeParse(value);
        if (parsed.success) config.outputFormat = parsed.data;
        else drop();
        break;
      }
      case 'agents': {
        const parsed = baseConfigFieldSchemas.agents.safeParse(value);
        if (parsed.success) config.agents = parsed.data;
        else drop();
        break;
      }
      case 'mcp_servers': {
        const parsed = baseConfigFieldSchemas.mcp_servers.safeParse(value);
        if (parsed.success) config.mcpServers = parsed.data;
        else drop();
        break;
      }
      case 'skills_dir': {
        const parsed = baseConfigFieldSchemas.skills_dir.safeParse(value);
        if (!parsed.success) {
          drop();
        } else if (!isDirectory(resolve(cwd, parsed.data))) {
          console.warn(
            `[Config] ${CONFIG_FILE_NAME}: skills_dir "${parsed.data}" does not exist, ignoring`
          );
        } else {
          config.skillsDir = parsed.data;
        }
        break;
      }
      case 'allowed_tools': {
        const parsed = baseConfigFieldSchemas.allowed_tools.safeParse(value);
        if (parsed.success) config.allowedTools = parsed.data;
        else drop();
        break;
      }
      case 'webhook_url': {
        const parsed = baseConfigFieldSchemas.webhook_url.safeParse(value);
        if (parsed.success) config.webhookUrl = parsed.data;
        else drop();
        break;
      }
      case 'template_skills': {
        const parsed = baseConfigFieldSchemas.template_skills.safeParse(value);
        if (parsed.success) config.templateSkills = parsed.data;
        else drop();
        break;
      }
    }
  }

  return config;
}

/**
 * Load sandbay.json from `cwd`. Returns null when the file is missing,
 * is not valid JSON, or is not a JSON object.
 */
export function loadBaseConfig(cwd = process.cwd(), fileName = CONFIG_FILE_NAME): BaseConfig | null {
  const configPath = join(cwd, fileName);
  if (!existsSync(configPath)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    console.error(`[Config] ${fileName}: invalid JSON: ${err instanceof Error ? err.message : err}`);
    return null;
  }

  if (!isRecord(raw)) {
    console.error(`[Config] ${fileName}: expected a JSON object, got ${typeName(raw)}`);
    return null;
  }

  return validateBaseConfig(raw, cwd);
}

function collectFiles(root: string, dir: string, files: SkillFiles): void {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (IGNORED_SKILL_FILES.has(entry.name)) continue;
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      collectFiles(root, fullPath, files);
    } else if (entry.isFile()) {
      const relPath = relative(root, fullPath).split(sep).join('/');
      files[relPath] = readFileSync(fullPath, 'utf-8');
    }
  }
}

/**
 * Read skills from a host directory. Each immediate subdirectory holding a
 * SKILL.md is one skill; its other files travel with it.
 */
export function loadSkillsDir(skillsDir: string, cwd = process.cwd()): SkillSet {
  const base = resolve(cwd, skillsDir);
  const skills: SkillSet = {};
  if (!isDirectory(base)) return skills;

  const entries = readdirSync(base, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    if (!NAME_PATTERN.test(entry.name)) {
      console.warn(`[Config] skills_dir: skipping "${entry.name}" (invalid name)`);
      continue;
    }

    const skillRoot = join(base, entry.name);
    if (!isFile(join(skillRoot, SKILL_MANIFEST))) continue;

    const files: SkillFiles = {};
    collectFiles(skillRoot, skillRoot, files);
    skills[entry.name] = files;
  }

  return skills;
}

export function isAgentMap(agents: AgentsConfig): agents is Record<string, JsonObject> {
  return !Array.isArray(agents);
}
