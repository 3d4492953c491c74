// Sandbay Core Type System

export type JsonObject = Record<string, unknown>;

/** `null` (or absent) keeps everything, `[]` keeps nothing. */
export type AllowList = string[] | null;

export interface Credentials {
  anthropicApiKey?: string;
  e2bApiKey?: string;
  openrouterApiKey?: string;
}

export interface ExecutionRequest extends Credentials {
  prompt: string;
  model?: string;
  maxTurns?: number;
  /** `{}` is an explicit "disable", distinct from absent/null. */
  outputFormat?: JsonObject | null;
  /** Sandbox lifetime in seconds. */
  timeout: number;
  /** Relative path (under the sandbox working directory) -> text content. */
  files?: Record<string, string>;
  /** Inline skills: name -> SKILL.md content. */
  extraSkills?: Record<string, string>;
  /** Inline subagent definitions: name -> definition. */
  extraAgents?: Record<string, JsonObject>;
  allowedMcpServers?: AllowList;
  allowedSkills?: AllowList;
  allowedTools?: AllowList;
  allowedAgents?: AllowList;
}

/** Agents may be name-addressed (map) or an unaddressable list. */
export type AgentsConfig = Record<string, JsonObject> | unknown[];

export interface BaseConfig {
  systemPrompt?: string;
  model?: string;
  maxTurns?: number;
  outputFormat?: JsonObject;
  agents?: AgentsConfig;
  mcpServers?: Record<string, unknown>;
  skillsDir?: string;
  allowedTools?: string[];
  webhookUrl?: string;
  templateSkills?: boolean;
}

/** Relative path inside the skill folder -> content. */
export type SkillFiles = Record<string, string>;

/** Skill name -> its files (always including SKILL.md). */
export type SkillSet = Record<string, SkillFiles>;

export interface ExecutionSpec {
  prompt: string;
  cwd: string;
  model?: string;
  maxTurns?: number;
  systemPrompt?: string;
  outputFormat?: JsonObject;
  agents?: AgentsConfig;
  mcpServers?: Record<string, unknown>;
  hasSkills: boolean;
  allowedTools?: string[];
}

export interface ResolvedExecution {
  spec: ExecutionSpec;
  skills: SkillSet;
}

/** Text, or raw bytes for binary attachments. */
export type FileData = string | ArrayBuffer;

export interface FileEntry {
  path: string;
  data: FileData;
}

export type RunStatus = 'running' | 'completed' | 'error';

export type Feedback = 'positive' | 'negative';

export interface RunRecord {
  id: string;
  prompt: string;
  model: string | null;
  status: RunStatus;
  startedAt: string;
  costUsd: number | null;
  numTurns: number | null;
  durationSecs: number | null;
  error: string | null;
  filesCount: number;
  feedback: Feedback | null;
  feedbackUser: string | null;
}
