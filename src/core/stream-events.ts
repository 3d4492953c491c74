// Sandbay Stream Events - Tagged view over the JSON lines a run emits

import { z } from 'zod';

const textBlockSchema = z.object({ type: z.literal('text'), text: z.string() }).passthrough();
const toolUseBlockSchema = z
  .object({ type: z.literal('tool_use'), name: z.string().default('unknown') })
  .passthrough();
const otherBlockSchema = z.object({ type: z.string() }).passthrough();

const contentBlockSchema = z.union([textBlockSchema, toolUseBlockSchema, otherBlockSchema]);

const nullableNumber = z.number().nullable().optional();

export const streamEventSchemas = {
  assistant: z
    .object({
      type: z.literal('assistant'),
      message: z
        .object({ content: z.array(contentBlockSchema).default([]) })
        .passthrough()
        .default({ content: [] }),
    })
    .passthrough(),
  result: z
    .object({
      type: z.literal('result'),
      subtype: z.string().optional(),
      total_cost_usd: nullableNumber,
      cost_usd: nullableNumber,
      num_turns: nullableNumber,
      model: z.string().optional(),
      result: z.string().optional(),
      structured_output: z.unknown().optional(),
    })
    .passthrough(),
  error: z
    .object({
      type: z.literal('error'),
      error: z.string().default('Unknown error'),
      request_id: z.string().optional(),
    })
    .passthrough(),
  system: z
    .object({
      type: z.literal('system'),
      subtype: z.string().optional(),
      model: z.string().optional(),
    })
    .passthrough(),
  stderr: z.object({ type: z.literal('stderr'), data: z.string() }).passthrough(),
  warning: z.object({ type: z.literal('warning'), message: z.string() }).passthrough(),
  user: z.object({ type: z.literal('user') }).passthrough(),
} as const;

export type StreamEventType = keyof typeof streamEventSchemas;

export type AssistantEvent = z.infer<typeof streamEventSchemas.assistant>;
export type ResultEvent = z.infer<typeof streamEventSchemas.result>;
export type ErrorEvent = z.infer<typeof streamEventSchemas.error>;
export type SystemEvent = z.infer<typeof streamEventSchemas.system>;
export type StderrEvent = z.infer<typeof streamEventSchemas.stderr>;
export type WarningEvent = z.infer<typeof streamEventSchemas.warning>;
export type UserEvent = z.infer<typeof streamEventSchemas.user>;

/** Anything with a missing or unknown `type`, kept verbatim for forward compatibility. */
export interface UnrecognizedEvent {
  type: 'unrecognized';
  originalType: string | null;
  payload: Record<string, unknown>;
}

export type StreamEvent =
  | AssistantEvent
  | ResultEvent
  | ErrorEvent
  | SystemEvent
  | StderrEvent
  | WarningEvent
  | UserEvent
  | UnrecognizedEvent;

function isKnownType(value: unknown): value is StreamEventType {
  return typeof value === 'string' && Object.hasOwn(streamEventSchemas, value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse one output line. Returns null for lines that are not JSON objects.
 * Known kinds that fail their schema are reported as unrecognized.
 */
export function parseStreamEvent(line: string): StreamEvent | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isRecord(raw)) return null;

  const type = raw.type;
  if (isKnownType(type)) {
    const parsed = streamEventSchemas[type].safeParse(raw);
    if (parsed.success) return parsed.data;
  }

  return {
    type: 'unrecognized',
    originalType: typeof type === 'string' ? type : null,
    payload: raw,
  };
}

export function stderrLine(data: string): string {
  return JSON.stringify({ type: 'stderr', data });
}

export function warningLine(message: string): string {
  return JSON.stringify({ type: 'warning', message });
}

export function errorLine(error: string, requestId?: string): string {
  return JSON.stringify(requestId ? { type: 'error', error, request_id: requestId } : { type: 'error', error });
}

/** Concatenated text blocks of an assistant message. */
export function assistantText(event: AssistantEvent): string[] {
  const texts: string[] = [];
  for (const block of event.message.content) {
    if (block.type === 'text' && typeof block.text === 'string' && block.text) {
      texts.push(block.text);
    }
  }
  return texts;
}

export function toolUseNames(event: AssistantEvent): string[] {
  const names: string[] = [];
  for (const block of event.message.content) {
    if (block.type === 'tool_use') {
      names.push(typeof block.name === 'string' ? block.name : 'unknown');
    }
  }
  return names;
}
