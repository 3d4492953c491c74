import { assistantText, toolUseNames, type StreamEvent } from '../core/stream-events.js';

export interface RenderedEvent {
  stdout?: string;
  stderr?: string;
}

export interface RenderOptions {
  /** Also show stderr passthrough, system init and unknown events. */
  verbose?: boolean;
}

function formatCost(cost: number | null | undefined): string | null {
  return cost === null || cost === undefined ? null : `$${cost.toFixed(4)}`;
}

/** Terminal rendering: agent text goes to stdout, progress and diagnostics to stderr. */
export function renderEvent(event: StreamEvent, options: RenderOptions = {}): RenderedEvent {
  switch (event.type) {
    case 'assistant': {
      const texts = assistantText(event);
      const tools = toolUseNames(event);
      return {
        stdout: texts.length > 0 ? texts.join('\n') : undefined,
        stderr: tools.length > 0 ? tools.map((tool) => `> ${tool}`).join('\n') : undefined,
      };
    }

    case 'result': {
      const parts = [`Done (${event.subtype ?? 'result'})`];
      if (typeof event.num_turns === 'number') parts.push(`turns=${event.num_turns}`);
      const cost = formatCost(event.total_cost_usd ?? event.cost_usd);
      if (cost) parts.push(`cost=${cost}`);
      return {
        stdout: event.structured_output !== undefined ? JSON.stringify(event.structured_output, null, 2) : undefined,
        stderr: parts.join(' '),
      };
    }

    case 'error':
      return { stderr: `Error: ${event.error}` };

    case 'warning':
      return { stderr: `Warning: ${event.message}` };

    case 'stderr':
      return options.verbose ? { stderr: event.data } : {};

    case 'system':
      return options.verbose && event.model ? { stderr: `Model: ${event.model}` } : {};

    case 'unrecognized':
      return options.verbose ? { stderr: `(${event.originalType ?? 'untyped'} event)` } : {};

    default:
      return {};
  }
}
