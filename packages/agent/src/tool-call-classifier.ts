/**
 * Classifiers deciding whether a complete JSON candidate from the text channel is a
 * tool call that should be hidden from the user.
 */
import { z } from 'zod';
import { isRecord } from '@toolrelay/shared';

export interface ToolCallVerdict {
  isToolCall: boolean;
  confidence: number;
  shouldFilter: boolean;
}

export interface ClassifyContext {
  /** The candidate was wrapped in a markdown fence */
  fenced: boolean;
  knownToolNames: ReadonlySet<string>;
}

export interface ToolCallClassifier {
  classify(candidate: string, context: ClassifyContext): ToolCallVerdict;
}

export const NOT_A_TOOL_CALL: ToolCallVerdict = Object.freeze({
  isToolCall: false,
  confidence: 0,
  shouldFilter: false,
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Substring checks, then a parse. An unfenced object is only filtered when it mentions
 * "tool" somewhere or names a known tool.
 */
export class HeuristicToolCallClassifier implements ToolCallClassifier {
  classify(candidate: string, context: ClassifyContext): ToolCallVerdict {
    const text = candidate.trim();
    if (!text.startsWith('{') || !text.endsWith('}')) return NOT_A_TOOL_CALL;
    if (!text.includes('"name"') || !text.includes('"arguments"')) return NOT_A_TOOL_CALL;

    const parsed = parseJson(text);
    if (!isRecord(parsed) || !('name' in parsed) || !('arguments' in parsed)) return NOT_A_TOOL_CALL;

    const known = typeof parsed.name === 'string' && context.knownToolNames.has(parsed.name);
    const shouldFilter = context.fenced || known || /tool/i.test(text);
    return {
      isToolCall: true,
      confidence: known ? 1 : shouldFilter ? 0.9 : 0.5,
      shouldFilter,
    };
  }
}

const ToolCallShape = z
  .object({
    name: z.string().min(1),
    arguments: z.union([z.record(z.string(), z.unknown()), z.string()]),
  })
  .passthrough();

/** Validates the candidate against a typed tool-call shape instead of substrings */
export class SchemaToolCallClassifier implements ToolCallClassifier {
  classify(candidate: string, context: ClassifyContext): ToolCallVerdict {
    const result = ToolCallShape.safeParse(parseJson(candidate.trim()));
    if (!result.success) return NOT_A_TOOL_CALL;

    const { name } = result.data;
    const known = context.knownToolNames.has(name);
    const toolish = /tool/i.test(name);
    return {
      isToolCall: true,
      confidence: known ? 1 : context.fenced ? 0.9 : toolish ? 0.8 : 0.4,
      shouldFilter: known || context.fenced || toolish,
    };
  }
}
