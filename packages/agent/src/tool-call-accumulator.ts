import { randomUUID } from 'node:crypto';
import { logger, type ToolCall } from '@toolrelay/shared';

const log = logger.child({ module: 'tool-call-accumulator' });

/** One streamed fragment of a tool call, addressed by the model's call index */
export interface ToolCallDelta {
  index: number;
  id?: string;
  type?: 'function';
  name?: string;
  arguments?: string;
}

interface Slot {
  id: string;
  type: 'function';
  name: string;
  arguments: string;
}

export function generateToolCallId(): string {
  return `call_${randomUUID().replace(/-/g, '')}`;
}

/**
 * Rebuilds the parallel tool calls of one turn from interleaved fragments.
 * id, type and name take the latest value seen; argument text is appended.
 */
export class ToolCallAccumulator {
  private readonly slots: Slot[] = [];

  apply(delta: ToolCallDelta): void {
    if (!Number.isInteger(delta.index) || delta.index < 0) {
      log.warn({ index: delta.index }, 'ignoring tool call delta with invalid index');
      return;
    }
    while (this.slots.length <= delta.index) {
      this.slots.push({ id: '', type: 'function', name: '', arguments: '' });
    }

    const slot = this.slots[delta.index];
    if (delta.id) slot.id = delta.id;
    if (delta.type) slot.type = delta.type;
    if (delta.name) slot.name = delta.name;
    if (delta.arguments) slot.arguments += delta.arguments;
  }

  get size(): number {
    return this.slots.length;
  }

  /** Calls in index order. Missing ids are generated; unparsable arguments become "{}". */
  finalize(): ToolCall[] {
    return this.slots.map((slot) => ({
      id: slot.id || generateToolCallId(),
      type: slot.type,
      function: {
        name: slot.name,
        arguments: validArguments(slot),
      },
    }));
  }
}

function validArguments(slot: Slot): string {
  try {
    JSON.parse(slot.arguments);
    return slot.arguments;
  } catch {
    log.warn(
      { tool: slot.name, arguments: slot.arguments.slice(0, 200) },
      'tool call arguments are not valid JSON, using {}',
    );
    return '{}';
  }
}
