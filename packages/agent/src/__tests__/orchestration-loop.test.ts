import { describe, it, expect, vi } from 'vitest';
import { CatalogFetchError, type Message, type ToolMessage } from '@toolrelay/shared';
import { SimpleTool } from '@toolrelay/tools';
import { CompletionClient, type ToolSource } from '../completion-client.js';
import type { LoopEvent } from '../events.js';
import { ToolOrchestrationLoop, TURN_IN_PROGRESS, iterationLimitMessage } from '../orchestration-loop.js';
import { ScriptedTransport, callDelta, collect, text, thinking, type Turn } from './scripted-transport.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function echoTool() {
  const invoke = vi.fn(async (args: Record<string, unknown>) => `echo:${String(args.text ?? '')}`);
  const tool = new SimpleTool({
    name: 'echo',
    description: 'Echo text back',
    parameters: { type: 'object', properties: { text: { type: 'string' } } },
    invoke,
  });
  return { tool, invoke };
}

function setup(script: Turn[] | ((turn: number) => Turn), tools: SimpleTool[] = [], systemPrompt?: string) {
  const transport = new ScriptedTransport(script);
  const client = new CompletionClient({ model: 'test-model', transport, tools, systemPrompt });
  return { transport, client, loop: new ToolOrchestrationLoop(client) };
}

function toolMessages(history: Message[]): ToolMessage[] {
  return history.filter((m): m is ToolMessage => m.role === 'tool');
}

// ---------------------------------------------------------------------------
// Final answers and history shape
// ---------------------------------------------------------------------------

describe('ToolOrchestrationLoop', () => {
  it('streams content and finishes with the full history', async () => {
    const { loop, client } = setup([[text('Hel'), text('lo')]]);

    const events = await collect(loop.run('hi'));

    expect(events).toEqual([
      { type: 'content_delta', text: 'Hel' },
      { type: 'content_delta', text: 'lo' },
      {
        type: 'final',
        history: [
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: 'Hello' },
        ],
      },
    ]);
    expect(client.history).toHaveLength(2);
  });

  it('puts the system prompt first, once', async () => {
    const { loop, client } = setup([[text('one')], [text('two')]], [], 'be brief');

    await collect(loop.run('first'));
    await collect(loop.run('second'));

    expect(client.history.filter((m) => m.role === 'system')).toHaveLength(1);
    expect(client.history[0]).toEqual({ role: 'system', content: 'be brief' });
    expect(client.history.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'user', 'assistant']);
  });

  it('does not append a user message identical to the history tail', async () => {
    const { loop, client, transport } = setup([[text('answer')]]);
    client.setHistory([{ role: 'user', content: 'hi' }]);

    await collect(loop.run('hi'));

    expect(transport.requests[0].messages).toEqual([{ role: 'user', content: 'hi' }]);
    expect(client.history.filter((m) => m.role === 'user')).toHaveLength(1);
  });

  it('surfaces reasoning separately from the persisted content', async () => {
    const { loop, client } = setup([[thinking('let me think'), text('42')]]);

    const events = await collect(loop.run('meaning?'));

    expect(events[0]).toEqual({ type: 'reasoning_delta', text: 'let me think' });
    expect(client.history[client.history.length - 1]).toEqual({ role: 'assistant', content: '42' });
  });

  it('emits raw chunks only when asked to', async () => {
    const transport = new ScriptedTransport([[text('ok')]]);
    const client = new CompletionClient({ model: 'test-model', transport });
    const loop = new ToolOrchestrationLoop(client, { includeRawChunks: true });

    const events = await collect(loop.run('hi'));

    expect(events[0]).toEqual({ type: 'raw_chunk', chunk: { kind: 'text', content: 'ok' } });
  });

  it('offers no tools when the catalog is empty, and the catalog otherwise', async () => {
    const empty = setup([[text('a')]]);
    await collect(empty.loop.run('hi'));
    expect(empty.transport.requests[0].tools).toBe('none');

    const { tool } = echoTool();
    const withTools = setup([[text('a')]], [tool]);
    await collect(withTools.loop.run('hi'));
    expect(withTools.transport.requests[0].tools).toEqual([tool.toFunctionSpec()]);
  });

  it('rejects a non-positive iteration ceiling', () => {
    const client = new CompletionClient({ model: 'm', transport: new ScriptedTransport([]) });
    expect(() => new ToolOrchestrationLoop(client, { maxIterations: 0 })).toThrow(
      'maxIterations must be a positive integer, got 0',
    );
  });

  it('refuses a second turn on the same client while one is running', async () => {
    const { loop, client } = setup([[text('a'), text('b')], [text('later')]]);

    const first = loop.run('hi')[Symbol.asyncIterator]();
    expect(await first.next()).toEqual({ done: false, value: { type: 'content_delta', text: 'a' } });
    expect(client.busy).toBe(true);

    const rejected = await collect(new ToolOrchestrationLoop(client).run('other'));
    expect(rejected).toEqual([{ type: 'error', message: TURN_IN_PROGRESS }]);

    for (let step = await first.next(); !step.done; step = await first.next()) {
      // drain
    }
    expect(client.busy).toBe(false);
    expect(client.history).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'ab' },
    ]);

    const events = await collect(new ToolOrchestrationLoop(client).run('again'));
    expect(events.at(-1)?.type).toBe('final');
  });
});

// ---------------------------------------------------------------------------
// Tool call reconstruction
// ---------------------------------------------------------------------------

describe('tool call reconstruction', () => {
  const args = '{"text": "hi there"}';

  it.each([
    ['one fragment', [args]],
    ['two fragments', ['{"text": ', '"hi there"}']],
    ['character by character', args.split('')],
    ['uneven fragments', ['{', '"te', 'xt": "hi', ' there', '"', '}']],
  ])('rebuilds arguments streamed as %s', async (_label, fragments) => {
    const { tool, invoke } = echoTool();
    const turn = [
      callDelta(0, { id: 'call_a', type: 'function', name: 'echo' }),
      ...fragments.map((fragment) => callDelta(0, { arguments: fragment })),
    ];
    const { loop, client } = setup([turn, [text('done')]], [tool]);

    await collect(loop.run('say hi'));

    expect(invoke).toHaveBeenCalledWith({ text: 'hi there' });
    expect(client.history[1]).toEqual({
      role: 'assistant',
      content: null,
      tool_calls: [{ id: 'call_a', type: 'function', function: { name: 'echo', arguments: args } }],
    });
  });

  it('orders calls by index whatever order they arrive in', async () => {
    const first = callDelta(0, { id: 'call_0', name: 'echo', arguments: '{"text": "zero"}' });
    const second = callDelta(1, { id: 'call_1', name: 'echo', arguments: '{"text": "one"}' });

    const inOrder = setup([[first, second], [text('done')]], [echoTool().tool]);
    const reversed = setup([[second, first], [text('done')]], [echoTool().tool]);
    await collect(inOrder.loop.run('go'));
    await collect(reversed.loop.run('go'));

    expect(reversed.client.history).toEqual(inOrder.client.history);
    expect(toolMessages(reversed.client.history).map((m) => m.content)).toEqual(['echo:zero', 'echo:one']);
  });

  it('generates ids the model left out', async () => {
    const { loop, client } = setup(
      [[callDelta(0, { name: 'echo', arguments: '{}' })], [text('done')]],
      [echoTool().tool],
    );

    await collect(loop.run('go'));

    const [message] = toolMessages(client.history);
    expect(message.tool_call_id).toMatch(/^call_[0-9a-f]{32}$/);
  });

  it('runs tools with {} when the arguments are not valid JSON', async () => {
    const { tool, invoke } = echoTool();
    const { loop, client } = setup(
      [[callDelta(0, { id: 'call_a', name: 'echo', arguments: '{"text": ' })], [text('done')]],
      [tool],
    );

    const events = await collect(loop.run('go'));

    expect(invoke).toHaveBeenCalledWith({});
    expect(events).toContainEqual({ type: 'tool_output', name: 'echo', content: 'echo:' });
    expect(client.history[1]).toMatchObject({
      tool_calls: [{ function: { name: 'echo', arguments: '{}' } }],
    });
  });
});

// ---------------------------------------------------------------------------
// Tool execution
// ---------------------------------------------------------------------------

describe('tool execution', () => {
  function tools() {
    const ok = new SimpleTool({
      name: 'ok',
      description: 'Succeeds',
      invoke: async (args) => `ok:${String(args.tag)}`,
    });
    const boom = new SimpleTool({
      name: 'boom',
      description: 'Fails',
      invoke: async () => {
        throw new Error('kaboom');
      },
    });
    return [ok, boom];
  }

  it('isolates a failing call from its siblings', async () => {
    const turn = [
      callDelta(0, { id: 'c1', name: 'ok', arguments: '{"tag": "a"}' }),
      callDelta(1, { id: 'c2', name: 'boom', arguments: '{}' }),
      callDelta(2, { id: 'c3', name: 'ok', arguments: '{"tag": "c"}' }),
    ];
    const { loop, client } = setup([turn, [text('done')]], tools());

    const events = await collect(loop.run('go'));

    expect(toolMessages(client.history)).toEqual([
      { role: 'tool', tool_call_id: 'c1', content: 'ok:a' },
      { role: 'tool', tool_call_id: 'c2', content: "Error executing tool 'boom': kaboom" },
      { role: 'tool', tool_call_id: 'c3', content: 'ok:c' },
    ]);
    expect(events.filter((e) => e.type === 'tool_output' || e.type === 'tool_output_error')).toEqual([
      { type: 'tool_output', name: 'ok', content: 'ok:a' },
      { type: 'tool_output_error', name: 'boom', content: "Error executing tool 'boom': kaboom" },
      { type: 'tool_output', name: 'ok', content: 'ok:c' },
    ]);
    expect(events[events.length - 1].type).toBe('final');
  });

  it('answers unknown tools with an error tool message', async () => {
    const { loop, client } = setup(
      [[callDelta(0, { id: 'c1', name: 'missing', arguments: '{}' })], [text('sorry')]],
      [echoTool().tool],
    );

    const events = await collect(loop.run('go'));

    const content = "Error: Tool 'missing' not found. Available tools: echo";
    expect(events).toContainEqual({ type: 'tool_output_error', name: 'missing', content });
    expect(toolMessages(client.history)).toEqual([{ role: 'tool', tool_call_id: 'c1', content }]);
  });

  it('commits tool messages only after the whole batch has run', async () => {
    const seen: number[] = [];
    const transport = new ScriptedTransport([
      [
        callDelta(0, { id: 'c1', name: 'probe', arguments: '{}' }),
        callDelta(1, { id: 'c2', name: 'probe', arguments: '{}' }),
      ],
      [text('done')],
    ]);
    const client: CompletionClient = new CompletionClient({
      model: 'test-model',
      transport,
      tools: [
        new SimpleTool({
          name: 'probe',
          description: 'Counts tool messages in history',
          invoke: async () => {
            seen.push(toolMessages(client.history).length);
            return 'probed';
          },
        }),
      ],
    });

    await collect(new ToolOrchestrationLoop(client).run('go'));

    expect(seen).toEqual([0, 0]);
    expect(client.history.map((m) => m.role)).toEqual(['user', 'assistant', 'tool', 'tool', 'assistant']);
  });

  it('joins list results into the tool message', async () => {
    const lines = new SimpleTool({
      name: 'lines',
      description: 'Returns several lines',
      invoke: async () => ({ content: ['a', 'b'] }),
    });
    const { loop, client } = setup(
      [[callDelta(0, { id: 'c1', name: 'lines', arguments: '{}' })], [text('done')]],
      [lines],
    );

    await collect(loop.run('go'));

    expect(toolMessages(client.history)[0].content).toBe('a\nb');
  });
});

// ---------------------------------------------------------------------------
// Termination and failures
// ---------------------------------------------------------------------------

describe('termination', () => {
  it('gives up after exactly maxIterations turns of tool calls', async () => {
    const { loop, transport } = setup(
      (turn) => [callDelta(0, { id: `c${turn}`, name: 'echo', arguments: '{}' })],
      [echoTool().tool],
    );

    const events = await collect(loop.run('loop forever'));

    const errors = events.filter((e) => e.type === 'error');
    expect(errors).toEqual([{ type: 'error', message: iterationLimitMessage(15) }]);
    expect(events[events.length - 1]).toEqual(errors[0]);
    expect(transport.requests).toHaveLength(15);
  });

  it('honours a custom ceiling', async () => {
    const transport = new ScriptedTransport(() => []);
    const client = new CompletionClient({ model: 'test-model', transport });

    const events = await collect(new ToolOrchestrationLoop(client, { maxIterations: 3 }).run('hi'));

    expect(events).toEqual([
      {
        type: 'error',
        message: 'Recursion limit reached without a final answer. Max iterations: 3. Please refine your prompt or tools.',
      },
    ]);
    expect(transport.requests).toHaveLength(3);
  });

  it('asks again after a stalled turn', async () => {
    const { loop, transport } = setup([[], [text('recovered')]]);

    const events = await collect(loop.run('hi'));

    expect(transport.requests).toHaveLength(2);
    expect(events.map((e) => e.type)).toEqual(['content_delta', 'final']);
  });

  it('stops with one error event when the transport fails', async () => {
    const { loop } = setup([new Error('connection refused')]);

    const events = await collect(loop.run('hi'));

    expect(events).toEqual([{ type: 'error', message: 'connection refused', cause: expect.any(Error) }]);
  });

  it('keeps deltas that arrived before a mid-stream failure', async () => {
    const transport = {
      requests: 0,
      async *stream() {
        yield text('partial');
        throw new Error('socket hang up');
      },
    };
    const client = new CompletionClient({ model: 'test-model', transport });

    const events: LoopEvent[] = await collect(new ToolOrchestrationLoop(client).run('hi'));

    expect(events).toEqual([
      { type: 'content_delta', text: 'partial' },
      { type: 'error', message: 'socket hang up', cause: expect.any(Error) },
    ]);
  });

  it('reports a failed catalog load as an error event', async () => {
    const remoteTools: ToolSource = {
      getTools: async () => {
        throw new CatalogFetchError('docs', new Error('offline'));
      },
    };
    const transport = new ScriptedTransport([[text('unused')]]);
    const client = new CompletionClient({ model: 'test-model', transport, remoteTools });

    const events = await collect(new ToolOrchestrationLoop(client).run('hi'));

    expect(events).toEqual([
      { type: 'error', message: "failed to fetch tools from 'docs': offline", cause: expect.any(CatalogFetchError) },
    ]);
    expect(transport.requests).toHaveLength(0);
  });
});
