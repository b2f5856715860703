import { describe, it, expect } from 'vitest';
import {
  AIMessage,
  HumanMessage,
  contentText,
  validateHistory,
  type Message,
} from '../messages.js';

describe('contentText', () => {
  it('returns plain strings unchanged', () => {
    expect(contentText('hello')).toBe('hello');
  });

  it('joins text parts and skips other part types', () => {
    expect(
      contentText([
        { type: 'text', text: 'first' },
        { type: 'image_url', image_url: { url: 'http://localhost/cat.png' } },
        { type: 'text', text: 'second' },
      ]),
    ).toBe('first\nsecond');
  });

  it('treats null as empty', () => {
    expect(contentText(null)).toBe('');
  });
});

describe('typed messages', () => {
  it('HumanMessage converts to a user message', () => {
    expect(new HumanMessage('hi').toMessage()).toEqual({ role: 'user', content: 'hi' });
  });

  it('AIMessage omits tool_calls when there are none', () => {
    expect(new AIMessage('done').toMessage()).toEqual({ role: 'assistant', content: 'done' });
  });

  it('AIMessage keeps tool calls', () => {
    const call = { id: 'call_1', type: 'function' as const, function: { name: 'echo', arguments: '{}' } };
    expect(new AIMessage(null, [call]).toMessage()).toEqual({
      role: 'assistant',
      content: null,
      tool_calls: [call],
    });
  });
});

describe('validateHistory', () => {
  const call = { id: 'call_1', type: 'function' as const, function: { name: 'echo', arguments: '{}' } };

  it('accepts a well-formed tool round trip', () => {
    const history: Message[] = [
      { role: 'system', content: 'be brief' },
      { role: 'user', content: 'echo hi' },
      { role: 'assistant', content: null, tool_calls: [call] },
      { role: 'tool', tool_call_id: 'call_1', content: 'hi' },
      { role: 'assistant', content: 'hi' },
    ];
    expect(validateHistory(history)).toEqual([]);
  });

  it('flags a system message that is not first', () => {
    const history: Message[] = [
      { role: 'user', content: 'hello' },
      { role: 'system', content: 'late' },
    ];
    expect(validateHistory(history)).toEqual(['system message at position 1']);
  });

  it('flags tool messages that answer an unknown call', () => {
    const history: Message[] = [
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: null, tool_calls: [call] },
      { role: 'user', content: 'again' },
      { role: 'tool', tool_call_id: 'call_1', content: 'stale' },
    ];
    expect(validateHistory(history)).toEqual([
      "tool message at position 3 answers unknown call 'call_1'",
    ]);
  });

  it('throws on a role outside the message union', () => {
    const history: Message[] = JSON.parse('[{"role": "developer", "content": "x"}]');
    expect(() => validateHistory(history)).toThrow(
      'unexpected message role: {"role":"developer","content":"x"}',
    );
  });
});
