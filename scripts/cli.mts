#!/usr/bin/env -S npx tsx
import * as readline from 'node:readline';

const CHAT_URL = process.env.CHAT_URL ?? 'http://localhost:3000';
const AUTH_TOKEN = process.env.AUTH_TOKEN;

const dim = '\x1b[2m';
const red = '\x1b[31m';
const reset = '\x1b[0m';

type Mode = 'chat' | 'code';

interface HistoryMessage {
  role: 'user' | 'assistant';
  content: string;
}

type StreamEvent =
  | { type: 'content'; text: string }
  | { type: 'reasoning'; text: string }
  | { type: 'tool_output'; name: string; content: string }
  | { type: 'tool_output_error'; name: string; content: string }
  | { type: 'done' }
  | { type: 'error'; message: string };

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout,
});

let mode: Mode = 'chat';
let history: HistoryMessage[] = [];

function prompt(): Promise<string> {
  const turns = history.length > 0 ? ` ${history.length / 2}` : '';
  return new Promise((resolve, reject) => {
    rl.question(`\x1b[36mtoolrelay:${mode}${turns}>${reset} `, resolve);
    rl.once('close', () => reject(new Error('EOF')));
  });
}

function headers(): Record<string, string> {
  const result: Record<string, string> = { 'Content-Type': 'application/json' };
  if (AUTH_TOKEN) result.Authorization = `Bearer ${AUTH_TOKEN}`;
  return result;
}

async function get(path: string): Promise<unknown> {
  const res = await fetch(`${CHAT_URL}${path}`, { headers: headers() });
  return res.json();
}

async function post(path: string, body: unknown): Promise<unknown> {
  const res = await fetch(`${CHAT_URL}${path}`, {
    method: 'POST',
    headers: headers(),
    body: JSON.stringify(body),
  });
  return res.json();
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEvent(json: string): StreamEvent | undefined {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return undefined;
  }
  if (!isObject(value)) return undefined;

  const { type } = value;
  switch (type) {
    case 'content':
    case 'reasoning':
      return typeof value.text === 'string' ? { type, text: value.text } : undefined;
    case 'tool_output':
    case 'tool_output_error':
      return typeof value.name === 'string' && typeof value.content === 'string'
        ? { type, name: value.name, content: value.content }
        : undefined;
    case 'done':
      return { type };
    case 'error':
      return { type, message: typeof value.message === 'string' ? value.message : 'unknown error' };
    default:
      return undefined;
  }
}

async function chatStreamRequest(message: string) {
  const messages = [...history, { role: 'user' as const, content: message }];
  const res = await fetch(`${CHAT_URL}/chat/stream`, {
    method: 'POST',
    headers: headers(),
    body: JSON.stringify({ messages, mode }),
  });

  if (!res.ok || !res.body) {
    const err = await res.text();
    console.log(`${red}Error: ${err}${reset}`);
    return;
  }

  const reader = res.body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let answer = '';
  let completed = false;
  let toolCallCount = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;

    buffer += decoder.decode(value, { stream: true });

    // Keep the incomplete last line for the next read
    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';

    for (const line of lines) {
      if (!line.startsWith('data: ')) continue;
      const event = parseEvent(line.slice(6));
      if (!event) continue;

      switch (event.type) {
        case 'content':
          answer += event.text;
          process.stdout.write(event.text);
          break;
        case 'reasoning':
          process.stdout.write(`${dim}${event.text}${reset}`);
          break;
        case 'tool_output':
          toolCallCount++;
          process.stdout.write(`\n${dim}[${event.name}: done]${reset}\n`);
          break;
        case 'tool_output_error':
          toolCallCount++;
          process.stdout.write(`\n${red}[${event.name}: ${event.content}]${reset}\n`);
          break;
        case 'done':
          completed = true;
          break;
        case 'error':
          console.log(`\n${red}Error: ${event.message}${reset}`);
          break;
      }
    }
  }

  process.stdout.write('\n');

  if (completed) {
    history = [...messages, { role: 'assistant', content: answer }];
  }
  if (toolCallCount > 0) {
    console.log(`${dim}(${toolCallCount} tool call${toolCallCount > 1 ? 's' : ''})${reset}`);
  }
}

function printHelp() {
  console.log(`
\x1b[1mCommands:\x1b[0m
  <text>               Send a message in the current mode (streaming)
  chat <message>       Send a message in chat mode
  code <message>       Send a message with the code assistant tool
  mode <chat|code>     Switch the default mode
  new                  Start a new conversation
  tools                List available tools
  refresh              Drop cached tool catalogs
  config               Show the server's model settings
  ping                 Check service health
  help                 Show this help
  exit                 Quit
`);
}

async function sendIn(target: Mode, message: string) {
  const previous = mode;
  mode = target;
  try {
    await chatStreamRequest(message);
  } finally {
    mode = previous;
  }
}

async function main() {
  console.log('\x1b[1mtoolrelay interactive CLI\x1b[0m');
  console.log(`Connected to ${CHAT_URL}`);
  console.log('Type "help" for commands.\n');

  try {
    await get('/ping');
    console.log(`\x1b[32mChat service is online.${reset}\n`);
  } catch {
    console.log(`${red}Warning: cannot reach the chat service at ${CHAT_URL}${reset}\n`);
  }

  for (;;) {
    let input: string;
    try {
      input = (await prompt()).trim();
    } catch {
      break;
    }
    if (!input) continue;

    const [cmd, ...rest] = input.split(' ');
    const arg = rest.join(' ');

    try {
      switch (cmd) {
        case 'chat':
        case 'code': {
          if (!arg) {
            console.log(`Usage: ${cmd} <message>`);
            break;
          }
          await sendIn(cmd, arg);
          break;
        }

        case 'mode': {
          if (arg !== 'chat' && arg !== 'code') {
            console.log('Usage: mode <chat|code>');
            break;
          }
          mode = arg;
          break;
        }

        case 'new':
          history = [];
          console.log(`${dim}Starting new conversation.${reset}`);
          break;

        case 'tools': {
          const result = await get('/tools');
          const tools = isObject(result) && Array.isArray(result.tools) ? result.tools : [];
          if (tools.length === 0) {
            console.log('No tools available.');
          }
          for (const tool of tools) {
            if (isObject(tool) && typeof tool.name === 'string') {
              const description = typeof tool.description === 'string' ? tool.description : '';
              console.log(`${tool.name}  ${dim}${description.slice(0, 80)}${reset}`);
            }
          }
          break;
        }

        case 'refresh':
          console.log(JSON.stringify(await post('/tools/refresh', {})));
          break;

        case 'config':
        case 'ping':
          console.log(JSON.stringify(await get(`/${cmd}`), null, 2));
          break;

        case 'help':
          printHelp();
          break;

        case 'exit':
        case 'quit':
        case 'q':
          console.log('Bye!');
          rl.close();
          process.exit(0);

        default:
          await chatStreamRequest(input);
      }
    } catch (err) {
      console.log(`${red}Error: ${err instanceof Error ? err.message : String(err)}${reset}`);
    }

    console.log();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
