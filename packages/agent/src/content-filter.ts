/**
 * StreamContentFilter: hides tool-call JSON that a model writes into its text
 * channel instead of the tool-call channel.
 *
 * Chunks arrive with arbitrary boundaries. Text that cannot be the start of a tool
 * call is released at once. From the first markdown fence, or the first `{` that
 * opens a JSON object (`{` then optional whitespace then `"`), text is held until the
 * fence closes or the braces balance, then classified as a whole. A fenced block whose
 * body cannot be a lone JSON object is released as it streams.
 */
import { logger, assertNever } from '@toolrelay/shared';
import {
  HeuristicToolCallClassifier,
  type ToolCallClassifier,
} from './tool-call-classifier.js';

const log = logger.child({ module: 'content-filter' });

export const DEFAULT_MAX_BUFFER_SIZE = 2000;

const FENCE = '```';

export interface FilterResult {
  emit: string;
  suppressed: boolean;
}

export interface StreamContentFilterOptions {
  maxBufferSize?: number;
  classifier?: ToolCallClassifier;
  /** Names of catalog tools; objects naming one are always treated as tool calls */
  knownToolNames?: Iterable<string>;
}

type Candidate = { start: number; kind: 'fence' | 'partial-fence' | 'object' };

type Segment =
  | { verdict: 'pending' }
  | { verdict: 'tool-call'; end: number }
  | { verdict: 'plain'; end: number }
  /** An open fenced block of ordinary code; `end` is where its body starts */
  | { verdict: 'code-block'; end: number };

/**
 * End index (exclusive) of the JSON object opening at `start`, or -1 while it is
 * still open. Tracks brace depth outside strings and escape state inside them.
 */
export function scanObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/** `{` followed by optional whitespace and then `"` or the end of the text */
function opensJsonObject(text: string, index: number): boolean {
  let j = index + 1;
  while (j < text.length && /\s/.test(text[j])) j++;
  return j === text.length || text[j] === '"';
}

/** True once the body of an unclosed fence shows it is not a lone JSON object */
function cannotBeToolCall(body: string): boolean {
  const first = body.search(/\S/);
  if (first === -1) return false;
  if (body[first] !== '{') return true;
  const end = scanObjectEnd(body, first);
  if (end === -1) return false;
  return /\S/.test(body.slice(end).replace(/`+\s*$/, ''));
}

function trailingBackticks(text: string): number {
  return /`+$/.exec(text)?.[0].length ?? 0;
}

function findCandidate(text: string): Candidate | undefined {
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '`') {
      if (text.startsWith(FENCE, i)) return { start: i, kind: 'fence' };
      if (/^`+$/.test(text.slice(i))) return { start: i, kind: 'partial-fence' };
    } else if (ch === '{' && opensJsonObject(text, i)) {
      return { start: i, kind: 'object' };
    }
  }
  return undefined;
}

export class StreamContentFilter {
  private buffer = '';
  /** Inside a released code block, waiting for its closing fence */
  private inCodeBlock = false;
  private readonly maxBufferSize: number;
  private readonly classifier: ToolCallClassifier;
  private readonly knownToolNames: ReadonlySet<string>;

  constructor(options: StreamContentFilterOptions = {}) {
    this.maxBufferSize = options.maxBufferSize ?? DEFAULT_MAX_BUFFER_SIZE;
    this.classifier = options.classifier ?? new HeuristicToolCallClassifier();
    this.knownToolNames = new Set(options.knownToolNames ?? []);
  }

  /** Text currently held back */
  get pending(): string {
    return this.buffer;
  }

  consume(chunk: string): FilterResult {
    if (!chunk) return { emit: '', suppressed: false };

    this.buffer += chunk;
    let emit = '';
    let suppressed = false;

    for (;;) {
      if (this.inCodeBlock) {
        const close = this.buffer.indexOf(FENCE);
        if (close === -1) {
          const keep = this.buffer.length - trailingBackticks(this.buffer);
          emit += this.buffer.slice(0, keep);
          this.buffer = this.buffer.slice(keep);
          break;
        }
        emit += this.buffer.slice(0, close + FENCE.length);
        this.buffer = this.buffer.slice(close + FENCE.length);
        this.inCodeBlock = false;
        continue;
      }

      const candidate = findCandidate(this.buffer);
      if (!candidate) {
        emit += this.buffer;
        this.buffer = '';
        break;
      }

      emit += this.buffer.slice(0, candidate.start);
      this.buffer = this.buffer.slice(candidate.start);

      const segment = this.classifySegment(candidate.kind);
      if (segment.verdict === 'pending') break;
      if (segment.verdict === 'tool-call') {
        log.debug({ length: segment.end }, 'suppressed tool call JSON in content');
        suppressed = true;
      } else {
        emit += this.buffer.slice(0, segment.end);
        if (segment.verdict === 'code-block') this.inCodeBlock = true;
      }
      this.buffer = this.buffer.slice(segment.end);
    }

    this.enforceLimit();
    return { emit, suppressed };
  }

  /** Release everything still held, e.g. when the stream ends */
  flush(): string {
    const rest = this.buffer;
    this.reset();
    return rest;
  }

  reset(): void {
    this.buffer = '';
    this.inCodeBlock = false;
  }

  /** Classify the buffer, which starts at a candidate of the given kind */
  private classifySegment(kind: Candidate['kind']): Segment {
    const text = this.buffer;

    switch (kind) {
      case 'partial-fence':
        return { verdict: 'pending' };
      case 'object': {
        const end = scanObjectEnd(text, 0);
        if (end === -1) return { verdict: 'pending' };
        return this.verdictFor(text.slice(0, end), false, end);
      }
      case 'fence': {
        const lineEnd = text.indexOf('\n', FENCE.length);
        const bodyStart = lineEnd === -1 ? FENCE.length : lineEnd + 1;
        const close = text.indexOf(FENCE, bodyStart);
        if (close !== -1) return this.verdictFor(text.slice(bodyStart, close), true, close + FENCE.length);
        if (lineEnd !== -1 && cannotBeToolCall(text.slice(bodyStart))) {
          return { verdict: 'code-block', end: bodyStart };
        }
        return { verdict: 'pending' };
      }
      default:
        return assertNever(kind, 'candidate kind');
    }
  }

  private verdictFor(candidate: string, fenced: boolean, end: number): Segment {
    const verdict = this.classifier.classify(candidate, {
      fenced,
      knownToolNames: this.knownToolNames,
    });
    return verdict.isToolCall && verdict.shouldFilter
      ? { verdict: 'tool-call', end }
      : { verdict: 'plain', end };
  }

  private enforceLimit(): void {
    if (this.buffer.length <= this.maxBufferSize) return;
    const fenced = this.buffer.startsWith(FENCE);
    while (this.buffer.length > this.maxBufferSize) {
      log.warn({ length: this.buffer.length, max: this.maxBufferSize }, 'content buffer overflow, dropping oldest half');
      this.buffer = this.buffer.slice(Math.floor(this.buffer.length / 2));
    }
    // The opening fence is gone, so the next fence closes the block
    if (fenced) this.inCodeBlock = true;
  }
}

/** Filter a stream of text chunks, releasing held text when the source ends */
export async function* filterContentStream(
  chunks: AsyncIterable<string>,
  filter: StreamContentFilter = new StreamContentFilter(),
): AsyncGenerator<string> {
  for await (const chunk of chunks) {
    const { emit } = filter.consume(chunk);
    if (emit) yield emit;
  }
  const rest = filter.flush();
  if (rest) yield rest;
}
