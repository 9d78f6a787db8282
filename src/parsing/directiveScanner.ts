import { createLogger, NAMESPACES } from '../logging';
import { isRecord } from '../types/directives';
import type { Directive } from '../types/directives';

const scannerLog = createLogger(NAMESPACES.parsing.scanner);

export interface ScanOptions {
  /**
   * Treat a mapping whose only hint is a string `name` field as an expression directive.
   * Prose that quotes a JSON object with a `name` key will be stripped when this is on.
   */
  acceptBareName?: boolean;
}

export interface ScanResult {
  text: string;
  directives: Directive[];
}

const OPENERS: Record<string, string> = { '{': '}', '[': ']' };

/**
 * Find the end (exclusive) of the bracketed value that opens at `start`.
 * Brackets inside string literals are ignored. Returns -1 when the value never closes
 * or the brackets are mismatched.
 */
export function findBalancedEnd(text: string, start: number): number {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch in OPENERS) {
      stack.push(OPENERS[ch]);
    } else if (ch === '}' || ch === ']') {
      if (stack.pop() !== ch) return -1;
      if (stack.length === 0) return i + 1;
    }
  }
  return -1;
}

function tryParseAt(text: string, start: number): { value: unknown; end: number } | null {
  const end = findBalancedEnd(text, start);
  if (end < 0) return null;
  try {
    return { value: JSON.parse(text.slice(start, end)), end };
  } catch {
    return null;
  }
}

/** Classify a decoded JSON value into zero or more directives. */
export function valueToDirectives(value: unknown, options: ScanOptions = {}): Directive[] {
  const acceptBareName = options.acceptBareName ?? true;
  const directives: Directive[] = [];

  if (Array.isArray(value)) {
    for (const item of value) {
      directives.push(...valueToDirectives(item, options));
    }
    return directives;
  }
  if (!isRecord(value)) return directives;

  if ('$schema' in value) {
    directives.push(...valueToDirectives(value.$schema, options));
  }

  const kind = value.type;
  if (typeof kind === 'string' && kind) {
    let payload: Record<string, unknown>;
    if (isRecord(value.payload)) {
      payload = { ...value.payload };
    } else {
      const { type: _type, payload: _payload, ...rest } = value;
      payload = rest;
    }
    directives.push({ kind, payload });
  } else if (typeof value.expression === 'string') {
    directives.push({ kind: 'expression', payload: { name: value.expression } });
  } else if (acceptBareName && typeof value.name === 'string') {
    directives.push({ kind: 'expression', payload: { name: value.name } });
  }
  return directives;
}

/**
 * Pull inline JSON directives out of free text. Directive spans are cut from the
 * returned text; any other JSON is left where it was.
 */
export function scanDirectives(text: string, options: ScanOptions = {}): ScanResult {
  if (!text) return { text: '', directives: [] };

  const directives: Directive[] = [];
  const kept: string[] = [];
  let lastEnd = 0;
  let idx = 0;

  while (idx < text.length) {
    const ch = text[idx];
    if (ch !== '{' && ch !== '[') {
      idx += 1;
      continue;
    }
    const parsed = tryParseAt(text, idx);
    if (!parsed) {
      idx += 1;
      continue;
    }
    const found = valueToDirectives(parsed.value, options);
    if (found.length > 0) {
      kept.push(text.slice(lastEnd, idx));
      directives.push(...found);
      lastEnd = parsed.end;
    }
    idx = parsed.end;
  }

  kept.push(text.slice(lastEnd));
  if (directives.length > 0) {
    scannerLog('extracted %d inline directive(s): %o', directives.length, directives.map((d) => d.kind));
  }
  return { text: kept.join('').trim(), directives };
}
