import { createLogger, NAMESPACES } from '../logging';
import { createResponse, isRecord } from '../types/directives';
import type { Directive, ResponseStatus, StructuredResponse } from '../types/directives';
import { parseJsonObject } from '../utils/jsonRepair';
import { scanDirectives } from './directiveScanner';
import type { ScanOptions } from './directiveScanner';

const normalizerLog = createLogger(NAMESPACES.parsing.normalizer);

export const DIRECTIVES_ONLY_PLACEHOLDER = '(directives applied)';
export const EMPTY_REPLY_PLACEHOLDER = '(the chat service returned no content)';

/** Key that holds tool-call arguments which could not be decoded. */
export const RAW_ARGUMENTS_KEY = 'raw';

const ENVELOPE_KEYS = ['reply', 'content', 'text', 'commands'] as const;

export interface NormalizeOptions extends ScanOptions {
  status?: ResponseStatus;
  error?: string;
}

function firstText(...values: unknown[]): string {
  for (const value of values) {
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return '';
}

function parseStrictObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function decodeArguments(args: unknown): Record<string, unknown> {
  if (isRecord(args)) return { ...args };
  if (typeof args === 'string') {
    const decoded = parseJsonObject(args);
    if (decoded) return decoded;
    normalizerLog('tool call arguments were not decodable, keeping raw string');
    return { [RAW_ARGUMENTS_KEY]: args };
  }
  return {};
}

function functionToDirective(fn: unknown): Directive | null {
  if (!isRecord(fn)) return null;
  const name = fn.name;
  if (typeof name !== 'string' || !name) return null;
  return { kind: name, payload: decodeArguments(fn.arguments) };
}

/** OpenAI style `tool_calls` (or the legacy single `function_call`) on an assistant message. */
export function extractToolCallDirectives(message: Record<string, unknown>): Directive[] {
  const directives: Directive[] = [];
  const toolCalls = message.tool_calls;
  if (Array.isArray(toolCalls)) {
    for (const call of toolCalls) {
      if (!isRecord(call)) continue;
      const directive = functionToDirective(call.function);
      if (directive) directives.push(directive);
    }
  }
  if (directives.length === 0 && message.function_call !== undefined) {
    const directive = functionToDirective(message.function_call);
    if (directive) directives.push(directive);
  }
  return directives;
}

/** Explicit `commands: [{ type, ...fields }]` arrays. */
export function convertCommandList(source: unknown): Directive[] {
  if (!Array.isArray(source)) return [];
  const directives: Directive[] = [];
  for (const item of source) {
    if (!isRecord(item)) continue;
    const { type, ...payload } = item;
    if (typeof type === 'string' && type) {
      directives.push({ kind: type, payload });
    }
  }
  return directives;
}

function firstElementText(items: unknown[]): string {
  if (items.length === 0) return '';
  const first = items[0];
  if (typeof first === 'string') return first;
  if (first === null || first === undefined) return '';
  if (typeof first === 'object') return JSON.stringify(first);
  return String(first);
}

interface Extraction {
  text: string;
  directives: Directive[];
  raw: unknown;
}

function extractFromMapping(data: Record<string, unknown>): Extraction {
  let text = '';
  let directives: Directive[] = [];
  let rawMessage: Record<string, unknown> | null = null;

  const choices = data.choices;
  const firstChoice: unknown = Array.isArray(choices) ? choices[0] : undefined;
  if (isRecord(firstChoice) && isRecord(firstChoice.message)) {
    rawMessage = firstChoice.message;
    text = firstText(rawMessage.content);
    directives = extractToolCallDirectives(rawMessage);
  }

  if (!text) {
    text = firstText(data.reply, data.content, data.message);
  }

  if (directives.length === 0) {
    directives = convertCommandList(data.commands);
  }

  // Some providers wrap a JSON document inside the content string. A bare directive
  // object has none of the envelope keys and is left for the scanner.
  if (text.startsWith('{')) {
    const wrapped = parseStrictObject(text);
    if (wrapped && ENVELOPE_KEYS.some((key) => key in wrapped)) {
      text = firstText(wrapped.reply, wrapped.content);
      if (!text && wrapped.text !== undefined && wrapped.text !== null) {
        text = String(wrapped.text).trim();
      }
      if (directives.length === 0) {
        directives = convertCommandList(wrapped.commands);
      }
    }
  }

  return { text, directives, raw: rawMessage ?? data };
}

function extract(raw: unknown): Extraction {
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (trimmed.startsWith('{')) {
      try {
        const parsed: unknown = JSON.parse(trimmed);
        if (isRecord(parsed)) return extractFromMapping(parsed);
      } catch {
        normalizerLog('payload looked like JSON but did not parse; using it as plain text');
      }
    }
    return { text: trimmed, directives: [], raw };
  }
  if (isRecord(raw)) return extractFromMapping(raw);
  if (Array.isArray(raw)) return { text: firstElementText(raw), directives: [], raw };
  return { text: '', directives: [], raw };
}

/**
 * Turn whatever the chat backend returned into reply text plus an ordered directive
 * list. Provider-native directives come first, inline ones found in the text after.
 * Never throws; malformed input degrades to plain text.
 */
export function normalizeResponse(raw: unknown, options: NormalizeOptions = {}): StructuredResponse {
  const extraction = extract(raw);
  const scanned = scanDirectives(extraction.text, options);
  const directives = [...extraction.directives, ...scanned.directives];

  let text = scanned.text;
  if (!text) {
    text = directives.length > 0 ? DIRECTIVES_ONLY_PLACEHOLDER : EMPTY_REPLY_PLACEHOLDER;
  }

  normalizerLog('normalized reply (%d chars) with %d directive(s)', text.length, directives.length);
  return createResponse({
    text,
    directives,
    status: options.status ?? 'ok',
    error: options.error,
    raw: extraction.raw
  });
}
