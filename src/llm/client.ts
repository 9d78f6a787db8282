import OpenAI from 'openai';
import axios from 'axios';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { createLogger, NAMESPACES } from '../logging';
import { normalizeResponse } from '../parsing/responseNormalizer';
import { createResponse, isRecord } from '../types/directives';
import type { ConversationTurn, StructuredResponse } from '../types/directives';
import { DIRECTIVE_TOOLS } from './directiveTools';
import { buildMessages, trimMessages } from './messageBuilder';
import type { ChatMessage, ChatPrompts, ChatSettings } from './types';

const clientLog = createLogger(NAMESPACES.llm.client);

// Retry configuration
const MAX_RETRIES = 3;
const INITIAL_BACKOFF_MS = 1000;
const BACKOFF_MULTIPLIER = 2;

// Retryable error codes (network, rate limit, temporary server errors)
const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];
const RETRYABLE_NETWORK_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNABORTED', 'EAI_AGAIN'];

export const OFFLINE_REPLY_PREFIX = '(no chat service configured, replying offline) ';
export const DEFAULT_DEEPSEEK_MODEL = 'deepseek-chat';
const DEFAULT_SDK_MODEL = 'gpt-4o-mini';

export interface RetryOptions {
  attempts?: number;
  initialBackoffMs?: number;
}

export interface ResolvedEndpoint {
  url: string;
  host: string;
}

type AttemptResult = { kind: 'ok'; data: unknown } | { kind: 'http'; status: number; detail: string };

/**
 * Normalise a configured endpoint. The scheme defaults to https; a bare DeepSeek host
 * gets `/chat/completions` and a bare OpenAI host `/v1/chat/completions`.
 * Returns null when nothing is configured; throws on an unparsable URL.
 */
export function resolveChatUrl(value: string): ResolvedEndpoint | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  const parsed = new URL(/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`);
  const host = parsed.hostname.toLowerCase();
  const barePath = parsed.pathname === '' || parsed.pathname === '/';

  if (host.endsWith('deepseek.com')) {
    if (barePath) parsed.pathname = '/chat/completions';
  } else if (host.includes('openai') && barePath) {
    parsed.pathname = '/v1/chat/completions';
  }
  return { url: parsed.toString(), host };
}

/** DeepSeek endpoints only accept their own model names. */
export function normalizeModel(model: string, host: string): string {
  const normalized = model.trim();
  if (!host.endsWith('deepseek.com')) return normalized;
  if (!normalized) return DEFAULT_DEEPSEEK_MODEL;
  if (!normalized.startsWith('deepseek')) {
    clientLog('model %s is not served by DeepSeek, using %s', normalized, DEFAULT_DEEPSEEK_MODEL);
    return DEFAULT_DEEPSEEK_MODEL;
  }
  return normalized;
}

/** Human readable detail from an error body: `error.message`, `message`, `detail`, or the text. */
export function extractErrorDetail(data: unknown, fallback: string): string {
  if (isRecord(data)) {
    if (isRecord(data.error)) {
      const message = data.error.message;
      return typeof message === 'string' && message ? message : JSON.stringify(data.error);
    }
    if (data.message) return String(data.message);
    if (data.detail) return String(data.detail);
    return JSON.stringify(data);
  }
  if (typeof data === 'string') return data.trim() || fallback;
  return data === undefined || data === null ? fallback : JSON.stringify(data);
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

function isRetryableNetworkError(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) return true;
  const code = errorCode(error);
  return code !== undefined && RETRYABLE_NETWORK_CODES.includes(code);
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Folds streamed chat-completion chunks back into a single completion: content deltas
 * are concatenated, tool-call fragments are joined by their index.
 */
export class StreamAccumulator {
  private content = '';
  private readonly toolCalls = new Map<number, { id?: string; name: string; arguments: string }>();

  push(chunk: unknown): void {
    if (!isRecord(chunk) || !Array.isArray(chunk.choices)) return;
    const choice: unknown = chunk.choices[0];
    if (!isRecord(choice) || !isRecord(choice.delta)) return;
    const delta = choice.delta;
    if (typeof delta.content === 'string') this.content += delta.content;
    if (!Array.isArray(delta.tool_calls)) return;

    for (const call of delta.tool_calls) {
      if (!isRecord(call)) continue;
      const index = typeof call.index === 'number' ? call.index : this.toolCalls.size;
      const entry = this.toolCalls.get(index) ?? { name: '', arguments: '' };
      if (typeof call.id === 'string') entry.id = call.id;
      if (isRecord(call.function)) {
        if (typeof call.function.name === 'string') entry.name += call.function.name;
        if (typeof call.function.arguments === 'string') entry.arguments += call.function.arguments;
      }
      this.toolCalls.set(index, entry);
    }
  }

  toCompletion(): Record<string, unknown> {
    const message: Record<string, unknown> = { role: 'assistant', content: this.content };
    if (this.toolCalls.size > 0) {
      message.tool_calls = [...this.toolCalls.entries()]
        .sort(([a], [b]) => a - b)
        .map(([, call]) => ({ id: call.id, type: 'function', function: { name: call.name, arguments: call.arguments } }));
    }
    return { choices: [{ message }] };
  }
}

/** Decode a `text/event-stream` body. A plain JSON body is passed through untouched. */
export function collectEventStream(body: string): unknown {
  if (body.trim().startsWith('{')) return body;
  const accumulator = new StreamAccumulator();
  for (const line of body.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed.startsWith('data:')) continue;
    const data = trimmed.slice('data:'.length).trim();
    if (!data || data === '[DONE]') continue;
    try {
      accumulator.push(JSON.parse(data));
    } catch (error) {
      clientLog('skipping undecodable stream chunk: %o', error);
    }
  }
  return accumulator.toCompletion();
}

function toSdkMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}

/**
 * Chat-completion client. `send` never throws: transport failures come back as an
 * `error` response whose text is shown to the user, and a missing endpoint gives an
 * `offline` echo.
 */
export class ChatClient {
  private readonly attempts: number;
  private readonly initialBackoffMs: number;

  constructor(
    private settings: ChatSettings,
    private prompts: ChatPrompts = { systemPrompt: '' },
    retry: RetryOptions = {}
  ) {
    this.attempts = Math.max(1, retry.attempts ?? MAX_RETRIES);
    this.initialBackoffMs = Math.max(0, retry.initialBackoffMs ?? INITIAL_BACKOFF_MS);
  }

  updateConfig(settings: ChatSettings, prompts: ChatPrompts): void {
    this.settings = settings;
    this.prompts = prompts;
  }

  async send(history: readonly ConversationTurn[], userText: string): Promise<StructuredResponse> {
    try {
      const endpoint = resolveChatUrl(this.settings.apiUrl);
      if (!endpoint) {
        return createResponse({ text: `${OFFLINE_REPLY_PREFIX}${userText}`, status: 'offline' });
      }

      const messages = trimMessages(
        buildMessages(this.prompts.systemPrompt, history, userText),
        this.settings.maxContextTokens
      );
      const model = normalizeModel(this.settings.model, endpoint.host);

      const result = await this.withRetries(() =>
        this.settings.provider === 'openai'
          ? this.sendWithSdk(endpoint.url, model, messages)
          : this.sendWithHttp(endpoint.url, model, messages)
      );

      if (result.kind === 'http') {
        clientLog('chat service returned %d: %s', result.status, result.detail);
        return createResponse({
          text: `The chat service responded with an error (${result.status}): ${result.detail}`,
          status: 'error',
          error: result.detail
        });
      }
      return normalizeResponse(result.data);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      clientLog('chat request failed: %o', error);
      return createResponse({ text: `Unable to reach the chat service: ${message}`, status: 'error', error: message });
    }
  }

  private async withRetries(attempt: () => Promise<AttemptResult>): Promise<AttemptResult> {
    for (let retryCount = 0; ; retryCount++) {
      const lastAttempt = retryCount >= this.attempts - 1;
      const backoffMs = this.initialBackoffMs * Math.pow(BACKOFF_MULTIPLIER, retryCount);

      let result: AttemptResult;
      try {
        result = await attempt();
      } catch (error) {
        if (lastAttempt || !isRetryableNetworkError(error)) throw error;
        clientLog('network error on attempt %d/%d, retrying in %dms: %o', retryCount + 1, this.attempts, backoffMs, error);
        await sleep(backoffMs);
        continue;
      }

      if (lastAttempt || result.kind === 'ok' || !RETRYABLE_STATUS_CODES.includes(result.status)) {
        return result;
      }
      clientLog('status %d on attempt %d/%d, retrying in %dms', result.status, retryCount + 1, this.attempts, backoffMs);
      await sleep(backoffMs);
    }
  }

  private async sendWithHttp(url: string, model: string, messages: ChatMessage[]): Promise<AttemptResult> {
    const { apiKey, stream, temperature, toolsEnabled, timeoutMs } = this.settings;
    const payload = {
      messages,
      ...(model ? { model } : {}),
      ...(stream && { stream }),
      ...(temperature !== undefined && { temperature }),
      ...(toolsEnabled && { tools: DIRECTIVE_TOOLS })
    };

    clientLog('posting %d message(s) to %s', messages.length, url);
    const response = await axios.post<unknown>(url, payload, {
      timeout: timeoutMs,
      responseType: stream ? 'text' : 'json',
      validateStatus: () => true,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {})
      }
    });

    if (response.status >= 400) {
      return { kind: 'http', status: response.status, detail: extractErrorDetail(response.data, response.statusText) };
    }
    const data = stream && typeof response.data === 'string' ? collectEventStream(response.data) : response.data;
    return { kind: 'ok', data };
  }

  private async sendWithSdk(url: string, model: string, messages: ChatMessage[]): Promise<AttemptResult> {
    const { apiKey, stream, temperature, toolsEnabled, timeoutMs } = this.settings;
    const client = new OpenAI({
      apiKey: apiKey || 'dummy',
      baseURL: url.replace(/\/chat\/completions\/?$/, '').replace(/\/$/, ''),
      timeout: timeoutMs,
      maxRetries: 0
    });
    const params = {
      model: model || DEFAULT_SDK_MODEL,
      messages: messages.map(toSdkMessage),
      ...(temperature !== undefined && { temperature }),
      ...(toolsEnabled && { tools: DIRECTIVE_TOOLS })
    };

    try {
      if (stream) {
        const chunks = await client.chat.completions.create({ ...params, stream: true });
        const accumulator = new StreamAccumulator();
        for await (const chunk of chunks) {
          accumulator.push(chunk);
        }
        return { kind: 'ok', data: accumulator.toCompletion() };
      }
      const completion = await client.chat.completions.create({ ...params, stream: false });
      return { kind: 'ok', data: completion };
    } catch (error) {
      if (error instanceof OpenAI.APIError && typeof error.status === 'number') {
        const detail = isRecord(error.error) ? extractErrorDetail({ error: error.error }, error.message) : error.message;
        return { kind: 'http', status: error.status, detail };
      }
      throw error;
    }
  }
}
