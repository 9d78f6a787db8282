import type { SettingsRecord } from '../services/SettingsService';

/**
 * Chat message format for chat-completion APIs
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type ChatProvider = 'openai' | 'http';

/** Connection settings read from `user_settings.json`. */
export interface ChatSettings {
  apiUrl: string;
  apiKey: string;
  model: string;
  temperature?: number;
  stream: boolean;
  provider: ChatProvider;
  timeoutMs: number;
  maxContextTokens: number;
  toolsEnabled: boolean;
}

export interface ChatPrompts {
  systemPrompt: string;
}

export const DEFAULT_TIMEOUT_MS = 30000;

function stringField(record: SettingsRecord, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value.trim() : '';
}

function numberField(record: SettingsRecord, key: string): number | undefined {
  const value = record[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() && Number.isFinite(Number(value))) return Number(value);
  return undefined;
}

function booleanField(record: SettingsRecord, key: string): boolean {
  const value = record[key];
  return value === true || value === 'true';
}

export function chatSettingsFrom(record: SettingsRecord): ChatSettings {
  const timeout = numberField(record, 'timeout_ms');
  return {
    apiUrl: stringField(record, 'api_url'),
    apiKey: stringField(record, 'api_key'),
    model: stringField(record, 'model'),
    temperature: numberField(record, 'temperature'),
    stream: booleanField(record, 'stream'),
    provider: stringField(record, 'provider').toLowerCase() === 'openai' ? 'openai' : 'http',
    timeoutMs: timeout !== undefined && timeout > 0 ? timeout : DEFAULT_TIMEOUT_MS,
    maxContextTokens: Math.max(0, numberField(record, 'max_context_tokens') ?? 0),
    toolsEnabled: booleanField(record, 'tools_enabled')
  };
}

export function chatPromptsFrom(record: SettingsRecord): ChatPrompts {
  return { systemPrompt: stringField(record, 'system_prompt') };
}
