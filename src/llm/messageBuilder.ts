import type { ConversationTurn } from '../types/directives';
import { countTokens } from '../utils/tokenCounter';
import type { ChatMessage } from './types';

/** System prompt (when set), then the history in order, then the new user text. */
export function buildMessages(systemPrompt: string, history: readonly ConversationTurn[], userText: string): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (systemPrompt.trim()) {
    messages.push({ role: 'system', content: systemPrompt.trim() });
  }
  for (const turn of history) {
    messages.push({ role: turn.role, content: turn.content });
  }
  messages.push({ role: 'user', content: userText });
  return messages;
}

/**
 * Drop the oldest history messages until the conversation fits `maxTokens`.
 * The system prompt and the final user message are always kept; 0 disables trimming.
 */
export function trimMessages(messages: ChatMessage[], maxTokens: number): ChatMessage[] {
  if (!maxTokens || messages.length <= 2) return messages;

  const systemMessage = messages[0].role === 'system' ? messages[0] : null;
  const currentUserMessage = messages[messages.length - 1];
  const history = messages.slice(systemMessage ? 1 : 0, -1);

  let usedTokens = countTokens(currentUserMessage.content) + (systemMessage ? countTokens(systemMessage.content) : 0);
  const kept: ChatMessage[] = [];

  // Most recent first
  for (let i = history.length - 1; i >= 0; i--) {
    const msgTokens = countTokens(history[i].content);
    if (usedTokens + msgTokens > maxTokens) break;
    kept.unshift(history[i]);
    usedTokens += msgTokens;
  }

  return [...(systemMessage ? [systemMessage] : []), ...kept, currentUserMessage];
}
