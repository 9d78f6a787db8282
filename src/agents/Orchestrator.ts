import type * as nunjucks from 'nunjucks';
import type { Server } from 'socket.io';
import { createLogger, NAMESPACES } from '../logging';
import type { ModelManager } from '../avatar/ModelManager';
import { ChatClient } from '../llm/client';
import { chatPromptsFrom, chatSettingsFrom } from '../llm/types';
import { ExpressionService } from '../services/ExpressionService';
import type { SettingsRecord, SettingsService } from '../services/SettingsService';
import type { VisionEvent, VisionListener, VisionService } from '../services/VisionService';
import { createTurn, isRecord } from '../types/directives';
import type { ConversationTurn, Directive, StructuredResponse } from '../types/directives';
import { renderPrompt } from '../utils/promptEnvironment';
import { createAvatarDirectiveHandler } from './avatarDirectives';
import type { DirectiveHandler } from './avatarDirectives';

const orchestratorLog = createLogger(NAMESPACES.agents.orchestrator);

export const DEFAULT_FLUSH_INTERVAL_MS = 500;
export const DEFAULT_PENDING_DIRECTIVE_LIMIT = 64;
export const VISION_TEMPLATE = 'vision.njk';

export interface OrchestratorOptions {
  settings: SettingsService;
  env: nunjucks.Environment;
  /** Built from the stored user settings when omitted. */
  client?: ChatClient;
  model?: ModelManager | null;
  flushIntervalMs?: number;
  pendingDirectiveLimit?: number;
  io?: Server;
}

/**
 * Owns the conversation: history, the chat client, directive handlers and the queue of
 * directives produced in the background (vision) that the flush timer applies.
 *
 * Every mutation of history and queue happens synchronously between awaits, so the event
 * loop is the only lock; readers always get copies.
 */
export class Orchestrator {
  private readonly settings: SettingsService;
  private readonly env: nunjucks.Environment;
  private readonly client: ChatClient;
  private readonly expressions: ExpressionService;
  private readonly flushIntervalMs: number;
  private readonly pendingLimit: number;
  private io?: Server;
  private model: ModelManager | null;
  private userSettings: SettingsRecord;
  private aiPrompts: SettingsRecord;
  private history: ConversationTurn[] = [];
  private handlers: DirectiveHandler[] = [];
  private pending: Directive[] = [];
  private vision: VisionService | null = null;
  private lastVisionTimestamp = 0;
  private flushTimer: NodeJS.Timeout | null = null;
  private flushing = false;
  private disposed = false;

  readonly avatarHandler: DirectiveHandler;

  private readonly visionListener: VisionListener = (event) => {
    this.handleVisionEvent(event).catch((error: unknown) => {
      orchestratorLog('vision event failed: %o', error);
    });
  };

  constructor(options: OrchestratorOptions) {
    this.settings = options.settings;
    this.env = options.env;
    this.io = options.io;
    this.model = options.model ?? null;
    this.flushIntervalMs = options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
    this.pendingLimit = Math.max(1, options.pendingDirectiveLimit ?? DEFAULT_PENDING_DIRECTIVE_LIMIT);

    this.userSettings = this.settings.loadUserSettings();
    this.aiPrompts = this.settings.loadAiPrompts();
    this.client = options.client ?? new ChatClient(chatSettingsFrom(this.userSettings), chatPromptsFrom(this.aiPrompts));
    this.expressions = new ExpressionService(this.settings, this.model);

    this.avatarHandler = createAvatarDirectiveHandler({
      getModel: () => this.model,
      expressions: this.expressions
    });
    this.registerDirectiveHandler(this.avatarHandler);
  }

  // --- Configuration ---

  reloadConfig(): void {
    this.userSettings = this.settings.loadUserSettings();
    this.aiPrompts = this.settings.loadAiPrompts();
    this.client.updateConfig(chatSettingsFrom(this.userSettings), chatPromptsFrom(this.aiPrompts));
    this.expressions.reload();
    this.vision?.reloadConfig();
    orchestratorLog('configuration reloaded');
  }

  setModelManager(model: ModelManager | null): void {
    this.model = model;
    this.expressions.setModel(model);
  }

  setSocketServer(io: Server | undefined): void {
    this.io = io;
  }

  getUserSettings(): SettingsRecord {
    return { ...this.userSettings };
  }

  getAiPrompts(): SettingsRecord {
    return { ...this.aiPrompts };
  }

  getGreeting(): string {
    const greeting = this.aiPrompts.greeting;
    return typeof greeting === 'string' ? greeting : '';
  }

  listExpressions(): string[] {
    return this.expressions.listExpressions();
  }

  listMotions(): Record<string, string[]> {
    return this.model?.listMotions() ?? {};
  }

  // --- Conversation ---

  resetHistory(): void {
    this.history = [];
  }

  getHistory(): ConversationTurn[] {
    return [...this.history];
  }

  /**
   * Send a user message with the current history. The reply (or the local error text)
   * is recorded as the assistant turn; directives are left to the caller.
   */
  async sendUserMessage(text: string): Promise<StructuredResponse> {
    const snapshot = [...this.history];
    const response = await this.client.send(snapshot, text);
    if (this.disposed) {
      orchestratorLog('discarding reply that arrived after dispose');
      return response;
    }
    this.history.push(createTurn('user', text), createTurn('assistant', response.text));
    return response;
  }

  // --- Directive handlers ---

  registerDirectiveHandler(handler: DirectiveHandler): void {
    if (!this.handlers.includes(handler)) this.handlers.push(handler);
  }

  unregisterDirectiveHandler(handler: DirectiveHandler): void {
    this.handlers = this.handlers.filter((entry) => entry !== handler);
  }

  /** Pass every directive to every handler. Handler failures are logged and skipped. */
  async applyDirectives(directives: readonly Directive[]): Promise<void> {
    if (directives.length === 0) return;
    const handlers = [...this.handlers];
    for (const directive of directives) {
      for (const handler of handlers) {
        try {
          await handler(directive);
        } catch (error) {
          orchestratorLog('handler failed on %s directive: %o', directive.kind, error);
        }
      }
    }
    this.io?.emit('directives', directives);
  }

  // --- Pending queue ---

  /** Queue directives for the flush timer; the oldest entries are dropped past the limit. */
  enqueueDirectives(directives: readonly Directive[]): void {
    this.pending.push(...directives);
    const overflow = this.pending.length - this.pendingLimit;
    if (overflow > 0) {
      this.pending.splice(0, overflow);
      orchestratorLog('pending queue full, dropped %d oldest directive(s)', overflow);
    }
  }

  drainPendingDirectives(): Directive[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  pendingCount(): number {
    return this.pending.length;
  }

  /** Drain the queue and apply what was in it. Returns the number of directives applied. */
  async flushPending(): Promise<number> {
    if (this.flushing) return 0;
    this.flushing = true;
    try {
      const directives = this.drainPendingDirectives();
      await this.applyDirectives(directives);
      return directives.length;
    } finally {
      this.flushing = false;
    }
  }

  startFlushing(): void {
    if (this.flushTimer || this.disposed) return;
    this.flushTimer = setInterval(() => {
      this.flushPending().catch((error: unknown) => {
        orchestratorLog('flush failed: %o', error);
      });
    }, this.flushIntervalMs);
  }

  stopFlushing(): void {
    if (!this.flushTimer) return;
    clearInterval(this.flushTimer);
    this.flushTimer = null;
  }

  // --- Vision ---

  attachVisionService(service: VisionService | null): void {
    if (this.vision === service) return;
    this.vision?.unregisterListener(this.visionListener);
    this.vision = service;
    service?.registerListener(this.visionListener);
  }

  /**
   * Turn a capture into a prompt and send it. Captures with neither text nor snapshot
   * and captures not newer than the last one seen are ignored.
   */
  async handleVisionEvent(event: VisionEvent): Promise<StructuredResponse | null> {
    if (this.disposed || event.type !== 'vision' || !isRecord(event.payload)) return null;
    const { timestamp, text, snapshot, meta } = event.payload;
    const trimmed = typeof text === 'string' ? text.trim() : '';
    const snapshotPath = typeof snapshot === 'string' && snapshot ? snapshot : undefined;
    if (!trimmed && !snapshotPath) return null;

    const stamp = typeof timestamp === 'number' && Number.isFinite(timestamp) ? timestamp : 0;
    if (stamp && stamp <= this.lastVisionTimestamp) {
      orchestratorLog('skipping stale vision event %d', stamp);
      return null;
    }
    this.lastVisionTimestamp = stamp || Date.now();

    const prompt = renderPrompt(this.env, VISION_TEMPLATE, {
      text: trimmed,
      width: isRecord(meta) ? meta.width : undefined,
      height: isRecord(meta) ? meta.height : undefined,
      snapshot: snapshotPath
    });

    const response = await this.client.send([...this.history], prompt);
    if (this.disposed) return response;

    this.history.push(createTurn('system', prompt));
    if (response.text) this.history.push(createTurn('assistant', response.text));
    if (response.status === 'ok' && response.directives.length > 0) {
      this.enqueueDirectives(response.directives);
    }
    return response;
  }

  dispose(): void {
    this.stopFlushing();
    this.attachVisionService(null);
    this.pending = [];
    this.disposed = true;
    orchestratorLog('orchestrator disposed');
  }
}
