import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createServer } from 'http';
import type { Server } from 'http';
import { Orchestrator } from '../agents/Orchestrator';
import { ChatClient } from '../llm/client';
import { chatSettingsFrom } from '../llm/types';
import { createApp } from '../server';
import { SettingsService } from '../services/SettingsService';
import { createResponse } from '../types/directives';
import { createPromptEnvironment } from '../utils/promptEnvironment';
import { makeTempDir } from './fixtures/fakeModel';

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;
  let client: ChatClient;
  let orchestrator: Orchestrator;

  beforeEach(async () => {
    const settings = new SettingsService(makeTempDir());
    client = new ChatClient(chatSettingsFrom({}));
    orchestrator = new Orchestrator({ settings, env: createPromptEnvironment(), client });
    server = createServer(createApp(orchestrator, settings));
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    orchestrator.dispose();
    vi.restoreAllMocks();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  const send = (method: string, route: string, body?: unknown) =>
    fetch(`${baseUrl}${route}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      ...(body !== undefined && { body: typeof body === 'string' ? body : JSON.stringify(body) })
    });

  it('reports health and the greeting', async () => {
    expect(await (await fetch(`${baseUrl}/api/health`)).json()).toEqual({ status: 'ok' });
    expect(await (await fetch(`${baseUrl}/api/greeting`)).json()).toEqual({
      greeting: "Hi! I'm your desktop buddy, ready to chat whenever you are."
    });
  });

  it('chats, applies directives and records history', async () => {
    vi.spyOn(client, 'send').mockResolvedValue(
      createResponse({ text: 'Hello!', directives: [{ kind: 'motion', payload: { group: 'Idle' } }] })
    );
    const apply = vi.spyOn(orchestrator, 'applyDirectives');

    const res = await send('POST', '/api/chat', { text: '  hi  ' });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      response: { text: 'Hello!', directives: [{ kind: 'motion', payload: { group: 'Idle' } }], status: 'ok' }
    });
    expect(apply).toHaveBeenCalledWith([{ kind: 'motion', payload: { group: 'Idle' } }]);

    const history = await (await fetch(`${baseUrl}/api/history`)).json();
    expect(history).toEqual({
      history: [
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'Hello!' }
      ]
    });

    expect((await send('DELETE', '/api/history')).status).toBe(204);
    expect(orchestrator.getHistory()).toEqual([]);
  });

  it('rejects a chat without text', async () => {
    const res = await send('POST', '/api/chat', { text: '   ' });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Field "text" must be a non-empty string', code: 'bad_request' });
  });

  it('answers malformed JSON with 400', async () => {
    const res = await send('POST', '/api/chat', '{"text":');
    expect(res.status).toBe(400);
  });

  it('saves settings and reloads the orchestrator', async () => {
    const reload = vi.spyOn(orchestrator, 'reloadConfig');
    const res = await send('PUT', '/api/settings', { display_name: 'Sam' });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ display_name: 'Sam', model: 'gpt-4o-mini' });
    expect(reload).toHaveBeenCalledTimes(1);
    expect(orchestrator.getUserSettings().display_name).toBe('Sam');
  });

  it('rejects settings that are not an object', async () => {
    const res = await send('PUT', '/api/prompts', [1, 2]);
    expect(res.status).toBe(400);
  });

  it('lists expressions and motions', async () => {
    const expressions = await (await fetch(`${baseUrl}/api/expressions`)).json();
    expect(expressions).toMatchObject({ names: ['neutral', 'happy', 'sad', 'angry', 'excited'] });
    expect(await (await fetch(`${baseUrl}/api/motions`)).json()).toEqual({});
  });

  it('answers unknown routes with 404', async () => {
    const res = await fetch(`${baseUrl}/api/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found', code: 'not_found' });
  });
});
