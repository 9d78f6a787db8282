import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { createServer } from 'http';
import type { Server as HttpServer } from 'http';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { Server } from 'socket.io';
import { Orchestrator } from './agents/Orchestrator';
import { ModelManager } from './avatar/ModelManager';
import type { ModelFactory } from './avatar/ModelManager';
import { ConfigManager } from './configManager';
import { createLogger, enableNamespaces, NAMESPACES } from './logging';
import { SettingsService } from './services/SettingsService';
import type { SettingsRecord } from './services/SettingsService';
import { VisionService } from './services/VisionService';
import type { CaptureSource } from './services/VisionService';
import { isRecord } from './types/directives';
import type { StructuredResponse } from './types/directives';
import { AppError, badRequest, toAppError } from './utils/errors';
import { createPromptEnvironment } from './utils/promptEnvironment';

const serverLog = createLogger(NAMESPACES.server.main);
const socketLog = createLogger(NAMESPACES.server.socket);

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const asyncRoute =
  (handler: AsyncHandler): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

function requireText(body: unknown): string {
  const text = isRecord(body) ? body.text : undefined;
  if (typeof text !== 'string' || !text.trim()) {
    throw badRequest('Field "text" must be a non-empty string');
  }
  return text.trim();
}

function requireRecord(body: unknown): SettingsRecord {
  if (!isRecord(body)) throw badRequest('Request body must be a JSON object');
  return body;
}

/** Send a message and apply whatever directives came back. */
async function converse(orchestrator: Orchestrator, text: string): Promise<StructuredResponse> {
  const response = await orchestrator.sendUserMessage(text);
  await orchestrator.applyDirectives(response.directives);
  return response;
}

export function createApp(orchestrator: Orchestrator, settings: SettingsService): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/api/greeting', (_req, res) => {
    res.json({ greeting: orchestrator.getGreeting() });
  });

  app.get('/api/history', (_req, res) => {
    res.json({ history: orchestrator.getHistory() });
  });

  app.delete('/api/history', (_req, res) => {
    orchestrator.resetHistory();
    res.status(204).end();
  });

  app.post(
    '/api/chat',
    asyncRoute(async (req, res) => {
      const response = await converse(orchestrator, requireText(req.body));
      res.json({ response });
    })
  );

  app.get('/api/settings', (_req, res) => {
    res.json(settings.loadUserSettings());
  });

  app.put('/api/settings', (req, res) => {
    const saved = settings.saveUserSettings(requireRecord(req.body));
    orchestrator.reloadConfig();
    res.json(saved);
  });

  app.get('/api/prompts', (_req, res) => {
    res.json(settings.loadAiPrompts());
  });

  app.put('/api/prompts', (req, res) => {
    const saved = settings.saveAiPrompts(requireRecord(req.body));
    orchestrator.reloadConfig();
    res.json(saved);
  });

  app.get('/api/expressions', (_req, res) => {
    res.json({ names: orchestrator.listExpressions(), presets: settings.loadExpressions() });
  });

  app.put('/api/expressions', (req, res) => {
    const saved = settings.saveExpressions(requireRecord(req.body));
    orchestrator.reloadConfig();
    res.json(saved);
  });

  app.get('/api/motions', (_req, res) => {
    res.json(orchestrator.listMotions());
  });

  app.use((_req, _res, next) => {
    next(new AppError('Not found', 404, 'not_found'));
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const error = toAppError(err);
    if (error.status >= 500) serverLog('request failed: %o', err);
    res.status(error.status).json({ error: error.message, code: error.code });
  });

  return app;
}

export interface StartServerOptions {
  configManager?: ConfigManager;
  /** Builds the model runtime; without one the server only forwards directives to clients. */
  modelFactory?: ModelFactory;
  captureSource?: CaptureSource;
}

export interface RunningServer {
  server: HttpServer;
  io: Server;
  orchestrator: Orchestrator;
  vision: VisionService | null;
  close(): Promise<void>;
}

export async function startServer(options: StartServerOptions = {}): Promise<RunningServer> {
  const configManager = options.configManager ?? new ConfigManager();
  const config = configManager.getConfig();
  enableNamespaces(config.debug?.enabledNamespaces);

  const settings = new SettingsService(configManager.getDataDir());
  const orchestrator = new Orchestrator({
    settings,
    env: createPromptEnvironment(),
    flushIntervalMs: config.flushIntervalMs,
    pendingDirectiveLimit: config.pendingDirectiveLimit
  });

  const modelPath = configManager.getModelPath();
  if (options.modelFactory && modelPath) {
    const model = new ModelManager(options.modelFactory);
    try {
      await model.loadModel(modelPath);
      model.attachDefaultTapHandlers();
      orchestrator.setModelManager(model);
    } catch (error) {
      serverLog('failed to load model %s: %o', modelPath, error);
    }
  }

  const vision = options.captureSource ? new VisionService(options.captureSource, settings) : null;
  if (vision) {
    orchestrator.attachVisionService(vision);
    vision.start();
  }

  const app = createApp(orchestrator, settings);
  const server = createServer(app);
  const io = new Server(server, { cors: { origin: '*' } });
  orchestrator.setSocketServer(io);
  orchestrator.startFlushing();

  io.on('connection', (socket) => {
    socketLog('client connected %s', socket.id);
    socket.emit('greeting', { greeting: orchestrator.getGreeting() });

    socket.on('chat', (data: unknown, ack?: (reply: unknown) => void) => {
      const reply = (payload: unknown) => {
        if (typeof ack === 'function') ack(payload);
      };
      let text: string;
      try {
        text = requireText(data);
      } catch (error) {
        reply({ error: toAppError(error).message });
        return;
      }
      converse(orchestrator, text)
        .then((response) => reply({ response }))
        .catch((error: unknown) => {
          socketLog('chat from %s failed: %o', socket.id, error);
          reply({ error: toAppError(error).message });
        });
    });

    socket.on('disconnect', () => {
      socketLog('client disconnected %s', socket.id);
    });
  });

  const port = configManager.getPort();
  await new Promise<void>((resolve) => server.listen(port, resolve));
  serverLog('listening on port %d', port);

  return {
    server,
    io,
    orchestrator,
    vision,
    async close() {
      orchestrator.dispose();
      await vision?.stop();
      await new Promise<void>((resolve) => io.close(() => resolve()));
    }
  };
}

const isEntryPoint = process.argv[1] !== undefined && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntryPoint) {
  startServer().catch((error: unknown) => {
    console.error('Server failed to start:', error);
    process.exitCode = 1;
  });
}
