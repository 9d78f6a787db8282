import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import Ajv from 'ajv';
import { createLogger, NAMESPACES } from './logging';
import { isRecord } from './types/directives';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const configLog = createLogger(NAMESPACES.config);

export interface DebugSettings {
  enabledNamespaces?: string;
  colors?: boolean;
}

export interface Config {
  /** Settings, prompts and presets live here; relative paths resolve against the config file. */
  dataDir: string;
  port: number;
  flushIntervalMs: number;
  pendingDirectiveLimit: number;
  /** Model manifest to load on start, if any. */
  modelPath?: string;
  debug?: DebugSettings;
}

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '..', 'localConfig', 'config.json');

const configSchema = {
  type: 'object',
  properties: {
    dataDir: { type: 'string', default: 'data' },
    port: { type: 'integer', minimum: 0, maximum: 65535, default: 3001 },
    flushIntervalMs: { type: 'integer', minimum: 1, default: 500 },
    pendingDirectiveLimit: { type: 'integer', minimum: 1, default: 64 },
    modelPath: { type: 'string' },
    debug: {
      type: 'object',
      properties: {
        enabledNamespaces: { type: 'string' },
        colors: { type: 'boolean' }
      }
    }
  }
} as const;

const ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true, coerceTypes: true });
const validateConfig = ajv.compile<Config>(configSchema);

function defaultConfig(): Config {
  return {
    dataDir: 'data',
    port: 3001,
    flushIntervalMs: 500,
    pendingDirectiveLimit: 64,
    debug: { enabledNamespaces: 'avatar:server,avatar:llm:*', colors: true }
  };
}

export class ConfigManager {
  private config: Config;
  private readonly configPath: string;

  constructor(configPath: string = process.env.AVATAR_CONFIG || DEFAULT_CONFIG_PATH) {
    this.configPath = path.resolve(configPath);
    this.config = this.loadConfig(this.configPath);
  }

  private loadConfig(configPath: string): Config {
    if (!fs.existsSync(configPath)) {
      const created = defaultConfig();
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, JSON.stringify(created, null, 2));
      configLog('wrote default config to %s', configPath);
      return created;
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    const candidate: unknown = isRecord(parsed) ? parsed : {};
    if (validateConfig(candidate)) return candidate;
    configLog('config %s rejected: %o', configPath, validateConfig.errors);
    return defaultConfig();
  }

  getConfig(): Config {
    return { ...this.config };
  }

  getDataDir(): string {
    return path.resolve(path.dirname(this.configPath), this.config.dataDir);
  }

  getModelPath(): string | undefined {
    const modelPath = this.config.modelPath;
    return modelPath ? path.resolve(path.dirname(this.configPath), modelPath) : undefined;
  }

  /** `PORT` from the environment wins over the file. */
  getPort(): number {
    const fromEnv = Number(process.env.PORT);
    return process.env.PORT && Number.isInteger(fromEnv) && fromEnv >= 0 ? fromEnv : this.config.port;
  }

  reload(): void {
    this.config = this.loadConfig(this.configPath);
  }

  updateDebugSettings(updates: Partial<DebugSettings>): Config {
    this.config = {
      ...this.config,
      debug: { ...this.config.debug, ...updates }
    };
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2));
    return this.getConfig();
  }
}
