import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import Ajv from 'ajv';
import { createLogger, NAMESPACES } from '../logging';
import { isRecord } from '../types/directives';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const settingsLog = createLogger(NAMESPACES.services.settings);

export type SettingsRecord = Record<string, unknown>;

export const DEFAULT_USER_SETTINGS: SettingsRecord = {
  display_name: 'Friend',
  api_url: 'https://api.example.com/v1/chat',
  api_key: '',
  model: 'gpt-4o-mini'
};

export const DEFAULT_AI_PROMPTS: SettingsRecord = {
  system_prompt: 'You are a cheerful desktop companion who keeps the user company and reacts with lively motions.',
  greeting: "Hi! I'm your desktop buddy, ready to chat whenever you are."
};

export interface VisionConfig {
  enabled: boolean;
  capture_interval: number;
  region: Record<string, number> | null;
  ocr: { enabled: boolean; language: string };
  max_history: number;
}

const visionConfigSchema = {
  type: 'object',
  properties: {
    enabled: { type: 'boolean', default: false },
    capture_interval: { type: 'number', default: 10 },
    region: {
      type: ['object', 'null'],
      additionalProperties: { type: 'number' },
      default: null
    },
    ocr: {
      type: 'object',
      default: {},
      properties: {
        enabled: { type: 'boolean', default: true },
        language: { type: 'string', default: 'eng' }
      }
    },
    max_history: { type: 'integer', minimum: 0, default: 5 }
  }
} as const;

const ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true, coerceTypes: true });
const validateVisionConfig = ajv.compile<VisionConfig>(visionConfigSchema);

export function defaultVisionConfig(): VisionConfig {
  return { enabled: false, capture_interval: 10, region: null, ocr: { enabled: true, language: 'eng' }, max_history: 5 };
}

/** Fill defaults and coerce field types; invalid documents fall back to the defaults. */
export function normalizeVisionConfig(raw: unknown): VisionConfig {
  if (!isRecord(raw)) return defaultVisionConfig();
  const candidate: unknown = structuredClone(raw);
  if (validateVisionConfig(candidate)) return candidate;
  settingsLog('vision config rejected: %o', validateVisionConfig.errors);
  return defaultVisionConfig();
}

function loadDefaultExpressions(): SettingsRecord {
  const file = path.join(__dirname, 'defaults', 'expressions.json');
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  return isRecord(parsed) ? parsed : {};
}

/**
 * JSON file persistence for user settings, prompts, expression presets and the vision
 * config. Loading merges the file over built-in defaults, so unknown keys survive and
 * missing ones come from the defaults.
 */
export class SettingsService {
  private readonly defaultExpressions = loadDefaultExpressions();

  constructor(private readonly dataDir: string) {}

  get paths() {
    return {
      userSettings: path.join(this.dataDir, 'user_settings.json'),
      aiPrompts: path.join(this.dataDir, 'ai_prompts.json'),
      expressions: path.join(this.dataDir, 'expressions.json'),
      visionConfig: path.join(this.dataDir, 'vision', 'config.json'),
      visionDir: path.join(this.dataDir, 'vision')
    };
  }

  private ensureFile(file: string, defaults: SettingsRecord): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    if (!fs.existsSync(file)) {
      fs.writeFileSync(file, JSON.stringify(defaults, null, 2), 'utf-8');
    }
  }

  private load(file: string, defaults: SettingsRecord): SettingsRecord {
    try {
      this.ensureFile(file, defaults);
      const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
      if (isRecord(parsed)) return { ...defaults, ...parsed };
      settingsLog('%s does not hold an object; using defaults', file);
    } catch (error) {
      settingsLog('failed to load %s: %o', file, error);
    }
    return { ...defaults };
  }

  private save(file: string, data: SettingsRecord, defaults: SettingsRecord): SettingsRecord {
    const merged = { ...defaults, ...data };
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(merged, null, 2), 'utf-8');
    return merged;
  }

  loadUserSettings(): SettingsRecord {
    return this.load(this.paths.userSettings, DEFAULT_USER_SETTINGS);
  }

  saveUserSettings(data: SettingsRecord): SettingsRecord {
    return this.save(this.paths.userSettings, data, DEFAULT_USER_SETTINGS);
  }

  loadAiPrompts(): SettingsRecord {
    return this.load(this.paths.aiPrompts, DEFAULT_AI_PROMPTS);
  }

  saveAiPrompts(data: SettingsRecord): SettingsRecord {
    return this.save(this.paths.aiPrompts, data, DEFAULT_AI_PROMPTS);
  }

  loadExpressions(): SettingsRecord {
    return this.load(this.paths.expressions, this.defaultExpressions);
  }

  saveExpressions(data: SettingsRecord): SettingsRecord {
    return this.save(this.paths.expressions, data, this.defaultExpressions);
  }

  loadVisionConfig(): VisionConfig {
    const file = this.paths.visionConfig;
    try {
      if (!fs.existsSync(file)) {
        this.saveVisionConfig(defaultVisionConfig());
      }
      return normalizeVisionConfig(JSON.parse(fs.readFileSync(file, 'utf-8')));
    } catch (error) {
      settingsLog('failed to load vision config: %o', error);
      return defaultVisionConfig();
    }
  }

  saveVisionConfig(config: VisionConfig): void {
    fs.mkdirSync(path.dirname(this.paths.visionConfig), { recursive: true });
    fs.writeFileSync(this.paths.visionConfig, JSON.stringify(config, null, 2), 'utf-8');
  }
}
