import { createLogger, NAMESPACES } from '../logging';
import type { ModelManager } from '../avatar/ModelManager';
import { isRecord } from '../types/directives';
import type { SettingsService } from './SettingsService';

const expressionLog = createLogger(NAMESPACES.services.expression);

export interface ApplyOptions {
  blend?: number;
  additive?: boolean;
}

/** Numeric entries of a map, ignoring everything else. */
export function numericEntries(source: Record<string, unknown>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'number' && Number.isFinite(value)) out[key] = value;
  }
  return out;
}

/**
 * A preset is either `{ parameters: {...}, description? }` or a flat map whose numeric
 * entries are the parameters.
 */
export function extractParameterMap(definition: unknown): Record<string, number> {
  if (!isRecord(definition)) return {};
  if (isRecord(definition.parameters)) return numericEntries(definition.parameters);
  return numericEntries(definition);
}

export class ExpressionService {
  private definitions: Record<string, unknown> = {};

  constructor(
    private readonly settings: SettingsService,
    private model: ModelManager | null = null
  ) {
    this.reload();
  }

  reload(): void {
    this.definitions = this.settings.loadExpressions();
    expressionLog('loaded %d expression preset(s)', Object.keys(this.definitions).length);
  }

  setModel(model: ModelManager | null): void {
    this.model = model;
  }

  listExpressions(): string[] {
    return Object.keys(this.definitions);
  }

  getExpression(name: string): unknown {
    return this.definitions[name];
  }

  /** False when the preset is unknown, has no parameters or nothing could be applied. */
  applyExpression(name: string, options: ApplyOptions = {}): boolean {
    if (!name || !(name in this.definitions)) return false;
    const parameters = extractParameterMap(this.definitions[name]);
    if (Object.keys(parameters).length === 0) return false;
    return this.applyParameters(parameters, options);
  }

  applyParameters(parameters: Record<string, number>, options: ApplyOptions = {}): boolean {
    if (!this.model) return false;
    return this.model.applyParameters(parameters, { blend: options.blend ?? 1, additive: options.additive ?? false });
  }

  applySnapshot(snapshot: Record<string, number>, blend = 1): boolean {
    return this.applyParameters(snapshot, { blend, additive: false });
  }
}
