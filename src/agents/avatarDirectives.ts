import { createLogger, NAMESPACES } from '../logging';
import type { ModelManager } from '../avatar/ModelManager';
import { parseMotionRequest, resolveMotion } from '../avatar/motionResolver';
import type { ExpressionService } from '../services/ExpressionService';
import { numericEntries } from '../services/ExpressionService';
import { isRecord } from '../types/directives';
import type { Directive, KnownDirectiveKind } from '../types/directives';

const directiveLog = createLogger(NAMESPACES.agents.directives);

export type DirectiveHandler = (directive: Directive) => void | Promise<void>;

const KIND_ALIASES: Record<string, KnownDirectiveKind> = {
  motion: 'motion',
  start_motion: 'motion',
  play_motion: 'motion',
  scale: 'scale',
  set_scale: 'scale',
  move: 'move',
  translate: 'move',
  position: 'position',
  set_position: 'position',
  look: 'look',
  drag: 'look',
  expression: 'expression',
  set_expression: 'expression',
  face: 'expression',
  parameters: 'expression'
};

export function canonicalKind(kind: string): KnownDirectiveKind | null {
  return KIND_ALIASES[kind.trim().toLowerCase()] ?? null;
}

/** Numbers and numeric strings; everything else is treated as missing. */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function firstString(...values: unknown[]): string | undefined {
  for (const value of values) {
    if (typeof value === 'string' && value) return value;
  }
  return undefined;
}

export type ExpressionOutcome = 'preset' | 'parameters' | 'not-applied' | 'unknown';

/**
 * Apply an expression directive: the named preset first, then an inline `parameters`
 * map. `not-applied` means something matched but the runtime took none of it.
 */
export function applyExpressionDirective(expressions: ExpressionService, payload: Record<string, unknown>): ExpressionOutcome {
  const name = firstString(payload.name, payload.value, payload.expression);
  const blend = toNumber(payload.blend ?? payload.weight) ?? 1;
  const additive = payload.additive === true || payload.additive === 'true';
  const options = { blend, additive };

  if (name && expressions.applyExpression(name, options)) return 'preset';

  const parameters = isRecord(payload.parameters) ? numericEntries(payload.parameters) : {};
  if (Object.keys(parameters).length > 0) {
    if (expressions.applyParameters(parameters, options)) return 'parameters';
    directiveLog('runtime accepted none of %d expression parameter(s)', Object.keys(parameters).length);
    return 'not-applied';
  }
  if (name && expressions.getExpression(name) !== undefined) {
    directiveLog('expression preset %s exists but could not be applied to the model', name);
    return 'not-applied';
  }
  if (name) directiveLog('unknown expression preset %s', name);
  return 'unknown';
}

export interface AvatarHandlerDeps {
  getModel: () => ModelManager | null;
  expressions: ExpressionService;
}

/** Maps recognised directive kinds onto the loaded model. Unknown kinds are ignored. */
export function createAvatarDirectiveHandler({ getModel, expressions }: AvatarHandlerDeps): DirectiveHandler {
  return (directive: Directive) => {
    const model = getModel();
    if (!model) return;
    const kind = canonicalKind(directive.kind);
    const payload = directive.payload;

    switch (kind) {
      case 'motion': {
        resolveMotion(model, parseMotionRequest(payload));
        break;
      }
      case 'scale': {
        const value = toNumber(payload.value ?? payload.scale);
        if (value !== undefined) model.setScale(value);
        break;
      }
      case 'move': {
        model.translate(toNumber(payload.dx) ?? 0, toNumber(payload.dy) ?? 0);
        break;
      }
      case 'position': {
        const x = toNumber(payload.x);
        const y = toNumber(payload.y);
        if (x !== undefined && y !== undefined) model.setPosition(x, y);
        break;
      }
      case 'look': {
        const x = toNumber(payload.x);
        const y = toNumber(payload.y);
        if (x !== undefined && y !== undefined) model.drag(x, y);
        break;
      }
      case 'expression': {
        applyExpressionDirective(expressions, payload);
        break;
      }
      default:
        directiveLog('ignoring directive of kind %s', directive.kind);
    }
  };
}
