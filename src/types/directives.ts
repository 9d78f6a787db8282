export type TurnRole = 'system' | 'user' | 'assistant';

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly content: string;
}

/**
 * A structured instruction for the avatar. `kind` is free-form; the payload stays an
 * open map so unknown fields survive until a handler looks at them.
 */
export interface Directive {
  kind: string;
  payload: Record<string, unknown>;
}

export type ResponseStatus = 'ok' | 'offline' | 'error';

export interface StructuredResponse {
  readonly text: string;
  readonly directives: readonly Directive[];
  readonly status: ResponseStatus;
  readonly error?: string;
  readonly raw?: unknown;
}

export interface MotionReference {
  group: string;
  index: number;
}

export interface ParameterTarget {
  id: string;
  value: number;
}

/** Directive kinds the avatar handler acts on. Anything else is carried but ignored. */
export const KNOWN_DIRECTIVE_KINDS = ['motion', 'expression', 'scale', 'move', 'position', 'look'] as const;
export type KnownDirectiveKind = (typeof KNOWN_DIRECTIVE_KINDS)[number];

export function createTurn(role: TurnRole, content: string): ConversationTurn {
  return Object.freeze({ role, content });
}

export function createResponse(fields: {
  text: string;
  directives?: Directive[];
  status?: ResponseStatus;
  error?: string;
  raw?: unknown;
}): StructuredResponse {
  const response: StructuredResponse = {
    text: fields.text,
    directives: Object.freeze([...(fields.directives ?? [])]),
    status: fields.status ?? 'ok',
    ...(fields.error !== undefined && { error: fields.error }),
    ...(fields.raw !== undefined && { raw: fields.raw })
  };
  return Object.freeze(response);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
