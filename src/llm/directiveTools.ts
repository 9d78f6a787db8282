import type { ChatCompletionTool } from 'openai/resources/chat/completions';

// Tool-call contracts for the avatar. The model calls them by name and the
// normalizer turns each call into a directive of the same kind.

function tool(name: string, description: string, properties: Record<string, unknown>, required: string[] = []): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name,
      description,
      parameters: { type: 'object', properties, required }
    }
  };
}

const numberProp = (description: string) => ({ type: 'number', description });
const stringProp = (description: string) => ({ type: 'string', description });

export const DIRECTIVE_TOOLS: ChatCompletionTool[] = [
  tool('motion', 'Play a motion on the avatar.', {
    group: stringProp('Motion group, e.g. Idle or Tap'),
    index: { type: 'integer', description: 'Position inside the group' },
    file: stringProp('Motion file path or basename'),
    name: stringProp('Motion identifier'),
    priority: { type: 'integer', description: 'Playback priority (default 3)' }
  }),
  tool(
    'expression',
    'Apply an expression preset or a set of parameter values.',
    {
      name: stringProp('Preset name'),
      blend: numberProp('Blend weight between 0 and 1'),
      additive: { type: 'boolean', description: 'Add to the current values instead of replacing them' },
      parameters: {
        type: 'object',
        description: 'Parameter id to value',
        additionalProperties: { type: 'number' }
      }
    }
  ),
  tool('scale', 'Resize the avatar.', { value: numberProp('Scale factor between 0.1 and 5') }, ['value']),
  tool('move', 'Move the avatar relative to where it is.', { dx: numberProp('Horizontal offset'), dy: numberProp('Vertical offset') }),
  tool('position', 'Place the avatar at a point.', { x: numberProp('X'), y: numberProp('Y') }, ['x', 'y']),
  tool('look', 'Turn the gaze toward a point.', { x: numberProp('X'), y: numberProp('Y') }, ['x', 'y'])
];
