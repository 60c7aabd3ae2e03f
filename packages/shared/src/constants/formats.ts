export const WIRE_FORMATS = ['anthropic', 'openai-chat', 'openai-responses'] as const;

export type WireFormat = (typeof WIRE_FORMATS)[number];

export const WIRE_FORMAT_LABELS: Record<WireFormat, string> = {
  anthropic: 'Anthropic Messages',
  'openai-chat': 'OpenAI Chat Completions',
  'openai-responses': 'OpenAI Responses',
};

export function isWireFormat(value: string): value is WireFormat {
  return (WIRE_FORMATS as readonly string[]).includes(value);
}
