/**
 * Model serving reply shapes.
 *
 * Serving endpoints answer in several layouts depending on the model
 * behind them. Each known layout is one variant; anything else is kept
 * whole and stringified.
 */

export type ModelReply =
  | { kind: 'chat'; content: string }
  | { kind: 'predictions'; prediction: unknown }
  | { kind: 'content'; content: unknown }
  | { kind: 'unknown'; raw: unknown };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
* Message content is either a string or, for reasoning models, a list of
* typed parts of which only the text parts count.
*/
function contentText(content: unknown): string | undefined {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return undefined;

  const texts = content
    .filter(isRecord)
    .filter(part => part['type'] === 'text' && typeof part['text'] === 'string')
    .map(part => String(part['text']));
  return texts.length > 0 ? texts.join('') : undefined;
}

function firstChoiceText(choices: unknown[]): string | undefined {
  const [first] = choices;
  if (!isRecord(first) || !isRecord(first['message'])) return undefined;
  return contentText(first['message']['content']);
}

export function classifyReply(json: unknown): ModelReply {
  if (!isRecord(json)) {
    return { kind: 'unknown', raw: json };
  }

  const { choices, predictions } = json;
  if (Array.isArray(choices) && choices.length > 0) {
    const content = firstChoiceText(choices);
    if (content !== undefined) {
      return { kind: 'chat', content };
    }
  }
  if (Array.isArray(predictions) && predictions.length > 0) {
    return { kind: 'predictions', prediction: predictions[0] };
  }
  if ('content' in json) {
    return { kind: 'content', content: json['content'] };
  }
  return { kind: 'unknown', raw: json };
}

function asText(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function extractReplyText(json: unknown): string {
  const reply = classifyReply(json);
  switch (reply.kind) {
    case 'chat':
      return reply.content;
    case 'predictions':
      return asText(reply.prediction);
    case 'content':
      return asText(reply.content);
    case 'unknown':
      return asText(reply.raw);
  }
}
