import type { EmailDraft, ExcuseRequest } from './types';

/**
 * Model Reply Normalizer
 *
 * Turns whatever the model answered into a subject/body pair. Strategies are
 * tried in order and the first one that produces a draft wins; the template
 * strategy always produces one, so normalization never fails.
 */

/** Bodies shorter than this are not trusted from the free-text strategy */
export const MIN_BODY_LENGTH = 50;

export const MISSING_BODY_TEXT = 'Email content could not be generated.';

const SUBJECT_PREFIX = /^subject[: ]/i;

export type StrategyName = 'json' | 'text' | 'template';

/** A strategy returns null when it does not recognise the reply */
export type NormalizationStrategy = (reply: string, request: ExcuseRequest) => EmailDraft | null;

export interface NormalizedDraft extends EmailDraft {
  strategy: StrategyName;
}

export interface SubjectLine {
  /** Index of the subject line in the scanned lines */
  index: number;
  subject: string;
}

function defaultSubject(request: ExcuseRequest): string {
  return `Re: ${request.category}`;
}

function splitLines(reply: string): string[] {
  return reply.trim().split(/\r?\n/);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
* Find the first line starting with "subject:" or "subject " (any case).
*/
export function extractSubjectLine(lines: readonly string[]): SubjectLine | undefined {
  for (const [index, line] of lines.entries()) {
    if (SUBJECT_PREFIX.test(line)) {
      return { index, subject: line.slice('subject'.length + 1).trim() };
    }
  }
  return undefined;
}

function subjectFromLines(lines: readonly string[], request: ExcuseRequest): string {
  const subjectLine = extractSubjectLine(lines);
  return subjectLine ? subjectLine.subject : defaultSubject(request);
}

export function parseJsonReply(reply: string, request: ExcuseRequest): EmailDraft | null {
  const trimmed = reply.trim();
  if (!trimmed.startsWith('{')) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const { subject, body } = parsed;
  return {
    subject: typeof subject === 'string' ? subject : defaultSubject(request),
    body: typeof body === 'string' ? body : MISSING_BODY_TEXT,
  };
}

export function parseTextReply(reply: string, request: ExcuseRequest): EmailDraft | null {
  const lines = splitLines(reply);
  const subjectLine = extractSubjectLine(lines);

  let bodyLines = lines;
  if (subjectLine) {
    // Drop the subject line and the blank lines directly under it
    let resume = subjectLine.index + 1;
    while (resume < lines.length && lines[resume]?.trim() === '') {
      resume++;
    }
    bodyLines = [...lines.slice(0, subjectLine.index), ...lines.slice(resume)];
  }

  const body = bodyLines.join('\n').trim();
  if (body.length < MIN_BODY_LENGTH) return null;

  return { subject: subjectLine ? subjectLine.subject : defaultSubject(request), body };
}

/**
* Always succeeds. The subject still comes from the reply when it has one.
*/
export function buildTemplateDraft(reply: string, request: ExcuseRequest): EmailDraft {
  const body = [
    `Dear ${request.recipient_name},`,
    '',
    `I wanted to let you know that I'm running late due to ${request.category.toLowerCase()}.`,
    '',
    request.eta_when,
    '',
    'I apologize for any inconvenience this may cause.',
    '',
    'Best regards,',
    request.sender_name,
  ].join('\n');

  return { subject: subjectFromLines(splitLines(reply), request), body };
}

export const NORMALIZATION_STRATEGIES: ReadonlyArray<{ name: StrategyName; apply: NormalizationStrategy }> = [
  { name: 'json', apply: parseJsonReply },
  { name: 'text', apply: parseTextReply },
];

export function normalizeModelReply(reply: string, request: ExcuseRequest): NormalizedDraft {
  for (const { name, apply } of NORMALIZATION_STRATEGIES) {
    const draft = apply(reply, request);
    if (draft) {
      return { ...draft, strategy: name };
    }
  }
  return { ...buildTemplateDraft(reply, request), strategy: 'template' };
}
