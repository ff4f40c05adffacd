import { isRecord } from '../../db/rows';
import { SessionError } from '../../services/errors';
import type { ConceptExplanation, FollowUpAnswer, GeneratedQuestion } from '../../types';

function malformed(): SessionError {
  return new SessionError('UPSTREAM_UNAVAILABLE', 'AI provider returned malformed JSON');
}

/**
 * Models wrap JSON in ```json fences or add chatter around it. Strip fences,
 * then on failure trim everything outside the outermost brackets and try once more.
 */
export function parseJsonReply(raw: string): unknown {
  const cleaned = raw
    .trim()
    .replace(/^```(?:json)?/i, '')
    .replace(/```$/, '')
    .trim();
  try {
    return JSON.parse(cleaned);
  } catch {
    const trimmed = cleaned.replace(/^[^{[]*/, '').replace(/[^}\]]*$/, '');
    try {
      return JSON.parse(trimmed);
    } catch {
      throw malformed();
    }
  }
}

/** Some models double-escape newlines inside code blocks. */
function unescapeNewlines(text: string): string {
  return text.replace(/\\n/g, '\n');
}

export function toGeneratedQuestions(value: unknown): GeneratedQuestion[] {
  if (!Array.isArray(value)) throw malformed();
  const items: GeneratedQuestion[] = [];
  for (const item of value) {
    if (!isRecord(item) || typeof item.question !== 'string' || typeof item.answer !== 'string') continue;
    const question = item.question.trim();
    if (!question) continue;
    items.push({ question, answer: unescapeNewlines(item.answer) });
  }
  if (items.length === 0) throw malformed();
  return items;
}

export function toExplanation(value: unknown): ConceptExplanation {
  if (!isRecord(value) || typeof value.title !== 'string' || typeof value.explanation !== 'string') {
    throw malformed();
  }
  return { title: value.title.trim(), explanation: unescapeNewlines(value.explanation) };
}

export function toFollowUpAnswer(value: unknown): FollowUpAnswer {
  if (!isRecord(value) || typeof value.answer !== 'string' || !value.answer.trim()) throw malformed();
  return { answer: unescapeNewlines(value.answer.trim()) };
}
