/**
 * Prompt templates. Question generation and explanations request strict JSON;
 * answer feedback is free-form markdown shown to the candidate as-is.
 */
import type { SessionContext, SessionQuestion } from '../../types';

export const SYSTEM_PROMPT_FEEDBACK = `You are an experienced technical interviewer reviewing a candidate's practice answer.

RULES:
- Be specific: reference what the candidate actually said.
- Cover correctness, completeness and clarity, then give 2-3 concrete improvements.
- If the answer needs code, use markdown code blocks with a language tag.
- Do not infer or reference demographics. Evaluate only the content of the answer.
- Keep it under 250 words. Plain markdown, no JSON.`;

export const SYSTEM_PROMPT_JSON = `You generate interview preparation material. Respond only with valid JSON. Do not add any text outside the JSON.`;

function contextLines(context: SessionContext): string {
  const lines: string[] = [];
  if (context.role) lines.push(`- Target role: ${context.role}`);
  if (context.experienceYears !== null) lines.push(`- Candidate experience: ${context.experienceYears} years`);
  if (context.topicsToFocus) lines.push(`- Focus topics: ${context.topicsToFocus}`);
  if (context.description) lines.push(`- Notes: ${context.description}`);
  return lines.length ? `Interview context:\n${lines.join('\n')}\n\n` : '';
}

export function buildFeedbackPrompt(question: SessionQuestion, answer: string, context: SessionContext): string {
  const reference = question.referenceAnswer
    ? `Reference answer (for your judgement only, do not quote it verbatim):\n${question.referenceAnswer}\n\n`
    : '';
  return (
    contextLines(context) +
    `Question (${question.category}, ${question.difficulty}):\n${question.prompt}\n\n` +
    reference +
    `Candidate answer:\n${answer}\n\n` +
    `Give your feedback on the candidate answer.`
  );
}

export interface QuestionGenerationInput {
  role: string;
  experienceYears: number;
  topicsToFocus: string;
  count: number;
}

export function buildQuestionGenerationPrompt(input: QuestionGenerationInput): string {
  return `Task:
- Role: ${input.role}
- Candidate experience: ${input.experienceYears} years
- Focus topics: ${input.topicsToFocus}
- Write ${input.count} interview questions.
- For each question, write a detailed but beginner-friendly answer.
- If an answer needs a code example, wrap it in a markdown code block with a language tag.

Return a JSON array like:
[
  {
    "question": "Question here?",
    "answer": "Answer here.\\n\\n\`\`\`js\\ncode here\\n\`\`\`"
  }
]`;
}

export function buildExplanationPrompt(question: string, experienceYears?: number | null): string {
  const audience =
    experienceYears === undefined || experienceYears === null
      ? 'a beginner'
      : `a candidate with ${experienceYears} years of experience`;
  return `Task:
- Explain the following interview question in depth for ${audience}.
- Question: "${question}"
- Provide a short and clear title.
- If the explanation includes a code example, use a markdown code block with a language tag.

Return a JSON object like:
{
  "title": "Short title here",
  "explanation": "Explanation here.\\n\\n\`\`\`js\\ncode here\\n\`\`\`"
}`;
}

/** Follow-up question about material the candidate is studying (a question, an answer, an explanation). */
export function buildFollowUpPrompt(context: string, question: string): string {
  return `Study material:
"""
${context}
"""

Follow-up question: "${question}"

Task:
- Answer the follow-up question using the study material as context, clearly and concisely.
- If the answer needs code, use a markdown code block with a language tag.

Return a JSON object like:
{
  "answer": "Answer here."
}`;
}
