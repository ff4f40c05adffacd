import { describe, expect, it, vi } from 'vitest';
import { AiGateway } from '../ai/gateway';
import { SYSTEM_PROMPT_JSON } from '../ai/prompts';
import type { ILLMService } from '../ai/llm';
import { AuthoringService } from './authoring.service';

function setup(content: string) {
  const chat = vi.fn().mockResolvedValue({ content });
  const llm: ILLMService = { chat };
  return { chat, authoring: new AuthoringService(new AiGateway(llm, { timeoutMs: 1000 }), 1000) };
}

describe('AuthoringService', () => {
  it('should generate at most the requested number of questions', async () => {
    const { authoring, chat } = setup(
      JSON.stringify([
        { question: 'Q1?', answer: 'A1' },
        { question: 'Q2?', answer: 'A2' },
        { question: 'Q3?', answer: 'A3' },
      ])
    );

    const items = await authoring.generateQuestions({
      role: 'Backend engineer',
      experienceYears: 3,
      topicsToFocus: 'databases',
      count: 2,
    });

    expect(items).toEqual([
      { question: 'Q1?', answer: 'A1' },
      { question: 'Q2?', answer: 'A2' },
    ]);
    const [messages, options] = chat.mock.calls[0];
    expect(messages[0]).toEqual({ role: 'system', content: SYSTEM_PROMPT_JSON });
    expect(options).toEqual({ timeoutMs: 2000, temperature: undefined, maxTokens: 4096 });
  });

  it('should explain a concept', async () => {
    const { authoring } = setup('{"title":"Closures","explanation":"Functions keep their scope."}');

    await expect(authoring.explainConcept('What is a closure?')).resolves.toEqual({
      title: 'Closures',
      explanation: 'Functions keep their scope.',
    });
  });

  it('should pitch the explanation at the given experience', async () => {
    const { authoring, chat } = setup('{"title":"Closures","explanation":"Functions keep their scope."}');

    await authoring.explainConcept('What is a closure?', 3);

    const [messages] = chat.mock.calls[0];
    expect(messages[1].content).toContain('in depth for a candidate with 3 years of experience.');
  });

  it('should answer a follow-up question about study material', async () => {
    const { authoring, chat } = setup('{"answer":"A closure keeps the variables it captured."}');

    const reply = await authoring.followUp('Closures capture scope.', 'What does it capture?');

    expect(reply).toEqual({ answer: 'A closure keeps the variables it captured.' });
    const [messages, options] = chat.mock.calls[0];
    expect(messages[0]).toEqual({ role: 'system', content: SYSTEM_PROMPT_JSON });
    expect(messages[1].content).toContain('Follow-up question: "What does it capture?"');
    expect(options).toMatchObject({ timeoutMs: 1000 });
  });

  it('should surface unparseable replies as UPSTREAM_UNAVAILABLE', async () => {
    const { authoring } = setup('Sorry, I cannot help with that.');

    await expect(authoring.explainConcept('What is a closure?')).rejects.toMatchObject({
      code: 'UPSTREAM_UNAVAILABLE',
      message: 'AI provider returned malformed JSON',
    });
  });
});
