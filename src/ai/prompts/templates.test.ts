import { describe, expect, it } from 'vitest';
import {
  buildExplanationPrompt,
  buildFeedbackPrompt,
  buildFollowUpPrompt,
  buildQuestionGenerationPrompt,
} from './templates';
import type { SessionContext, SessionQuestion } from '../../types';

const question: SessionQuestion = {
  questionId: 'q-1',
  prompt: 'Explain isolation levels.',
  category: 'databases',
  difficulty: 'hard',
  referenceAnswer: null,
  isPinned: false,
  note: '',
};

const noContext: SessionContext = { role: null, experienceYears: null, topicsToFocus: null, description: null };

describe('buildFeedbackPrompt', () => {
  it('should contain only the question and answer when there is no context', () => {
    expect(buildFeedbackPrompt(question, 'RC, RR and serializable.', noContext)).toBe(
      'Question (databases, hard):\nExplain isolation levels.\n\n' +
        'Candidate answer:\nRC, RR and serializable.\n\n' +
        'Give your feedback on the candidate answer.'
    );
  });

  it('should list every context field that is set, including zero years', () => {
    const prompt = buildFeedbackPrompt(question, 'x', {
      role: 'DBA',
      experienceYears: 0,
      topicsToFocus: 'postgres',
      description: 'First interview',
    });

    expect(prompt.startsWith(
      'Interview context:\n' +
        '- Target role: DBA\n' +
        '- Candidate experience: 0 years\n' +
        '- Focus topics: postgres\n' +
        '- Notes: First interview\n\n'
    )).toBe(true);
  });
});

describe('buildQuestionGenerationPrompt', () => {
  it('should carry the role, experience, topics and count', () => {
    const prompt = buildQuestionGenerationPrompt({
      role: 'Frontend engineer',
      experienceYears: 4,
      topicsToFocus: 'react, css',
      count: 5,
    });

    expect(prompt).toContain('- Role: Frontend engineer\n');
    expect(prompt).toContain('- Candidate experience: 4 years\n');
    expect(prompt).toContain('- Focus topics: react, css\n');
    expect(prompt).toContain('- Write 5 interview questions.\n');
  });
});

describe('buildExplanationPrompt', () => {
  it('should quote the question', () => {
    expect(buildExplanationPrompt('What is a mutex?')).toContain('- Question: "What is a mutex?"\n');
  });

  it('should pitch the explanation at a beginner by default', () => {
    expect(buildExplanationPrompt('What is a mutex?')).toContain(
      '- Explain the following interview question in depth for a beginner.\n'
    );
  });

  it('should pitch the explanation at the candidate experience when given', () => {
    expect(buildExplanationPrompt('What is a mutex?', 3)).toContain(
      '- Explain the following interview question in depth for a candidate with 3 years of experience.\n'
    );
    expect(buildExplanationPrompt('What is a mutex?', 0)).toContain('for a candidate with 0 years of experience.');
  });
});

describe('buildFollowUpPrompt', () => {
  it('should fence the study material and quote the question', () => {
    const prompt = buildFollowUpPrompt('A mutex guards a critical section.', 'How is it different from a semaphore?');

    expect(prompt.startsWith(
      'Study material:\n"""\nA mutex guards a critical section.\n"""\n\n' +
        'Follow-up question: "How is it different from a semaphore?"\n'
    )).toBe(true);
    expect(prompt).toContain('"answer": "Answer here."');
  });
});
