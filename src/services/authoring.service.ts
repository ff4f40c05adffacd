/**
 * AI-assisted authoring: practice question generation, concept explanations
 * and follow-up questions. All go through the gateway and parse a strict JSON reply.
 */
import type { AiGateway } from '../ai/gateway';
import {
  SYSTEM_PROMPT_JSON,
  buildExplanationPrompt,
  buildFollowUpPrompt,
  buildQuestionGenerationPrompt,
  parseJsonReply,
  toExplanation,
  toFollowUpAnswer,
  toGeneratedQuestions,
  type QuestionGenerationInput,
} from '../ai/prompts';
import type { ConceptExplanation, FollowUpAnswer, GeneratedQuestion } from '../types';

export class AuthoringService {
  constructor(
    private readonly gateway: AiGateway,
    private readonly timeoutMs: number
  ) {}

  async generateQuestions(input: QuestionGenerationInput): Promise<GeneratedQuestion[]> {
    const raw = await this.gateway.generate(buildQuestionGenerationPrompt(input), {
      system: SYSTEM_PROMPT_JSON,
      timeoutMs: this.timeoutMs * 2,
      maxTokens: 4096,
    });
    return toGeneratedQuestions(parseJsonReply(raw)).slice(0, input.count);
  }

  /** Pitched at `experienceYears` when given, otherwise at a beginner. */
  async explainConcept(question: string, experienceYears?: number | null): Promise<ConceptExplanation> {
    const raw = await this.gateway.generate(buildExplanationPrompt(question, experienceYears), {
      system: SYSTEM_PROMPT_JSON,
      timeoutMs: this.timeoutMs,
    });
    return toExplanation(parseJsonReply(raw));
  }

  async followUp(context: string, question: string): Promise<FollowUpAnswer> {
    const raw = await this.gateway.generate(buildFollowUpPrompt(context, question), {
      system: SYSTEM_PROMPT_JSON,
      timeoutMs: this.timeoutMs,
    });
    return toFollowUpAnswer(parseJsonReply(raw));
  }
}
