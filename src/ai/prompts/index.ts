export {
  SYSTEM_PROMPT_FEEDBACK,
  SYSTEM_PROMPT_JSON,
  buildFeedbackPrompt,
  buildQuestionGenerationPrompt,
  buildExplanationPrompt,
  buildFollowUpPrompt,
} from './templates';
export type { QuestionGenerationInput } from './templates';
export { parseJsonReply, toGeneratedQuestions, toExplanation, toFollowUpAnswer } from './parse';
