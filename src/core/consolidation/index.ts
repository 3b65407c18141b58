export {
  AnswerConsolidator,
  getAnswerConsolidator,
  cleanConsolidatedAnswer,
  toVerificationLabel,
  transcript,
  MAX_FINAL_ANSWER_LENGTH,
  VERIFICATION_LABELS,
  type VerificationLabel,
} from './service.js';
