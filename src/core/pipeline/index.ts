export {
  PipelineService,
  getPipelineService,
  questionSchema,
  EARLY_STOP_MODEL,
  type PipelineOptions,
  type PipelineStages,
} from './service.js';
