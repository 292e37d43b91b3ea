export {
  buildExplanationPrompt,
  buildFileAnalysisPrompt,
  formatElements,
  DEFAULT_SOURCE_FILE,
  NO_ELEMENTS_MESSAGE,
  type ExplanationPromptOptions,
} from './builder.js';
