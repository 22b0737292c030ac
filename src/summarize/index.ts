/**
 * Newsbrief — Summarize Module
 */

export {
  LlmSummarizer,
  BasicSummarizer,
  NOTHING_NOTABLE_MESSAGE,
  createAnthropicCompletion,
  buildUserPrompt,
  countArticles,
  topicNameMap,
  type Summarizer,
  type CompletionFn,
  type CompletionRequest,
  type AnthropicCompletionConfig,
  type LlmSummarizerDeps,
} from './summarizer';
