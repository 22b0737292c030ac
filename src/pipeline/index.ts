/**
 * Newsbrief — Pipeline Module
 */

export {
  runDailyBrief,
  TEST_MESSAGE,
  type RunMode,
  type RunResult,
  type PipelineDeps,
  type TopicRunSummary,
} from './run';

export { RunStats, HISTORY_LIMIT, type RunRecord, type RunStatus, type StatsSummary } from './stats';
