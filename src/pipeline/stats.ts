/**
 * Newsbrief — Run Statistics
 *
 * In-memory counters for the current process. Nothing is persisted; a
 * restart starts from zero.
 */

export type RunStatus = 'success' | 'failed' | 'test' | 'fetch_only' | 'dry_run';

export interface RunRecord {
  runId: string;
  status: RunStatus;
  startedAt: string;
  durationMs: number;
  articles: number;
  messagesSent: number;
  error?: string;
}

export interface StatsSummary {
  totalRuns: number;
  totalErrors: number;
  articlesProcessed: number;
  messagesSent: number;
  lastRun: RunRecord | null;
  /** Newest first */
  history: RunRecord[];
}

export const HISTORY_LIMIT = 50;

export class RunStats {
  private totalRuns = 0;
  private totalErrors = 0;
  private articlesProcessed = 0;
  private messagesSent = 0;
  private readonly history: RunRecord[] = [];

  constructor(private readonly historyLimit: number = HISTORY_LIMIT) {}

  recordRun(record: RunRecord): void {
    this.totalRuns++;
    if (record.status === 'failed') this.totalErrors++;
    this.articlesProcessed += record.articles;
    this.messagesSent += record.messagesSent;

    this.history.unshift(record);
    if (this.history.length > this.historyLimit) {
      this.history.length = this.historyLimit;
    }
  }

  summary(): StatsSummary {
    return {
      totalRuns: this.totalRuns,
      totalErrors: this.totalErrors,
      articlesProcessed: this.articlesProcessed,
      messagesSent: this.messagesSent,
      lastRun: this.history[0] ?? null,
      history: [...this.history],
    };
  }
}
