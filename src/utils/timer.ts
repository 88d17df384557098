/**
 * Execution Timer Utility
 * Tracks execution phases of a graph run and per-operation step totals
 */

import { createChildLogger, type Logger } from './logger.js';

/** Default threshold in ms for logging slow phases */
const DEFAULT_SLOW_THRESHOLD_MS = 1000;

/** Operations listed in the summary log */
const SUMMARY_OPERATION_LIMIT = 10;

export interface TimingEntry {
  name: string;
  startTime: number;
  endTime?: number;
  durationMs?: number;
}

export interface PhaseSummary {
  phase: string;
  durationMs: number;
  durationFormatted: string;
}

export interface OperationSummary {
  name: string;
  count: number;
  totalMs: number;
  avgMs: number;
  maxMs: number;
}

export interface ExecutionSummary {
  runId: string;
  totalDurationMs: number;
  totalDurationFormatted: string;
  phases: PhaseSummary[];
  operationTotals: OperationSummary[];
}

export interface TimerOptions {
  /** Threshold in ms above which a phase is logged as slow (default: 1000) */
  slowThresholdMs?: number;
  logger?: Logger;
}

/**
 * Format milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Execution Timer - tracks the phases of one engine run
 */
export class ExecutionTimer {
  private runId: string;
  private runStart: number;
  private currentPhase: string | null = null;
  private phases: Map<string, TimingEntry> = new Map();
  private operations: Map<string, OperationSummary> = new Map();
  private slowThresholdMs: number;
  private logger: Logger;

  constructor(runId: string, options: TimerOptions = {}) {
    this.runId = runId;
    this.runStart = Date.now();
    this.slowThresholdMs = options.slowThresholdMs ?? DEFAULT_SLOW_THRESHOLD_MS;
    this.logger = options.logger ?? createChildLogger({ service: 'timer' });
  }

  /**
   * Start timing a phase, ending the previous one
   */
  startPhase(phase: string): void {
    if (this.currentPhase) {
      this.endPhase();
    }

    this.currentPhase = phase;
    this.phases.set(phase, { name: phase, startTime: Date.now() });
    this.logger.debug({ runId: this.runId, phase }, `Phase started: ${phase}`);
  }

  /**
   * End timing the current phase
   */
  endPhase(): void {
    if (!this.currentPhase) return;

    const entry = this.phases.get(this.currentPhase);
    if (entry) {
      entry.endTime = Date.now();
      entry.durationMs = entry.endTime - entry.startTime;

      const level = entry.durationMs > this.slowThresholdMs ? 'info' : 'debug';
      this.logger[level](
        {
          runId: this.runId,
          phase: this.currentPhase,
          durationMs: entry.durationMs,
          duration: formatDuration(entry.durationMs),
        },
        `Phase completed: ${this.currentPhase} (${formatDuration(entry.durationMs)})`
      );
    }

    this.currentPhase = null;
  }

  /**
   * Record the step totals of one operation
   */
  recordOperation(name: string, count: number, totalMs: number, maxMs: number): void {
    this.operations.set(name, {
      name,
      count,
      totalMs,
      avgMs: count > 0 ? Math.round(totalMs / count) : 0,
      maxMs,
    });
  }

  /**
   * Get summary of all timings
   */
  getSummary(): ExecutionSummary {
    if (this.currentPhase) {
      this.endPhase();
    }

    const totalDurationMs = Date.now() - this.runStart;

    const phases: PhaseSummary[] = [];
    for (const [phase, entry] of this.phases) {
      if (entry.durationMs !== undefined) {
        phases.push({
          phase,
          durationMs: entry.durationMs,
          durationFormatted: formatDuration(entry.durationMs),
        });
      }
    }

    // Busiest operations first
    const operationTotals = [...this.operations.values()].sort((a, b) => b.totalMs - a.totalMs);

    return {
      runId: this.runId,
      totalDurationMs,
      totalDurationFormatted: formatDuration(totalDurationMs),
      phases,
      operationTotals,
    };
  }

  /**
   * Log the final summary
   */
  logSummary(): ExecutionSummary {
    const summary = this.getSummary();

    this.logger.info(
      {
        runId: this.runId,
        totalDuration: summary.totalDurationFormatted,
        totalDurationMs: summary.totalDurationMs,
      },
      `Execution finished in ${summary.totalDurationFormatted}`
    );

    const topOperations = summary.operationTotals
      .filter((o) => o.count > 0)
      .slice(0, SUMMARY_OPERATION_LIMIT);
    if (topOperations.length > 0) {
      const breakdown = topOperations.map(
        (o) => `${o.name}: ${o.count}x @ avg ${formatDuration(o.avgMs)} (total: ${formatDuration(o.totalMs)})`
      );
      this.logger.debug(
        { runId: this.runId, operations: topOperations },
        `Top operations:\n    ${breakdown.join('\n    ')}`
      );
    }

    return summary;
  }
}
