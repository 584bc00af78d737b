/**
 * Trial Ledger
 * Tracks trial starts, outcomes and success counts across a run
 */

import { FailureKind, TrialKind, TrialReport } from "./types";

export interface TrialLogEntry {
  timestamp: string;
  type: "trial_started" | "trial_passed" | "trial_failed";
  trial: string;
  details: Record<string, unknown>;
}

export interface TrialOutcome {
  kind: TrialKind;
  ok: boolean;
  successes: number;
  seed: number;
  failureKind?: FailureKind;
}

export class TrialLog {
  private entries: TrialLogEntry[] = [];
  private outcomes: Map<string, TrialOutcome[]> = new Map();

  recordStart(trial: string, kind: TrialKind, seed: number): void {
    this.entries.push({
      timestamp: new Date().toISOString(),
      type: "trial_started",
      trial,
      details: { kind, seed },
    });
  }

  /**
   * Record the report a trial concluded with
   */
  recordReport(report: TrialReport): void {
    const outcome: TrialOutcome = {
      kind: report.kind,
      ok: report.ok,
      successes: report.successes,
      seed: report.seed,
    };
    if (!report.ok) {
      outcome.failureKind = report.failure.kind;
    }

    const history = this.outcomes.get(report.name) ?? [];
    history.push(outcome);
    this.outcomes.set(report.name, history);

    this.entries.push({
      timestamp: new Date().toISOString(),
      type: report.ok ? "trial_passed" : "trial_failed",
      trial: report.name,
      details: report.ok
        ? { kind: report.kind, successes: report.successes }
        : { kind: report.kind, successes: report.successes, failureKind: report.failure.kind },
    });
  }

  getEntries(): TrialLogEntry[] {
    return [...this.entries];
  }

  getOutcomes(trial: string): TrialOutcome[] {
    return this.outcomes.get(trial) || [];
  }

  getSummary(): {
    totalEntries: number;
    totalTrials: number;
    passed: number;
    failed: number;
    totalSuccesses: number;
    successRate: number;
  } {
    const outcomes = Array.from(this.outcomes.values()).flat();
    const passed = outcomes.filter(outcome => outcome.ok).length;
    const total = outcomes.length;

    return {
      totalEntries: this.entries.length,
      totalTrials: total,
      passed,
      failed: total - passed,
      totalSuccesses: outcomes.reduce((sum, outcome) => sum + outcome.successes, 0),
      successRate: total > 0 ? passed / total : 0,
    };
  }

  toJSON(): {
    entries: TrialLogEntry[];
    outcomes: Record<string, TrialOutcome[]>;
  } {
    const outcomes: Record<string, TrialOutcome[]> = {};
    for (const [key, value] of this.outcomes) {
      outcomes[key] = value;
    }
    return { entries: this.entries, outcomes };
  }

  clear(): void {
    this.entries = [];
    this.outcomes.clear();
  }
}

/**
 * Global trial log instance
 */
export const globalTrialLog = new TrialLog();
