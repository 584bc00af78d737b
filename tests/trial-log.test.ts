import { describe, it, expect, beforeEach } from "@jest/globals";
import { TrialLog } from "../tooling/lib/trial-log";
import { TrialReport } from "../tooling/lib/types";

const passed: TrialReport = {
  ok: true,
  name: "sort satisfies its signature",
  kind: "conformance",
  successes: 100,
  seed: 42,
};

const failed: TrialReport = {
  ok: false,
  name: "divide properly rejects invalid input",
  kind: "robustness",
  successes: 3,
  seed: 42,
  failure: { kind: "invalid_input_accepted", message: "accepted", outputs: [0] },
};

describe("TrialLog", () => {
  let trialLog: TrialLog;

  beforeEach(() => {
    trialLog = new TrialLog();
  });

  it("should record trial starts", () => {
    trialLog.recordStart(passed.name, "conformance", 42);

    const entries = trialLog.getEntries();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      type: "trial_started",
      trial: passed.name,
      details: { kind: "conformance", seed: 42 },
    });
  });

  it("should record outcomes per trial", () => {
    trialLog.recordReport(passed);
    trialLog.recordReport(failed);

    expect(trialLog.getOutcomes(passed.name)).toEqual([
      { kind: "conformance", ok: true, successes: 100, seed: 42 },
    ]);
    expect(trialLog.getOutcomes(failed.name)).toEqual([
      { kind: "robustness", ok: false, successes: 3, seed: 42, failureKind: "invalid_input_accepted" },
    ]);
    expect(trialLog.getEntries().map((entry) => entry.type)).toEqual(["trial_passed", "trial_failed"]);
  });

  it("should return no outcomes for an unknown trial", () => {
    expect(trialLog.getOutcomes("unknown")).toEqual([]);
  });

  it("should summarise pass rate and successes", () => {
    trialLog.recordStart(passed.name, "conformance", 42);
    trialLog.recordReport(passed);
    trialLog.recordReport(failed);

    expect(trialLog.getSummary()).toEqual({
      totalEntries: 3,
      totalTrials: 2,
      passed: 1,
      failed: 1,
      totalSuccesses: 103,
      successRate: 0.5,
    });
  });

  it("should export and clear", () => {
    trialLog.recordReport(passed);
    const json = trialLog.toJSON();
    expect(json.entries).toHaveLength(1);
    expect(Object.keys(json.outcomes)).toEqual([passed.name]);

    trialLog.clear();
    expect(trialLog.getEntries()).toEqual([]);
    expect(trialLog.getSummary().totalTrials).toBe(0);
  });
});
