/**
 * Delay analyzer: Compares the activities of a baseline and an updated snapshot and
 * produces one record per delayed activity.
 *
 * Pure: no I/O, no shared state. Each record depends only on the two indexes, so the
 * output for a given candidate set is fully determined by its inputs.
 */

import type { DelayAnalysisRecord, DelaySummary, ReportScope } from '@delaylens/shared';
import type { ScheduleIndex } from './scheduleLoader.js';
import { delayDays, isDelayed } from './scheduleDates.js';
import { findCausingPredecessors } from './causalAttributor.js';
import { findImpactedSuccessors } from './impactPropagator.js';

/**
 * Code-unit order. Locale-independent so that output is reproducible everywhere.
 */
export function compareTaskCodes(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Task codes to analyze for a report scope, sorted by task code.
 *
 * `all` yields the codes present in both snapshots. `critical` yields the critical path
 * codes as given; codes missing from a snapshot are dropped later by analyzeDelays.
 */
export function selectCandidates(
  scope: ReportScope,
  baseline: ScheduleIndex,
  updated: ScheduleIndex,
  criticalTaskCodes: ReadonlySet<string>,
): string[] {
  const codes =
    scope === 'all'
      ? [...baseline.keys()].filter((code) => updated.has(code))
      : [...criticalTaskCodes];
  return codes.sort(compareTaskCodes);
}

/**
 * Analyze each candidate in order. Activities whose start and end both held (or are
 * unknown) produce no record.
 */
export function analyzeDelays(
  candidates: Iterable<string>,
  baseline: ScheduleIndex,
  updated: ScheduleIndex,
): DelayAnalysisRecord[] {
  const records: DelayAnalysisRecord[] = [];

  for (const taskCode of candidates) {
    const before = baseline.get(taskCode);
    const after = updated.get(taskCode);
    // Only in baseline: removed scope. Only in updated: new scope. Neither is a delay.
    if (!before || !after) continue;

    const startDelayed = isDelayed(before.start, after.start);
    const endDelayed = isDelayed(before.end, after.end);
    if (!startDelayed && !endDelayed) continue;

    const causingPredecessors = findCausingPredecessors(after, baseline, updated);

    records.push({
      taskCode,
      taskName: after.taskName,
      baselineStart: before.plannedStartDate,
      baselineEnd: before.plannedEndDate,
      updatedStart: after.plannedStartDate,
      updatedEnd: after.plannedEndDate,
      startDelayDays: delayDays(before.start, after.start) ?? 0,
      endDelayDays: delayDays(before.end, after.end) ?? 0,
      // Any slipped predecessor reclassifies the whole delay, whatever its size.
      delayReason: causingPredecessors.length > 0 ? 'by_predecessor' : 'by_itself',
      causingPredecessors,
      impactedSuccessors: findImpactedSuccessors(after, { startDelayed, endDelayed }, updated),
    });
  }

  return records;
}

export function summarizeDelays(records: readonly DelayAnalysisRecord[], total: number): DelaySummary {
  const byItself = records.filter((record) => record.delayReason === 'by_itself').length;
  return {
    total,
    delayed: records.length,
    byItself,
    byPredecessor: records.length - byItself,
  };
}
