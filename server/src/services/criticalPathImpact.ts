/**
 * Critical path impact: The schedule-level slip, read from the terminal activity.
 *
 * The terminal activity is the critical path activity with the latest updated finish: the
 * project cannot finish before it does. Ties go to the smallest task code.
 */

import type { CriticalPathImpact } from '@delaylens/shared';
import type { ActivityRecord, ScheduleIndex } from './scheduleLoader.js';
import { compareTaskCodes } from './delayAnalyzer.js';
import { delayDays } from './scheduleDates.js';

function findTerminalActivity(
  criticalTaskCodes: ReadonlySet<string>,
  updated: ScheduleIndex,
): ActivityRecord | null {
  let terminal: ActivityRecord | null = null;
  let terminalEnd = 0;

  for (const taskCode of criticalTaskCodes) {
    const activity = updated.get(taskCode);
    if (!activity?.end) continue;

    const end = activity.end.getTime();
    if (
      !terminal ||
      end > terminalEnd ||
      (end === terminalEnd && compareTaskCodes(taskCode, terminal.taskCode) < 0)
    ) {
      terminal = activity;
      terminalEnd = end;
    }
  }

  return terminal;
}

/**
 * Compute how far the terminal activity's finish moved between the snapshots.
 * Returns null when no critical activity has a known updated finish, or when the terminal
 * activity has no baseline record or no known baseline finish.
 */
export function computeCriticalPathImpact(
  criticalTaskCodes: ReadonlySet<string>,
  baseline: ScheduleIndex,
  updated: ScheduleIndex,
): CriticalPathImpact | null {
  const terminal = findTerminalActivity(criticalTaskCodes, updated);
  if (!terminal) return null;

  const before = baseline.get(terminal.taskCode);
  if (!before) return null;

  const projectDelayDays = delayDays(before.end, terminal.end);
  if (projectDelayDays === null) return null;

  return {
    projectDelayDays,
    terminalActivity: {
      taskCode: terminal.taskCode,
      taskName: terminal.taskName,
      baselineEnd: before.plannedEndDate,
      updatedEnd: terminal.plannedEndDate,
    },
  };
}
