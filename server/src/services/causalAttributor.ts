/**
 * Causal attribution: Decides which predecessors explain an activity's slip.
 *
 * A predecessor counts as causing when it slipped on the date that drives its link:
 * its finish for FS and FF links, its start for SS and SF links. Magnitudes are not
 * compared and float is not considered, so this is a heuristic classification rather than
 * a proof of causality. An activity can have any number of causing predecessors.
 */

import type { RelatedActivity } from '@delaylens/shared';
import type { ActivityRecord, ScheduleIndex } from './scheduleLoader.js';
import { drivingDate } from './dependencyTypes.js';
import { isDelayed } from './scheduleDates.js';

/**
 * Return every predecessor of `activity` (from the updated snapshot) that slipped on its
 * driving date, in link order. Predecessors missing from either snapshot are skipped.
 */
export function findCausingPredecessors(
  activity: ActivityRecord,
  baseline: ScheduleIndex,
  updated: ScheduleIndex,
): RelatedActivity[] {
  const causing: RelatedActivity[] = [];

  for (const link of activity.predecessors) {
    const baselinePred = baseline.get(link.taskCode);
    const updatedPred = updated.get(link.taskCode);
    if (!baselinePred || !updatedPred) continue;

    const slipped =
      drivingDate(link.dependencyType) === 'end'
        ? isDelayed(baselinePred.end, updatedPred.end)
        : isDelayed(baselinePred.start, updatedPred.start);

    if (slipped) {
      causing.push({
        taskCode: link.taskCode,
        taskName: updatedPred.taskName,
        dependencyType: link.dependencyType,
      });
    }
  }

  return causing;
}
