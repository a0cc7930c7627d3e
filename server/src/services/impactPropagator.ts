/**
 * Impact propagation: Which direct successors are pushed by an activity's slip.
 * One hop only; the dependency graph is not walked transitively.
 */

import type { RelatedActivity } from '@delaylens/shared';
import type { ActivityRecord, ScheduleIndex } from './scheduleLoader.js';
import { drivingDate } from './dependencyTypes.js';

export interface DelayFlags {
  startDelayed: boolean;
  endDelayed: boolean;
}

/**
 * Return the successors of `activity` affected by its slip, in link order.
 * FS/FF successors are affected when the end slipped, SS/SF successors when the start slipped.
 * A successor missing from the updated snapshot is still reported, with an empty name.
 */
export function findImpactedSuccessors(
  activity: ActivityRecord,
  flags: DelayFlags,
  updated: ScheduleIndex,
): RelatedActivity[] {
  const impacted: RelatedActivity[] = [];

  for (const link of activity.successors) {
    const delayed = drivingDate(link.dependencyType) === 'end' ? flags.endDelayed : flags.startDelayed;
    if (!delayed) continue;

    impacted.push({
      taskCode: link.taskCode,
      taskName: updated.get(link.taskCode)?.taskName ?? '',
      dependencyType: link.dependencyType,
    });
  }

  return impacted;
}
