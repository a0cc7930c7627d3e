import { describe, it, expect } from '@jest/globals';
import { computeCriticalPathImpact } from './criticalPathImpact.js';
import { activity, scheduleIndex } from '../test/activityBuilders.js';

describe('Critical Path Impact Calculator', () => {
  it('measures the slip of the critical activity that finishes last', () => {
    const baseline = scheduleIndex(
      activity('A', { end: '2024-01-08' }),
      activity('B', { name: 'Handover', end: '2024-01-12' }),
    );
    const updated = scheduleIndex(
      activity('A', { end: '2024-01-10' }),
      activity('B', { name: 'Handover', end: '2024-01-15' }),
    );

    expect(computeCriticalPathImpact(new Set(['A', 'B']), baseline, updated)).toEqual({
      projectDelayDays: 3,
      terminalActivity: {
        taskCode: 'B',
        taskName: 'Handover',
        baselineEnd: '2024-01-12',
        updatedEnd: '2024-01-15',
      },
    });
  });

  it('breaks ties on the latest finish by the smallest task code', () => {
    const baseline = scheduleIndex(
      activity('A', { end: '2024-01-30' }),
      activity('C', { end: '2024-01-25' }),
    );
    const updated = scheduleIndex(
      activity('C', { end: '2024-02-01' }),
      activity('A', { end: '2024-02-01' }),
    );

    const impact = computeCriticalPathImpact(new Set(['C', 'A']), baseline, updated);

    expect(impact?.terminalActivity.taskCode).toBe('A');
    expect(impact?.projectDelayDays).toBe(2);
  });

  it('ignores activities outside the critical path', () => {
    const baseline = scheduleIndex(activity('A', { end: '2024-01-10' }), activity('Z', { end: '2024-01-01' }));
    const updated = scheduleIndex(activity('A', { end: '2024-01-11' }), activity('Z', { end: '2024-06-01' }));

    expect(computeCriticalPathImpact(new Set(['A']), baseline, updated)?.terminalActivity.taskCode).toBe(
      'A',
    );
  });

  it('reports a negative delay when the finish moved earlier', () => {
    const baseline = scheduleIndex(activity('A', { end: '2024-01-10' }));
    const updated = scheduleIndex(activity('A', { end: '2024-01-08' }));

    expect(computeCriticalPathImpact(new Set(['A']), baseline, updated)?.projectDelayDays).toBe(-2);
  });

  it('returns null when no critical activity has a known updated finish', () => {
    const baseline = scheduleIndex(activity('A', { end: '2024-01-10' }));
    const updated = scheduleIndex(activity('A', { end: 'TBD' }));

    expect(computeCriticalPathImpact(new Set(['A', 'MISSING']), baseline, updated)).toBeNull();
    expect(computeCriticalPathImpact(new Set(), baseline, updated)).toBeNull();
  });

  it('returns null when the terminal activity has no baseline record', () => {
    const baseline = scheduleIndex(activity('A', { end: '2024-01-10' }));
    const updated = scheduleIndex(activity('A', { end: '2024-01-10' }), activity('NEW', { end: '2024-03-01' }));

    expect(computeCriticalPathImpact(new Set(['A', 'NEW']), baseline, updated)).toBeNull();
  });

  it('returns null when the terminal activity has no known baseline finish', () => {
    const baseline = scheduleIndex(activity('A', { end: null }));
    const updated = scheduleIndex(activity('A', { end: '2024-01-10' }));

    expect(computeCriticalPathImpact(new Set(['A']), baseline, updated)).toBeNull();
  });
});
