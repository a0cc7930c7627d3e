import { describe, it, expect } from '@jest/globals';
import type { DelayAnalysisReport } from '@delaylens/shared';
import {
  formatDelay,
  formatShortDate,
  roundDays,
  renderConsoleSummary,
  renderJsonReport,
  renderMarkdownReport,
} from './reportRenderer.js';

// ─── Test helpers ─────────────────────────────────────────────────────────────

function makeReport(overrides: Partial<DelayAnalysisReport> = {}): DelayAnalysisReport {
  return {
    analysisInfo: {
      analysisDate: '2024-03-01T09:00:00.000Z',
      scope: 'critical',
      baselineSource: 'baseline.json',
      updatedSource: 'updated.json',
      criticalPathSource: 'critical_path.json',
      baselineProjectCode: 'PRJ-100',
      updatedProjectCode: 'PRJ-100-U1',
    },
    summary: { total: 3, delayed: 2, byItself: 1, byPredecessor: 1 },
    criticalPathImpact: {
      projectDelayDays: 2,
      terminalActivity: {
        taskCode: 'T200',
        taskName: 'Foundations',
        baselineEnd: '2024-01-20',
        updatedEnd: '2024-01-22',
      },
    },
    delayedActivities: [
      {
        taskCode: 'T100',
        taskName: 'Excavation',
        baselineStart: '2024-01-01T08:00:00Z',
        baselineEnd: '2024-01-10T17:00:00Z',
        updatedStart: '2024-01-01T08:00:00Z',
        updatedEnd: '2024-01-15T17:00:00Z',
        startDelayDays: 0,
        endDelayDays: 5,
        delayReason: 'by_itself',
        causingPredecessors: [],
        impactedSuccessors: [
          { taskCode: 'T200', taskName: 'Foundations', dependencyType: 'FS' },
          { taskCode: 'T999', taskName: '', dependencyType: 'FS' },
        ],
      },
      {
        taskCode: 'T200',
        taskName: 'Foundations',
        baselineStart: '2024-01-11',
        baselineEnd: '2024-01-20',
        updatedStart: '2024-01-16',
        updatedEnd: '2024-01-22',
        startDelayDays: 5,
        endDelayDays: 2,
        delayReason: 'by_predecessor',
        causingPredecessors: [{ taskCode: 'T100', taskName: 'Excavation', dependencyType: 'FS' }],
        impactedSuccessors: [],
      },
    ],
    loadWarnings: [],
    ...overrides,
  };
}

function emptyReport(): DelayAnalysisReport {
  return makeReport({
    summary: { total: 0, delayed: 0, byItself: 0, byPredecessor: 0 },
    criticalPathImpact: null,
    delayedActivities: [],
  });
}

// ─── Formatting helpers ───────────────────────────────────────────────────────

describe('formatting helpers', () => {
  it('rounds days to one decimal', () => {
    expect(roundDays(1 / 3)).toBe(0.3);
    expect(roundDays(4.96)).toBe(5);
  });

  it('rounds halves away from zero in both directions', () => {
    expect(roundDays(0.25)).toBe(0.3);
    expect(roundDays(-0.25)).toBe(-0.3);
    expect(roundDays(-0.04)).toBe(0);
    expect(formatDelay(-0.25)).toBe('-0.3 days');
    expect(formatDelay(0.25)).toBe('+0.3 days');
  });

  it('formats delays with a sign and one decimal', () => {
    expect(formatDelay(5)).toBe('+5.0 days');
    expect(formatDelay(0)).toBe('0.0 days');
    expect(formatDelay(-1.5)).toBe('-1.5 days');
    expect(formatDelay(-0.04)).toBe('0.0 days');
  });

  it('emphasises positive delays only when asked', () => {
    expect(formatDelay(5, true)).toBe('**+5.0 days**');
    expect(formatDelay(-2, true)).toBe('-2.0 days');
  });

  it('shortens known dates and shows N/A for unknown ones', () => {
    expect(formatShortDate('2024-01-10T08:00:00Z')).toBe('2024-01-10');
    expect(formatShortDate('2024-01-10')).toBe('2024-01-10');
    expect(formatShortDate(null)).toBe('N/A');
    expect(formatShortDate('TBD')).toBe('N/A');
  });
});

// ─── JSON ─────────────────────────────────────────────────────────────────────

describe('renderJsonReport', () => {
  it('renders the report as indented JSON with a trailing newline', () => {
    const json = renderJsonReport(makeReport());

    expect(json.endsWith('}\n')).toBe(true);
    expect(json.startsWith('{\n  "analysisInfo": {\n')).toBe(true);
    expect(JSON.parse(json)).toEqual(makeReport());
  });

  it('rounds delay values to one decimal', () => {
    const base = makeReport();
    const report = makeReport({
      criticalPathImpact: base.criticalPathImpact && {
        ...base.criticalPathImpact,
        projectDelayDays: 2 / 3,
      },
      delayedActivities: [{ ...base.delayedActivities[0], startDelayDays: 0.04, endDelayDays: 4.96 }],
    });

    const parsed: DelayAnalysisReport = JSON.parse(renderJsonReport(report));

    expect(parsed.criticalPathImpact?.projectDelayDays).toBe(0.7);
    expect(parsed.delayedActivities[0].startDelayDays).toBe(0);
    expect(parsed.delayedActivities[0].endDelayDays).toBe(5);
  });

  it('keeps a missing critical path impact as null', () => {
    expect(JSON.parse(renderJsonReport(emptyReport())).criticalPathImpact).toBeNull();
  });
});

// ─── Markdown ─────────────────────────────────────────────────────────────────

describe('renderMarkdownReport', () => {
  const lines = renderMarkdownReport(makeReport()).split('\n');

  it('renders the header and summary for the critical scope', () => {
    expect(lines.slice(0, 7)).toEqual([
      '# Schedule Delay Analysis Report',
      '',
      '**Project**: PRJ-100-U1',
      '**Analysis Date**: 2024-03-01',
      '**Scope**: Critical path activities',
      '**Baseline**: baseline.json (PRJ-100)',
      '**Updated**: updated.json (PRJ-100-U1)',
    ]);
    expect(lines).toContain('| Critical Path Activities | 3 |');
    expect(lines).toContain('| Delayed Activities | 2 |');
    expect(lines).toContain('| Delayed by Itself | 1 |');
    expect(lines).toContain('| Delayed by Predecessor | 1 |');
  });

  it('labels the summary for the all scope', () => {
    const report = makeReport();
    const allLines = renderMarkdownReport({
      ...report,
      analysisInfo: { ...report.analysisInfo, scope: 'all' },
    }).split('\n');

    expect(allLines).toContain('**Scope**: All activities common to both schedules');
    expect(allLines).toContain('| Common Activities | 3 |');
  });

  it('renders the schedule impact row', () => {
    expect(lines).toContain('| `T200` - Foundations | 2024-01-20 | 2024-01-22 | **+2.0 days** |');
  });

  it('renders a self-delayed activity without causes', () => {
    const start = lines.indexOf('### 1. T100 - Excavation');

    expect(lines.slice(start, start + 13)).toEqual([
      '### 1. T100 - Excavation',
      '',
      '| | Baseline | Updated | Delay |',
      '|--|----------|---------|-------|',
      '| Start | 2024-01-01 | 2024-01-01 | 0.0 days |',
      '| End | 2024-01-10 | 2024-01-15 | **+5.0 days** |',
      '',
      '**Impacted Successors:**',
      '- `T200` - Foundations (FS)',
      '- `T999` (FS)',
      '',
      '---',
      '',
    ]);
  });

  it('renders a predecessor-delayed activity with its causes', () => {
    const start = lines.indexOf('### 1. T200 - Foundations');

    expect(lines.slice(start, start + 13)).toEqual([
      '### 1. T200 - Foundations',
      '',
      '| | Baseline | Updated | Delay |',
      '|--|----------|---------|-------|',
      '| Start | 2024-01-11 | 2024-01-16 | **+5.0 days** |',
      '| End | 2024-01-20 | 2024-01-22 | **+2.0 days** |',
      '',
      '**Caused By:**',
      '- `T100` - Excavation (FS)',
      '',
      '**Impacted Successors:** None',
      '',
      '---',
    ]);
  });

  it('lists every delayed activity in the appendix', () => {
    expect(lines).toContain('| T100 | Excavation | by_itself | 0.0 days | +5.0 days |');
    expect(lines).toContain('| T200 | Foundations | by_predecessor | +5.0 days | +2.0 days |');
  });

  it('truncates long names and escapes pipes in the appendix', () => {
    const report = makeReport();
    const [first, second] = report.delayedActivities;
    const markdown = renderMarkdownReport({
      ...report,
      delayedActivities: [
        { ...first, taskName: 'A'.repeat(60) },
        { ...second, taskName: 'Pour | cure' },
      ],
    });
    const appendix = markdown.split('\n');

    expect(appendix).toContain(`| T100 | ${'A'.repeat(47)}... | by_itself | 0.0 days | +5.0 days |`);
    expect(appendix).toContain('| T200 | Pour \\| cure | by_predecessor | +5.0 days | +2.0 days |');
  });

  it('renders placeholders for an empty report', () => {
    const emptyLines = renderMarkdownReport(emptyReport()).split('\n');

    expect(emptyLines).toContain('*No schedule-level impact could be computed.*');
    expect(emptyLines).toContain('*No activities delayed by itself.*');
    expect(emptyLines).toContain('*No activities delayed by predecessor.*');
    expect(emptyLines).toContain('*No delayed activities.*');
  });

  it('lists load warnings when present', () => {
    const markdown = renderMarkdownReport(
      makeReport({
        loadWarnings: [{ source: 'baseline.json', message: 'Ignored 2 activities without a task_code' }],
      }),
    );

    expect(markdown.endsWith(
      '## Load Warnings\n\n- baseline.json: Ignored 2 activities without a task_code\n',
    )).toBe(true);
  });

  it('ends with a newline', () => {
    expect(renderMarkdownReport(makeReport()).endsWith('\n')).toBe(true);
    expect(lines).not.toContain('## Load Warnings');
  });
});

// ─── Console ──────────────────────────────────────────────────────────────────

describe('renderConsoleSummary', () => {
  const rule = '='.repeat(50);

  it('prints the counts and the project delay', () => {
    expect(renderConsoleSummary(makeReport())).toBe(
      [
        rule,
        'ANALYSIS SUMMARY',
        rule,
        'Critical Path Activities: 3',
        'Delayed Activities:       2',
        '  - By Itself:            1',
        '  - By Predecessor:       1',
        'Project Delay:            +2.0 days (terminal T200)',
        rule,
        '',
      ].join('\n'),
    );
  });

  it('shows N/A when the project delay is not computable', () => {
    const report = emptyReport();
    const summary = renderConsoleSummary({
      ...report,
      analysisInfo: { ...report.analysisInfo, scope: 'all' },
    }).split('\n');

    expect(summary).toContain('Common Activities:        0');
    expect(summary).toContain('Project Delay:            N/A');
  });
});
