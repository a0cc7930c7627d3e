/**
 * Report rendering: The same DelayAnalysisReport as machine-readable JSON, as a Markdown
 * narrative, and as the short plain-text summary printed by the CLI.
 *
 * Delay values are rounded to one decimal here and only here; the analysis records keep
 * full precision.
 */

import type {
  CriticalPathImpact,
  DelayAnalysisRecord,
  DelayAnalysisReport,
  RelatedActivity,
  ReportScope,
} from '@delaylens/shared';
import { TASK_NAME_MAX_LENGTH } from '../constants.js';
import { parseScheduleDate } from './scheduleDates.js';

// ─── Formatting helpers ───────────────────────────────────────────────────────

/**
 * One decimal, half away from zero, so a slip and a gain of the same size display alike.
 */
export function roundDays(value: number): number {
  const rounded = Math.round(Math.abs(value) * 10) / 10;
  // Adding 0 turns -0 into 0
  return (value < 0 ? -rounded : rounded) + 0;
}

/**
 * "+5.0 days", "0.0 days", "-1.5 days". Positive delays are bold when `emphasize` is set.
 */
export function formatDelay(value: number, emphasize = false): string {
  const rounded = roundDays(value);
  const text = `${rounded > 0 ? '+' : ''}${rounded.toFixed(1)} days`;
  return emphasize && rounded > 0 ? `**${text}**` : text;
}

/**
 * The calendar-date part of an exported date, or N/A when the date is unknown.
 */
export function formatShortDate(value: string | null): string {
  if (value === null || !parseScheduleDate(value)) return 'N/A';
  return value.trim().slice(0, 10);
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

function truncateName(name: string): string {
  return name.length > TASK_NAME_MAX_LENGTH
    ? `${name.slice(0, TASK_NAME_MAX_LENGTH - 3)}...`
    : name;
}

function scopeCountLabel(scope: ReportScope): string {
  return scope === 'critical' ? 'Critical Path Activities' : 'Common Activities';
}

function scopeDescription(scope: ReportScope): string {
  return scope === 'critical' ? 'Critical path activities' : 'All activities common to both schedules';
}

// ─── JSON ─────────────────────────────────────────────────────────────────────

function roundRecord(record: DelayAnalysisRecord): DelayAnalysisRecord {
  return {
    ...record,
    startDelayDays: roundDays(record.startDelayDays),
    endDelayDays: roundDays(record.endDelayDays),
  };
}

function roundImpact(impact: CriticalPathImpact | null): CriticalPathImpact | null {
  return impact && { ...impact, projectDelayDays: roundDays(impact.projectDelayDays) };
}

export function renderJsonReport(report: DelayAnalysisReport): string {
  const rounded: DelayAnalysisReport = {
    ...report,
    criticalPathImpact: roundImpact(report.criticalPathImpact),
    delayedActivities: report.delayedActivities.map(roundRecord),
  };
  return `${JSON.stringify(rounded, null, 2)}\n`;
}

// ─── Markdown ─────────────────────────────────────────────────────────────────

function renderRelated(activity: RelatedActivity): string {
  const name = activity.taskName ? ` - ${activity.taskName}` : '';
  return `- \`${activity.taskCode}\`${name} (${activity.dependencyType})`;
}

function renderActivity(record: DelayAnalysisRecord, position: number, withCauses: boolean): string[] {
  const lines = [
    `### ${position}. ${record.taskCode} - ${record.taskName}`,
    '',
    '| | Baseline | Updated | Delay |',
    '|--|----------|---------|-------|',
    `| Start | ${formatShortDate(record.baselineStart)} | ${formatShortDate(record.updatedStart)} | ${formatDelay(record.startDelayDays, true)} |`,
    `| End | ${formatShortDate(record.baselineEnd)} | ${formatShortDate(record.updatedEnd)} | ${formatDelay(record.endDelayDays, true)} |`,
    '',
  ];

  if (withCauses && record.causingPredecessors.length > 0) {
    lines.push('**Caused By:**', ...record.causingPredecessors.map(renderRelated), '');
  }

  if (record.impactedSuccessors.length > 0) {
    lines.push('**Impacted Successors:**', ...record.impactedSuccessors.map(renderRelated));
  } else {
    lines.push('**Impacted Successors:** None');
  }
  lines.push('', '---', '');
  return lines;
}

function renderImpact(impact: CriticalPathImpact | null): string[] {
  if (!impact) {
    return ['*No schedule-level impact could be computed.*', ''];
  }
  const { terminalActivity } = impact;
  return [
    '| Terminal Activity | Baseline Finish | Updated Finish | Project Delay |',
    '|-------------------|-----------------|----------------|---------------|',
    `| \`${terminalActivity.taskCode}\` - ${escapeCell(terminalActivity.taskName)} | ${formatShortDate(terminalActivity.baselineEnd)} | ${formatShortDate(terminalActivity.updatedEnd)} | ${formatDelay(impact.projectDelayDays, true)} |`,
    '',
  ];
}

export function renderMarkdownReport(report: DelayAnalysisReport): string {
  const { analysisInfo: info, summary } = report;
  const byItself = report.delayedActivities.filter((a) => a.delayReason === 'by_itself');
  const byPredecessor = report.delayedActivities.filter((a) => a.delayReason === 'by_predecessor');

  const lines = [
    '# Schedule Delay Analysis Report',
    '',
    `**Project**: ${info.updatedProjectCode || 'N/A'}`,
    `**Analysis Date**: ${info.analysisDate.slice(0, 10)}`,
    `**Scope**: ${scopeDescription(info.scope)}`,
    `**Baseline**: ${info.baselineSource} (${info.baselineProjectCode})`,
    `**Updated**: ${info.updatedSource} (${info.updatedProjectCode})`,
    '',
    '---',
    '',
    '## Summary',
    '',
    '| Metric | Count |',
    '|--------|-------|',
    `| ${scopeCountLabel(info.scope)} | ${summary.total} |`,
    `| Delayed Activities | ${summary.delayed} |`,
    `| Delayed by Itself | ${summary.byItself} |`,
    `| Delayed by Predecessor | ${summary.byPredecessor} |`,
    '',
    '---',
    '',
    '## Schedule Impact',
    '',
    ...renderImpact(report.criticalPathImpact),
    '---',
    '',
    '## Delays by Itself (Action Required)',
    '',
    'These activities are the source of delays - no predecessor can explain their slippage.',
    '',
  ];

  if (byItself.length === 0) {
    lines.push('*No activities delayed by itself.*', '');
  } else {
    byItself.forEach((record, i) => lines.push(...renderActivity(record, i + 1, false)));
  }

  lines.push(
    '## Delays by Predecessor',
    '',
    'These activities are delayed due to upstream dependencies. A predecessor is listed when it',
    'slipped on the date that drives the link; the size of its slip is not compared.',
    '',
  );

  if (byPredecessor.length === 0) {
    lines.push('*No activities delayed by predecessor.*', '');
  } else {
    byPredecessor.forEach((record, i) => lines.push(...renderActivity(record, i + 1, true)));
  }

  lines.push('## Appendix: All Delayed Activities', '');
  if (report.delayedActivities.length === 0) {
    lines.push('*No delayed activities.*', '');
  } else {
    lines.push(
      '| Task Code | Task Name | Delay Reason | Start Delay | End Delay |',
      '|-----------|-----------|--------------|-------------|-----------|',
      ...report.delayedActivities.map(
        (record) =>
          `| ${record.taskCode} | ${escapeCell(truncateName(record.taskName))} | ${record.delayReason} | ${formatDelay(record.startDelayDays)} | ${formatDelay(record.endDelayDays)} |`,
      ),
      '',
    );
  }

  if (report.loadWarnings.length > 0) {
    lines.push(
      '## Load Warnings',
      '',
      ...report.loadWarnings.map((warning) => `- ${warning.source}: ${warning.message}`),
      '',
    );
  }

  return lines.join('\n');
}

// ─── Console ──────────────────────────────────────────────────────────────────

const RULE = '='.repeat(50);
const LABEL_WIDTH = 26;

function summaryLine(label: string, value: string | number): string {
  return `${label.padEnd(LABEL_WIDTH)}${value}`;
}

export function renderConsoleSummary(report: DelayAnalysisReport): string {
  const { summary, criticalPathImpact: impact } = report;
  const projectDelay = impact
    ? `${formatDelay(impact.projectDelayDays)} (terminal ${impact.terminalActivity.taskCode})`
    : 'N/A';

  return [
    RULE,
    'ANALYSIS SUMMARY',
    RULE,
    summaryLine(`${scopeCountLabel(report.analysisInfo.scope)}:`, summary.total),
    summaryLine('Delayed Activities:', summary.delayed),
    summaryLine('  - By Itself:', summary.byItself),
    summaryLine('  - By Predecessor:', summary.byPredecessor),
    summaryLine('Project Delay:', projectDelay),
    RULE,
    '',
  ].join('\n');
}
