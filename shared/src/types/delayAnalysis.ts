/**
 * Delay analysis types - the report produced by comparing a baseline schedule with an
 * updated snapshot. Shared by the HTTP API, the CLI and the report renderers.
 */
import type { DependencyType } from './dependency.js';
import type { CriticalPathDocument, ScheduleDocument } from './schedule.js';

/**
 * Which activities a report covers.
 * - `critical`: activities on the precomputed critical path
 * - `all`: every activity present in both snapshots
 */
export type ReportScope = 'critical' | 'all';

/**
 * Classification of a delay. `by_predecessor` means at least one predecessor slipped on the
 * date that drives its link; magnitudes are not compared, so this is a heuristic.
 */
export type DelayReason = 'by_itself' | 'by_predecessor';

/**
 * A neighbouring activity referenced from a delay record.
 * `taskName` is empty when the activity is missing from the updated snapshot.
 */
export interface RelatedActivity {
  taskCode: string;
  taskName: string;
  dependencyType: DependencyType;
}

/**
 * One delayed activity. Dates are the exported text, unparsed; delay values are
 * signed days, unrounded, and 0 when either date is unknown.
 */
export interface DelayAnalysisRecord {
  taskCode: string;
  taskName: string;
  baselineStart: string | null;
  baselineEnd: string | null;
  updatedStart: string | null;
  updatedEnd: string | null;
  startDelayDays: number;
  endDelayDays: number;
  delayReason: DelayReason;
  causingPredecessors: RelatedActivity[];
  impactedSuccessors: RelatedActivity[];
}

export interface DelaySummary {
  /** Size of the candidate set for the report scope. */
  total: number;
  delayed: number;
  byItself: number;
  byPredecessor: number;
}

/**
 * The critical path activity with the latest updated finish, and how far that finish moved.
 */
export interface CriticalPathImpact {
  projectDelayDays: number;
  terminalActivity: {
    taskCode: string;
    taskName: string;
    baselineEnd: string | null;
    updatedEnd: string | null;
  };
}

export interface AnalysisInfo {
  /** Run timestamp (ISO 8601). The only field that differs between identical runs. */
  analysisDate: string;
  scope: ReportScope;
  baselineSource: string;
  updatedSource: string;
  criticalPathSource: string;
  baselineProjectCode: string;
  updatedProjectCode: string;
}

/**
 * A non-fatal problem found while loading an input document.
 */
export interface LoadWarning {
  source: string;
  message: string;
}

export interface DelayAnalysisReport {
  analysisInfo: AnalysisInfo;
  summary: DelaySummary;
  /** null when no critical path activity has a comparable finish date. */
  criticalPathImpact: CriticalPathImpact | null;
  delayedActivities: DelayAnalysisRecord[];
  loadWarnings: LoadWarning[];
}

/**
 * Request body for POST /api/delay-analysis and POST /api/delay-analysis/markdown.
 */
export interface DelayAnalysisRequest {
  baseline: ScheduleDocument;
  updated: ScheduleDocument;
  criticalPath: CriticalPathDocument;
  /** Defaults to the server's DEFAULT_SCOPE. */
  scope?: ReportScope;
}
