/**
 * Analysis service: Runs one baseline-vs-updated comparison end to end and assembles the
 * DelayAnalysisReport consumed by the renderers, the CLI and the HTTP API.
 */

import type {
  CriticalPathDocument,
  DelayAnalysisReport,
  ReportScope,
  ScheduleDocument,
} from '@delaylens/shared';
import type { LoadedCriticalPath, LoadedSchedule } from './scheduleLoader.js';
import { parseCriticalPathDocument, parseScheduleDocument } from './scheduleLoader.js';
import { analyzeDelays, selectCandidates, summarizeDelays } from './delayAnalyzer.js';
import { computeCriticalPathImpact } from './criticalPathImpact.js';

/**
 * Display names of the three inputs (file names for the CLI, labels for the API).
 */
export interface AnalysisSources {
  baseline: string;
  updated: string;
  criticalPath: string;
}

export interface DelayAnalysisInput {
  baseline: LoadedSchedule;
  updated: LoadedSchedule;
  criticalPath: LoadedCriticalPath;
  scope: ReportScope;
  sources: AnalysisSources;
  /** Run timestamp (injectable for testability). */
  now: Date;
}

export function runDelayAnalysis(input: DelayAnalysisInput): DelayAnalysisReport {
  const { baseline, updated, criticalPath, scope, sources } = input;

  const candidates = selectCandidates(
    scope,
    baseline.activities,
    updated.activities,
    criticalPath.taskCodes,
  );
  const delayedActivities = analyzeDelays(candidates, baseline.activities, updated.activities);

  return {
    analysisInfo: {
      analysisDate: input.now.toISOString(),
      scope,
      baselineSource: sources.baseline,
      updatedSource: sources.updated,
      criticalPathSource: sources.criticalPath,
      baselineProjectCode: baseline.projectCode,
      updatedProjectCode: updated.projectCode,
    },
    summary: summarizeDelays(delayedActivities, candidates.length),
    // Schedule-level impact always comes from the critical path, whatever the report scope.
    criticalPathImpact: computeCriticalPathImpact(
      criticalPath.taskCodes,
      baseline.activities,
      updated.activities,
    ),
    delayedActivities,
    loadWarnings: [...baseline.warnings, ...updated.warnings, ...criticalPath.warnings],
  };
}

export interface AnalysisDocuments {
  baseline: ScheduleDocument;
  updated: ScheduleDocument;
  criticalPath: CriticalPathDocument;
}

const DOCUMENT_SOURCES: AnalysisSources = {
  baseline: 'baseline',
  updated: 'updated',
  criticalPath: 'criticalPath',
};

/**
 * Analyze in-memory documents (as received by the HTTP API).
 * Throws ScheduleLoadError when one of the documents is malformed.
 */
export function analyzeDocuments(
  documents: AnalysisDocuments,
  scope: ReportScope,
  now: Date,
): DelayAnalysisReport {
  return runDelayAnalysis({
    baseline: parseScheduleDocument(documents.baseline, DOCUMENT_SOURCES.baseline),
    updated: parseScheduleDocument(documents.updated, DOCUMENT_SOURCES.updated),
    criticalPath: parseCriticalPathDocument(documents.criticalPath, DOCUMENT_SOURCES.criticalPath),
    scope,
    sources: DOCUMENT_SOURCES,
    now,
  });
}
