/**
 * @delaylens/shared
 *
 * Shared TypeScript types used by the server, the CLI and API consumers.
 * This package contains the exported schedule document shapes, the delay
 * analysis report shapes, and the API error response shape.
 */

export type { ApiError, ApiErrorResponse } from './types/api.js';
export type { ErrorCode } from './types/errors.js';

// Dependencies
export type { DependencyType, DependencyLink } from './types/dependency.js';

// Input documents
export type {
  ProjectInfo,
  RawDependencyLink,
  RawActivity,
  ScheduleDocument,
  CriticalPathDocument,
} from './types/schedule.js';

// Delay analysis
export type {
  ReportScope,
  DelayReason,
  RelatedActivity,
  DelayAnalysisRecord,
  DelaySummary,
  CriticalPathImpact,
  AnalysisInfo,
  LoadWarning,
  DelayAnalysisReport,
  DelayAnalysisRequest,
} from './types/delayAnalysis.js';
