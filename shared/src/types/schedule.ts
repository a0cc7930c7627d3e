/**
 * Input document shapes, as produced by the schedule exporter.
 * Field names follow the export format (snake_case). Every field is optional because
 * exports are not trusted: the loader validates them and degrades missing values to unknown.
 */

/**
 * Project metadata carried by schedule and critical path exports.
 */
export interface ProjectInfo {
  project_code?: string;
  project_name?: string;
  [key: string]: unknown;
}

/**
 * A dependency link as exported. `dependency_type` defaults to FS when absent.
 */
export interface RawDependencyLink {
  task_code?: string;
  dependency_type?: string;
}

export interface RawActivity {
  task_code?: string;
  task_name?: string;
  planned_start_date?: string | null;
  planned_end_date?: string | null;
  dependencies?: {
    predecessors?: RawDependencyLink[];
    successors?: RawDependencyLink[];
  };
  [key: string]: unknown;
}

/**
 * One schedule snapshot (baseline or updated).
 */
export interface ScheduleDocument {
  project?: ProjectInfo;
  activities?: RawActivity[];
}

/**
 * Precomputed critical path export. Only `task_code` of each activity is consumed.
 */
export interface CriticalPathDocument {
  project?: ProjectInfo;
  summary?: Record<string, unknown>;
  critical_paths?: Array<{
    activities?: Array<{ task_code?: string; [key: string]: unknown }>;
    [key: string]: unknown;
  }>;
}
