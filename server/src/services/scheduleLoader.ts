/**
 * Schedule loader: Turns exported schedule and critical path documents into typed,
 * indexed records for the delay analyzer.
 *
 * Structural problems (unreadable file, invalid JSON, wrong top-level shape) are fatal and
 * raise ScheduleLoadError naming the source. Problems inside one activity or one link
 * degrade to "unknown" or are skipped, and are reported as load warnings.
 */

import { readFile } from 'node:fs/promises';
import type { DependencyLink, LoadWarning } from '@delaylens/shared';
import { ScheduleLoadError } from '../errors/AppError.js';
import { parseScheduleDate } from './scheduleDates.js';
import { normalizeDependencyType } from './dependencyTypes.js';

// ─── Types ────────────────────────────────────────────────────────────────────

/**
 * One activity of one snapshot.
 */
export interface ActivityRecord {
  taskCode: string;
  taskName: string;
  /** Exported text, kept verbatim for reports. */
  plannedStartDate: string | null;
  plannedEndDate: string | null;
  /** Parsed instants; null when absent or unparseable. */
  start: Date | null;
  end: Date | null;
  predecessors: readonly DependencyLink[];
  successors: readonly DependencyLink[];
}

/**
 * All activities of one snapshot, keyed by task code.
 */
export type ScheduleIndex = ReadonlyMap<string, ActivityRecord>;

export interface LoadedSchedule {
  activities: ScheduleIndex;
  projectCode: string;
  warnings: LoadWarning[];
}

export interface LoadedCriticalPath {
  taskCodes: ReadonlySet<string>;
  projectCode: string;
  warnings: LoadWarning[];
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

function readProjectCode(document: Record<string, unknown>): string {
  const project = document.project;
  if (!isRecord(project)) return '';
  return typeof project.project_code === 'string' ? project.project_code : '';
}

/**
 * Read an optional list property. Absent means empty; anything else that is not an array
 * makes the whole document malformed.
 */
function readList(document: Record<string, unknown>, key: string, source: string): unknown[] {
  const value = document[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ScheduleLoadError(source, `"${key}" must be an array`);
  }
  return value;
}

function parseLinks(
  value: unknown,
  taskCode: string,
  direction: 'predecessor' | 'successor',
  source: string,
  warnings: LoadWarning[],
): DependencyLink[] {
  if (!Array.isArray(value)) return [];

  const links: DependencyLink[] = [];
  for (const raw of value) {
    if (!isRecord(raw)) continue;
    const linkCode = nonEmptyString(raw.task_code);
    if (!linkCode) continue;

    const dependencyType = normalizeDependencyType(raw.dependency_type);
    if (!dependencyType) {
      warnings.push({
        source,
        message: `${taskCode}: unrecognised dependency type ${JSON.stringify(raw.dependency_type)} on ${direction} ${linkCode}; link ignored`,
      });
      continue;
    }
    links.push({ taskCode: linkCode, dependencyType });
  }
  return links;
}

function parseActivity(
  raw: Record<string, unknown>,
  taskCode: string,
  source: string,
  warnings: LoadWarning[],
): ActivityRecord {
  const plannedStartDate = nonEmptyString(raw.planned_start_date);
  const plannedEndDate = nonEmptyString(raw.planned_end_date);
  const dependencies = isRecord(raw.dependencies) ? raw.dependencies : {};

  return {
    taskCode,
    taskName: typeof raw.task_name === 'string' ? raw.task_name : '',
    plannedStartDate,
    plannedEndDate,
    start: parseScheduleDate(plannedStartDate),
    end: parseScheduleDate(plannedEndDate),
    predecessors: parseLinks(dependencies.predecessors, taskCode, 'predecessor', source, warnings),
    successors: parseLinks(dependencies.successors, taskCode, 'successor', source, warnings),
  };
}

// ─── Document parsing ─────────────────────────────────────────────────────────

/**
 * Index the activities of a schedule export by task code.
 * Entries without a task code are ignored; a later duplicate replaces an earlier one.
 */
export function parseScheduleDocument(document: unknown, source: string): LoadedSchedule {
  if (!isRecord(document)) {
    throw new ScheduleLoadError(source, 'expected a JSON object at the top level');
  }

  const warnings: LoadWarning[] = [];
  const activities = new Map<string, ActivityRecord>();
  let skipped = 0;

  for (const raw of readList(document, 'activities', source)) {
    const taskCode = isRecord(raw) ? nonEmptyString(raw.task_code) : null;
    if (!isRecord(raw) || !taskCode) {
      skipped++;
      continue;
    }
    if (activities.has(taskCode)) {
      warnings.push({ source, message: `Duplicate task_code ${taskCode}; the last entry wins` });
    }
    activities.set(taskCode, parseActivity(raw, taskCode, source, warnings));
  }

  if (skipped > 0) {
    warnings.push({ source, message: `Ignored ${skipped} activities without a task_code` });
  }

  return { activities, projectCode: readProjectCode(document), warnings };
}

/**
 * Collect the task codes of every activity on every critical path of the export.
 */
export function parseCriticalPathDocument(document: unknown, source: string): LoadedCriticalPath {
  if (!isRecord(document)) {
    throw new ScheduleLoadError(source, 'expected a JSON object at the top level');
  }

  const warnings: LoadWarning[] = [];
  const taskCodes = new Set<string>();
  let skipped = 0;

  for (const path of readList(document, 'critical_paths', source)) {
    if (!isRecord(path) || !Array.isArray(path.activities)) {
      skipped++;
      continue;
    }
    for (const activity of path.activities) {
      const taskCode = isRecord(activity) ? nonEmptyString(activity.task_code) : null;
      if (taskCode) {
        taskCodes.add(taskCode);
      } else {
        skipped++;
      }
    }
  }

  if (skipped > 0) {
    warnings.push({ source, message: `Ignored ${skipped} critical path entries without a task_code` });
  }

  return { taskCodes, projectCode: readProjectCode(document), warnings };
}

// ─── File loading ─────────────────────────────────────────────────────────────

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read and parse a JSON file. Any failure is reported as a ScheduleLoadError for that path.
 */
export async function readJsonFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ScheduleLoadError(path, describeError(err));
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ScheduleLoadError(path, `invalid JSON (${describeError(err)})`);
  }
}

export async function loadScheduleFile(path: string): Promise<LoadedSchedule> {
  return parseScheduleDocument(await readJsonFile(path), path);
}

export async function loadCriticalPathFile(path: string): Promise<LoadedCriticalPath> {
  return parseCriticalPathDocument(await readJsonFile(path), path);
}
