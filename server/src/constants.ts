/**
 * Application-wide constants shared across server modules.
 */

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Task names longer than this are truncated in report tables.
 */
export const TASK_NAME_MAX_LENGTH = 50;

/**
 * Default maximum request body size (10 MiB). Full schedule exports are large.
 */
export const DEFAULT_BODY_LIMIT = 10 * 1024 * 1024;
