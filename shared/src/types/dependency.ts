/**
 * Dependency-related types.
 * Dependencies link a predecessor activity to a successor activity in an exported schedule.
 */

/**
 * Dependency type - which pair of dates the link constrains.
 *
 * - `FS` finish-to-start
 * - `FF` finish-to-finish
 * - `SS` start-to-start
 * - `SF` start-to-finish
 */
export type DependencyType = 'FS' | 'FF' | 'SS' | 'SF';

/**
 * One side of a dependency as declared on an activity (its predecessor or successor).
 */
export interface DependencyLink {
  taskCode: string;
  dependencyType: DependencyType;
}
