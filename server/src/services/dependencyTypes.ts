import type { DependencyType } from '@delaylens/shared';

export const DEPENDENCY_TYPES: readonly DependencyType[] = ['FS', 'FF', 'SS', 'SF'];

/**
 * Applied by the loader when an exported link has no dependency type.
 */
export const DEFAULT_DEPENDENCY_TYPE: DependencyType = 'FS';

/**
 * Which date of the predecessor drives a link of the given type.
 * Finish-based links (FS, FF) are driven by the predecessor's finish,
 * start-based links (SS, SF) by its start.
 */
export type DrivingDate = 'start' | 'end';

const DRIVING_DATE: Record<DependencyType, DrivingDate> = {
  FS: 'end',
  FF: 'end',
  SS: 'start',
  SF: 'start',
};

export function drivingDate(type: DependencyType): DrivingDate {
  return DRIVING_DATE[type];
}

function isDependencyType(value: string): value is DependencyType {
  return DEPENDENCY_TYPES.some((type) => type === value);
}

/**
 * Normalise an exported dependency type. Absent values fall back to the default;
 * case and the P6 `PR_` prefix are ignored. Returns null for unrecognised values.
 */
export function normalizeDependencyType(value: unknown): DependencyType | null {
  if (value === undefined || value === null || value === '') return DEFAULT_DEPENDENCY_TYPE;
  if (typeof value !== 'string') return null;

  const normalized = value.trim().toUpperCase().replace(/^PR_/, '');
  return isDependencyType(normalized) ? normalized : null;
}
