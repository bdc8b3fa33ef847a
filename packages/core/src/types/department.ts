export const DEPARTMENTS = ['Manufacturing', 'Distribution'] as const;

export type Department = typeof DEPARTMENTS[number];

/**
 * Precedence used when an account belongs to more than one department group.
 */
export const DEFAULT_DEPARTMENT: Department = 'Manufacturing';

export function isDepartment(value: string): value is Department {
  return DEPARTMENTS.some((department) => department === value);
}
