export const Priority = {
  High: 1,
  Medium: 2,
  Low: 3,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

/** Narrow an arbitrary number to a Priority */
export function isPriority(value: number): value is Priority {
  return value === Priority.High || value === Priority.Medium || value === Priority.Low;
}
