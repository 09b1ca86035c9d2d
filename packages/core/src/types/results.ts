import type { CategoryName, TaskId } from './task.js';

export type CategoryNotFound = { readonly type: 'category-not-found'; readonly categoryName: CategoryName };
export type ParentNotFound = { readonly type: 'parent-not-found'; readonly parentName: CategoryName };
export type AlreadyExists = { readonly type: 'already-exists'; readonly categoryName: CategoryName };
export type TaskNotFound = { readonly type: 'task-not-found'; readonly taskId: TaskId };
export type NothingToUndo = { readonly type: 'nothing-to-undo' };
export type NothingToRedo = { readonly type: 'nothing-to-redo' };
export type QueueEmpty = { readonly type: 'empty'; readonly categoryName: CategoryName };

export type Failure =
  | CategoryNotFound
  | ParentNotFound
  | AlreadyExists
  | TaskNotFound
  | NothingToUndo
  | NothingToRedo
  | QueueEmpty;

export type Success<T> = { readonly type: 'success'; readonly data: T; readonly message: string };

/** Success payload or one of the named failures E */
export type DataResult<T, E extends Failure> = Success<T> | E;

export function success<T>(data: T, message: string): Success<T> {
  return { type: 'success', data, message };
}

// Helper functions
export function isSuccess<T, E extends Failure>(r: DataResult<T, E>): r is Success<T> {
  return r.type === 'success';
}

export function isFailure<T, E extends Failure>(r: DataResult<T, E>): r is E {
  return r.type !== 'success';
}

/** Human-readable text for a failure, used by callers that only print it */
export function describeFailure(f: Failure): string {
  switch (f.type) {
    case 'category-not-found': return `Category '${f.categoryName}' does not exist`;
    case 'parent-not-found': return `Parent category '${f.parentName}' does not exist`;
    case 'already-exists': return `Category '${f.categoryName}' already exists`;
    case 'task-not-found': return `Could not find task with id ${f.taskId}`;
    case 'nothing-to-undo': return 'Nothing to undo';
    case 'nothing-to-redo': return 'Nothing to redo';
    case 'empty': return `No urgent tasks in '${f.categoryName}'`;
  }
}
