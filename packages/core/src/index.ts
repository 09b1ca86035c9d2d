// Types
export { Priority, isPriority } from './types/priority.js';
export type { TaskId, CategoryId, CategoryName, Task, TaskFields } from './types/task.js';
export type { Category } from './types/category.js';
export type {
  DataResult,
  Success,
  Failure,
  CategoryNotFound,
  ParentNotFound,
  AlreadyExists,
  TaskNotFound,
  NothingToUndo,
  NothingToRedo,
  QueueEmpty,
} from './types/results.js';
export { success, isSuccess, isFailure, describeFailure } from './types/results.js';

// Forest
export { createStore, createCategory, allocateCategoryId, allocateTaskId } from './forest/store.js';
export type { ForestStore } from './forest/store.js';
export { UrgentQueue } from './queue/urgent-queue.js';

// Parsers
export { parseDate, formatDate, formatDisplayDate, addDays } from './parsers/index.js';

// Queries
export * from './queries/index.js';

// Rendering
export { renderTree, formatTask, formatTaskWithId } from './render/tree-renderer.js';

// Undo
export { UndoManager, getCommandDescription } from './undo/index.js';
export type { UndoCommand, UndoManagerOptions, UndoResult, RedoResult } from './undo/index.js';

// Facade
export { TaskManager } from './task-manager.js';
export type { TaskManagerOptions } from './task-manager.js';
