// Category queries
export {
  walkForest,
  findCategory,
  findCategoryByName,
  categoryExists,
  createRootCategory,
  createSubcategory,
  countCategories,
} from './category-queries.js';
export type { CategoryLookup, CategoryVisitor } from './category-queries.js';

// Task queries
export {
  createTask,
  findTask,
  appendTask,
  detachTask,
  snapshotFields,
  assignFields,
  compareByPriorityAndDue,
  getSortedTasks,
} from './task-queries.js';

// Urgent queue queries
export {
  enqueueUrgentTask,
  dequeueUrgentTask,
  getUrgentTasks,
} from './urgent-queries.js';
