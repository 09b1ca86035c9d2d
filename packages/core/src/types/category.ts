import type { UrgentQueue } from '../queue/urgent-queue.js';
import type { CategoryId, CategoryName, Task } from './task.js';

/**
 * A node of the category forest. Owns its direct tasks, its children and its
 * urgent queue; children carry no reference back to their parent.
 */
export interface Category {
  readonly id: CategoryId;
  readonly name: CategoryName;
  readonly tasks: Task[];
  readonly subcategories: Category[];
  readonly urgentQueue: UrgentQueue<Task>;
}
