/**
 * Category lookup and creation over the forest.
 */

import type { ForestStore } from '../forest/store.js';
import { allocateCategoryId, createCategory } from '../forest/store.js';
import type { Category } from '../types/category.js';
import type { CategoryId, CategoryName } from '../types/task.js';

export interface CategoryLookup {
  id?: CategoryId;
  name?: CategoryName;
}

/** Called for every node in pre-order; returning true stops the walk */
export type CategoryVisitor = (category: Category, depth: number) => boolean | void;

function walkSubtree(category: Category, depth: number, visit: CategoryVisitor): Category | undefined {
  if (visit(category, depth) === true) return category;
  for (const child of category.subcategories) {
    const hit = walkSubtree(child, depth + 1, visit);
    if (hit) return hit;
  }
  return undefined;
}

/**
 * Depth-first pre-order walk of the whole forest, roots in order.
 * Returns the node at which the visitor stopped, if any.
 */
export function walkForest(store: ForestStore, visit: CategoryVisitor): Category | undefined {
  for (const root of store.categories) {
    const hit = walkSubtree(root, 0, visit);
    if (hit) return hit;
  }
  return undefined;
}

/**
 * Find the first category, in traversal order, whose id OR name matches.
 * With both criteria given a node matching only one of them still wins if it comes first.
 */
export function findCategory(store: ForestStore, lookup: CategoryLookup): Category | undefined {
  return walkForest(store, c => c.id === lookup.id || c.name === lookup.name);
}

export function findCategoryByName(store: ForestStore, name: CategoryName): Category | undefined {
  return findCategory(store, { name });
}

export function categoryExists(store: ForestStore, name: CategoryName): boolean {
  return findCategoryByName(store, name) !== undefined;
}

/** Append a new root category. Does not check for duplicates. */
export function createRootCategory(store: ForestStore, name: CategoryName): Category {
  const category = createCategory(allocateCategoryId(store), name);
  store.categories.push(category);
  return category;
}

/** Append a new child under parent. Sibling and forest-wide names are not checked. */
export function createSubcategory(store: ForestStore, parent: Category, name: CategoryName): Category {
  const category = createCategory(allocateCategoryId(store), name);
  parent.subcategories.push(category);
  return category;
}

/** Count of every category node in the forest */
export function countCategories(store: ForestStore): number {
  let count = 0;
  walkForest(store, () => { count++; });
  return count;
}
