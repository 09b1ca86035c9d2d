import { describe, it, expect, beforeEach } from 'vitest';
import { createStore, type ForestStore } from '../../src/forest/store.js';
import { createRootCategory, createSubcategory } from '../../src/queries/category-queries.js';
import { appendTask, createTask } from '../../src/queries/task-queries.js';
import { renderTree, formatTask, formatTaskWithId } from '../../src/render/tree-renderer.js';
import { Priority } from '../../src/types/priority.js';

let store: ForestStore;

beforeEach(() => {
  store = createStore();
});

describe('formatTask', () => {
  it('formats fields with a DD/MM/YYYY due date', () => {
    const task = createTask(store, { title: 'Report', description: 'Q3 numbers', priority: Priority.High, dueDate: '2030-01-01' });
    expect(formatTask(task)).toBe('Report - Q3 numbers - Priority: 1 - Due: 01/01/2030');
    expect(formatTaskWithId(task)).toBe('ID: 1 - Report - Q3 numbers - Priority: 1 - Due: 01/01/2030');
  });
});

describe('renderTree', () => {
  it('reports an empty forest', () => {
    expect(renderTree(store)).toEqual(['No categories available.']);
  });

  it('renders categories, tasks and nested subcategories with indentation', () => {
    const work = createRootCategory(store, 'Work');
    const team = createSubcategory(store, work, 'Team');
    createSubcategory(store, team, 'Standup');
    createRootCategory(store, 'Home');

    appendTask(work, createTask(store, { title: 'Report', description: 'Q3', priority: Priority.High, dueDate: '2030-01-01' }));
    appendTask(team, createTask(store, { title: 'Review', description: '', priority: Priority.Low, dueDate: '2029-06-15' }));

    expect(renderTree(store)).toEqual([
      'Category: Work',
      'Tasks in Work:',
      '    * ID: 1 - Report - Q3 - Priority: 1 - Due: 01/01/2030',
      '  - Subcategory: Team',
      '    Tasks in Team:',
      '        * ID: 2 - Review -  - Priority: 3 - Due: 15/06/2029',
      '    - Subcategory: Standup',
      '      No tasks in Standup.',
      'Category: Home',
      'No tasks in Home.',
    ]);
  });
});
