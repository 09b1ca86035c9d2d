import { Command } from 'commander';
import type { TaskManager } from '@task-forest/core';
import { formatDate } from '@task-forest/core';
import type { CliConfig } from '../config.js';
import * as out from '../output.js';
import type { TaskOptions } from '../helpers.js';
import { $try, buildTaskFields } from '../helpers.js';

export function createAddCommand(manager: TaskManager, config: CliConfig): Command {
  return new Command('add')
    .description('Add a task to a category')
    .argument('<category>', 'The category to add the task to')
    .argument('<title>', 'Task title')
    .option('-d, --description <text>', 'Task description')
    .option('-p, --priority <level>', 'Priority (1/high, 2/medium, 3/low)')
    .option('--due <date>', 'Due date (DD/MM/YYYY, yyyy-MM-dd, today, +3d, friday, jan15)')
    .action((category: string, title: string, opts: TaskOptions) => $try(() => {
      const fields = buildTaskFields({ ...opts, title }, {
        title,
        description: '',
        priority: config.defaultPriority,
        dueDate: formatDate(new Date()),
      });

      const result = manager.addTask(fields, category);
      out.printResult(result);
      if (result.type === 'success') {
        out.debug(`Task id ${result.data.id}; ${manager.history.undoCount} action(s) to undo`);
      }
    }));
}
