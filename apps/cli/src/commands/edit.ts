import { Command } from 'commander';
import type { TaskManager } from '@task-forest/core';
import * as out from '../output.js';
import type { TaskOptions } from '../helpers.js';
import { $try, buildTaskFields, requireTaskId } from '../helpers.js';

export function createEditCommand(manager: TaskManager): Command {
  return new Command('edit')
    .description('Modify a task; fields not given keep their current value')
    .argument('<category>', 'The category holding the task')
    .argument('<taskId>', 'The task ID')
    .option('-t, --title <text>', 'New title')
    .option('-d, --description <text>', 'New description')
    .option('-p, --priority <level>', 'New priority (1/high, 2/medium, 3/low)')
    .option('--due <date>', 'New due date')
    .action((category: string, taskIdArg: string, opts: TaskOptions) => $try(() => {
      const taskId = requireTaskId(taskIdArg);

      const current = manager.getTask(taskId, category);
      if (current.type !== 'success') {
        out.printFailure(current);
        return;
      }

      const fields = buildTaskFields(opts, current.data);
      out.printResult(manager.modifyTask(taskId, fields, category));
    }));
}
