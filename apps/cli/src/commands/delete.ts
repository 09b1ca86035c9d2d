import { Command } from 'commander';
import type { TaskManager } from '@task-forest/core';
import * as out from '../output.js';
import { $try, requireTaskId } from '../helpers.js';

export function createDeleteCommand(manager: TaskManager): Command {
  return new Command('delete')
    .alias('rm')
    .description('Remove a task from a category')
    .argument('<category>', 'The category holding the task')
    .argument('<taskId>', 'The task ID')
    .action((category: string, taskIdArg: string) => $try(() => {
      const taskId = requireTaskId(taskIdArg);
      out.printResult(manager.removeTask(taskId, category));
    }));
}
