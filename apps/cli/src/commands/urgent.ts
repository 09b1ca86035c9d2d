import { Command } from 'commander';
import chalk from 'chalk';
import type { TaskManager } from '@task-forest/core';
import { formatDate } from '@task-forest/core';
import type { CliConfig } from '../config.js';
import * as out from '../output.js';
import type { TaskOptions } from '../helpers.js';
import { $try, buildTaskFields } from '../helpers.js';

export function createUrgentCommand(manager: TaskManager, config: CliConfig): Command {
  const urgentCommand = new Command('urgent')
    .description('Queue and process urgent tasks (first in, first out; not undoable)');

  urgentCommand.addCommand(
    new Command('add')
      .description("Queue an urgent task at the back of a category's queue")
      .argument('<category>', 'The category whose queue receives the task')
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
        out.printResult(manager.enqueueUrgent(fields, category));
      })),
  );

  urgentCommand.addCommand(
    new Command('next')
      .description('Take the oldest urgent task off the queue')
      .argument('<category>', 'The category whose queue to process')
      .action((category: string) => $try(() => {
        const result = manager.dequeueUrgent(category);
        if (result.type !== 'success') {
          out.printFailure(result);
          return;
        }
        out.success(result.message);
        console.log(`  ${out.formatTaskLine(result.data)}`);
      })),
  );

  urgentCommand.addCommand(
    new Command('list')
      .description('Show queued urgent tasks, oldest first')
      .argument('<category>', 'The category whose queue to show')
      .action((category: string) => $try(() => {
        const result = manager.peekAllUrgent(category);
        if (result.type !== 'success') {
          out.printFailure(result);
          return;
        }
        if (result.data.length === 0) {
          out.info('No urgent tasks in this category.');
          return;
        }
        console.log(chalk.bold(`Urgent tasks in ${category}:`));
        for (const task of result.data) {
          console.log(`  ${out.formatTaskLine(task)}`);
        }
      })),
  );

  return urgentCommand;
}
