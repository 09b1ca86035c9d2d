import { Command } from 'commander';
import chalk from 'chalk';
import type { TaskManager } from '@task-forest/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createListCommand(manager: TaskManager): Command {
  return new Command('list')
    .alias('ls')
    .description("Show a category's tasks by priority, then due date")
    .argument('<category>', 'The category to list')
    .action((category: string) => $try(() => {
      const result = manager.listSorted(category);
      if (result.type !== 'success') {
        out.printFailure(result);
        return;
      }
      if (result.data.length === 0) {
        out.info('No tasks in this category.');
        return;
      }

      console.log(chalk.bold(category));
      for (const task of result.data) {
        console.log(`  ${out.formatTaskLine(task)}`);
      }
    }));
}

export function createTreeCommand(manager: TaskManager): Command {
  return new Command('tree')
    .description('Show every category, its subcategories and their tasks')
    .action(() => $try(() => {
      for (const line of manager.renderTree()) {
        out.info(line);
      }
    }));
}
