import { Command } from 'commander';
import type { TaskManager } from '@task-forest/core';
import * as out from '../output.js';
import { $try, isValidCategoryName } from '../helpers.js';

export function createCategoryCommand(manager: TaskManager): Command {
  const categoryCommand = new Command('category')
    .description('Manage categories and subcategories');

  categoryCommand.addCommand(
    new Command('add')
      .description('Create a top-level category')
      .argument('<name>', 'The name of the category to create')
      .action((name: string) => $try(() => {
        if (!isValidCategoryName(name)) {
          out.error('Category name must not be empty');
          return;
        }
        const result = manager.addCategory(name);
        out.printResult(result);
        if (result.type === 'success') {
          out.debug(`${manager.categoryCount} categories in the forest`);
        }
      })),
  );

  categoryCommand.addCommand(
    new Command('sub')
      .description('Create a subcategory under an existing category')
      .argument('<parent>', 'The name of the parent category')
      .argument('<name>', 'The name of the new subcategory')
      .action((parent: string, name: string) => $try(() => {
        if (!isValidCategoryName(name)) {
          out.error('Subcategory name must not be empty');
          return;
        }
        const result = manager.addSubcategory(name, parent);
        out.printResult(result);
        if (result.type === 'success') {
          out.debug(`${manager.categoryCount} categories in the forest`);
        }
      })),
  );

  return categoryCommand;
}
