import readline from 'node:readline';
import type { TaskManager } from '@task-forest/core';
import type { CliConfig } from './config.js';
import * as out from './output.js';
import { runLine } from './program.js';

const PROMPT = 'task-forest> ';
const EXIT_WORDS = new Set(['exit', 'quit', ':q']);

export interface ShellIo {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/** Read commands line by line until exit or end of input. Resolves once the shell closes. */
export function startShell(
  manager: TaskManager,
  config: CliConfig,
  io: ShellIo = { input: process.stdin, output: process.stdout },
): Promise<void> {
  const rl = readline.createInterface({
    input: io.input,
    output: io.output,
    prompt: PROMPT,
  });

  return new Promise(resolve => {
    rl.on('line', (line) => {
      const trimmed = line.trim();
      if (EXIT_WORDS.has(trimmed.toLowerCase())) {
        rl.close();
        return;
      }
      if (trimmed) {
        try {
          runLine(manager, config, trimmed);
        } catch (err: unknown) {
          out.error(err instanceof Error ? err.message : String(err));
        }
      }
      rl.prompt();
    });

    rl.on('close', () => {
      out.info('Bye.');
      resolve();
    });

    out.info("Type 'help' for commands, 'exit' to quit.");
    rl.prompt();
  });
}
