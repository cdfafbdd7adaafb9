import { readFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { isJsonOutput, printError, printJson } from '../output.js';
import { formatTrigger } from '../report.js';
import { checkVerificationNeeded, parseTodos } from '../../tasks/trigger.js';
import { pathExists } from '../../utils/fs.js';
import { errorMessage } from '../../utils/guards.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export function registerTriggerCommand(program: Command): void {
  program
    .command('trigger')
    .description('Decide from a todo list whether verification should run now')
    .option('--todos <json|file>', 'todo JSON or markdown, inline or a file path (default: stdin)')
    .action(async (options: { todos?: string }) => {
      try {
        let input: string;
        if (options.todos === undefined) input = await readStdin();
        else if (await pathExists(options.todos)) input = await readFile(options.todos, 'utf-8');
        else input = options.todos;

        const report = checkVerificationNeeded(parseTodos(input));
        if (isJsonOutput()) printJson(report);
        else console.log(formatTrigger(report));
      } catch (err) {
        printError(errorMessage(err));
      }
    });
}
