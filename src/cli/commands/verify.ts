import { writeFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { Command } from 'commander';
import { getContext } from '../context.js';
import { isJsonOutput, printError, printInfo, printJson, printSuccess, printWarning, startSpinner } from '../output.js';
import { formatTaskStatus, formatVerification } from '../report.js';
import { loadTaskFile, markItemComplete, openItems, type ChecklistItem } from '../../tasks/checklist.js';
import { errorMessage } from '../../utils/guards.js';

interface VerifyOptions {
  all?: boolean;
  mark?: boolean;
  report?: string;
  status?: boolean;
}

/** Tick the checklist lines of every item the judge reported as completed. */
export async function markCompleted(path: string, items: ChecklistItem[], completed: string[]): Promise<number> {
  let marked = 0;
  for (const item of items) {
    if (item.completed || !completed.includes(item.text)) continue;
    if (await markItemComplete(path, item.line)) marked++;
  }
  return marked;
}

export function registerVerifyCommand(program: Command): void {
  program
    .command('verify <taskFile>')
    .description('Capture the app named in a task file and have the judge check its items')
    .option('-a, --all', 'verify every item, including ones already checked off')
    .option('-m, --mark', 'check off items the judge reports as completed')
    .option('-r, --report <file>', 'also write the markdown report to a file')
    .option('-s, --status', 'only show checklist progress; no capture')
    .action(async (taskFile: string, options: VerifyOptions) => {
      try {
        const task = await loadTaskFile(taskFile);
        if (options.status) {
          if (isJsonOutput()) printJson(task);
          else console.log(formatTaskStatus(task));
          return;
        }

        const items = options.all ? task.items : openItems(task);
        if (items.length === 0) {
          printWarning(`No ${options.all ? '' : 'open '}checklist items in ${taskFile}`);
          return;
        }

        const ctx = await getContext();
        const spinner = startSpinner(`Verifying ${items.length} item(s) from ${basename(taskFile)}...`);
        const result = await ctx.verifier.verify(
          task.content,
          items.map(i => i.text),
          task.criteria,
          basename(taskFile, extname(taskFile)),
        );
        spinner.stop();

        if (options.mark && result.completedItems.length > 0) {
          const marked = await markCompleted(taskFile, items, result.completedItems);
          printInfo(`Checked off ${marked} item(s) in ${taskFile}`);
        }

        const report = formatVerification(result, `Visual Verification: ${task.title}`);
        if (options.report) await writeFile(options.report, report + '\n', 'utf-8');

        if (isJsonOutput()) {
          printJson(result);
        } else {
          console.log(report);
        }
        if (result.success) printSuccess('All items verified');
        else process.exitCode = 1;
      } catch (err) {
        printError(errorMessage(err));
      }
    });
}
