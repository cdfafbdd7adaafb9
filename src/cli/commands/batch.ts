import type { Command } from 'commander';
import { getContext } from '../context.js';
import { isJsonOutput, printError, printJson, printSuccess, printWarning, startSpinner } from '../output.js';
import { formatBatch } from '../report.js';
import { recordBatchVerdicts, verifyBatch } from '../../verify/batch.js';
import { loadTaskFile } from '../../tasks/checklist.js';
import { errorMessage } from '../../utils/guards.js';

interface BatchOptions {
  item?: string[];
  task?: string;
  criteria?: string;
  context?: string;
  stored?: boolean;
  summaryOnly?: boolean;
}

export function registerBatchCommand(program: Command): void {
  program
    .command('batch [captures...]')
    .description('Verify several captures against one checklist in a single judge call')
    .option('-i, --item <text...>', 'checklist item to verify')
    .option('-t, --task <file>', 'take items and criteria from a task file')
    .option('-c, --criteria <text>', 'acceptance criteria')
    .option('--context <text>', 'what the captures show, e.g. the steps between them')
    .option('--stored', 'use every unverified capture in the capture store')
    .option('--summary-only', 'skip per-capture verdicts')
    .action(async (captures: string[], options: BatchOptions) => {
      try {
        const ctx = await getContext();
        let items = options.item ?? [];
        let criteria = options.criteria;
        if (options.task) {
          const task = await loadTaskFile(options.task);
          items = [...items, ...task.items.map(i => i.text)];
          criteria = criteria ?? task.criteria;
        }
        const stored = options.stored ? await ctx.store.pending() : [];
        const paths = [...captures, ...stored.map(c => c.storedPath)];

        if (paths.length === 0) {
          printWarning('No captures to verify');
          return;
        }
        if (items.length === 0) {
          printWarning('No checklist items; pass --item or --task');
          return;
        }

        const spinner = startSpinner(`Verifying ${paths.length} capture(s)...`);
        const result = await verifyBatch({
          judge: ctx.judge,
          paths,
          items,
          criteria,
          context: options.context,
          detailed: !options.summaryOnly,
          timeoutMs: ctx.config.judge.batchTimeoutMs,
        });
        spinner.stop();

        const marked = await recordBatchVerdicts(ctx.store, stored, result);
        if (marked.length < stored.length) {
          printWarning(`${stored.length - marked.length} stored capture(s) left pending without a verdict`);
        }

        if (isJsonOutput()) {
          printJson(result);
        } else {
          console.log(formatBatch(result));
        }
        if (result.success) printSuccess('All captures pass');
        else process.exitCode = 1;
      } catch (err) {
        printError(errorMessage(err));
      }
    });
}
