import { basename, extname } from 'node:path';
import type { Command } from 'commander';
import { getContext } from '../context.js';
import { isJsonOutput, printError, printJson, printSuccess, printWarning, startSpinner } from '../output.js';
import { formatFixResult } from '../report.js';
import { loadTaskFile, openItems } from '../../tasks/checklist.js';
import { runAutoFix } from '../../fix/auto-fix.js';
import { detectEditedFiles, summarizeEdits } from '../../tasks/files.js';
import { errorMessage } from '../../utils/guards.js';

interface FixOptions {
  edited: string[];
  maxAttempts?: string;
  minConfidence?: string;
}

function parseNumber(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isFinite(n)) throw new Error(`--${name} must be a number, got "${value}"`);
  return n;
}

export function registerFixCommand(program: Command): void {
  program
    .command('fix <taskFile>')
    .description('Verify, and on failure let the judge propose and apply source fixes')
    .requiredOption('-e, --edited <files...>', 'recently edited source files to consider')
    .option('--max-attempts <n>', 'fix attempts before giving up')
    .option('--min-confidence <x>', 'lowest judge confidence (0-1) that is applied')
    .action(async (taskFile: string, options: FixOptions) => {
      try {
        const task = await loadTaskFile(taskFile);
        const items = openItems(task).map(i => i.text);
        if (items.length === 0) {
          printWarning(`No open checklist items in ${taskFile}`);
          return;
        }

        const ctx = await getContext();
        const edits = summarizeEdits(await detectEditedFiles(options.edited));
        if (!edits.shouldVerify) {
          printWarning('None of the edited files look like UI code; the judge may not see the change');
        }
        const name = basename(taskFile, extname(taskFile));
        const spinner = startSpinner(`Verifying ${name} with auto-fix...`);
        const result = await runAutoFix({
          verify: () => ctx.verifier.verify(task.content, items, task.criteria, name),
          judge: ctx.judge,
          editedFiles: options.edited,
          policy: {
            ...ctx.config.fix,
            maxAttempts: parseNumber(options.maxAttempts, 'max-attempts', ctx.config.fix.maxAttempts),
            minConfidence: parseNumber(options.minConfidence, 'min-confidence', ctx.config.fix.minConfidence),
          },
          cwd: ctx.projectRoot,
          judgeTimeoutMs: ctx.config.judge.timeoutMs,
          maxInlineChars: ctx.config.judge.maxInlineChars,
        });
        spinner.stop();

        if (isJsonOutput()) {
          printJson(result);
        } else {
          console.log(formatFixResult(result));
        }
        if (result.allFixed) printSuccess('Verification passes');
        else process.exitCode = 1;
      } catch (err) {
        printError(errorMessage(err));
      }
    });
}
