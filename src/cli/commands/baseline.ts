import type { Command } from 'commander';
import { getContext } from '../context.js';
import { isJsonOutput, printError, printJson, printSuccess, printWarning, startSpinner } from '../output.js';
import { formatBaselineList, formatComparison } from '../report.js';
import { loadTaskFile } from '../../tasks/checklist.js';
import type { AppDescriptor } from '../../verify/app.js';
import { errorMessage } from '../../utils/guards.js';

interface SaveOptions {
  task?: string;
  url?: string;
  gui?: string;
  title?: string;
  tui?: string;
  description?: string;
}

/** App to capture, from explicit flags or a task file's markers. */
export async function appFromOptions(options: SaveOptions): Promise<AppDescriptor | null> {
  if (options.url) return { kind: 'web', url: options.url };
  if (options.gui || options.title) return { kind: 'native-window', command: options.gui, windowTitle: options.title };
  if (options.tui) return { kind: 'terminal-program', command: options.tui };
  if (options.task) return (await loadTaskFile(options.task)).app;
  return null;
}

export function registerBaselineCommands(program: Command): void {
  const baseline = program
    .command('baseline')
    .description('Save reference captures and compare the app against them');

  baseline
    .command('list')
    .description('List saved baselines')
    .action(async () => {
      try {
        const ctx = await getContext();
        const entries = await ctx.baselines.list();
        if (isJsonOutput()) printJson(entries);
        else console.log(formatBaselineList(entries));
      } catch (err) {
        printError(errorMessage(err));
      }
    });

  baseline
    .command('save <name>')
    .description('Capture the app now and store it as a baseline')
    .option('--task <file>', 'task file with a [webapp]/[gui]/[tui] marker')
    .option('--url <url>', 'web app URL')
    .option('--gui <command>', 'GUI launch command')
    .option('--title <title>', 'GUI window title')
    .option('--tui <command>', 'terminal program command')
    .option('-d, --description <text>', 'what this baseline shows')
    .action(async (name: string, options: SaveOptions) => {
      try {
        const app = await appFromOptions(options);
        if (!app) {
          printWarning('Nothing to capture: pass --url, --gui, --tui or --task');
          process.exitCode = 1;
          return;
        }
        const ctx = await getContext();
        const spinner = startSpinner(`Capturing baseline '${name}'...`);
        const outcome = await ctx.baselines.save(name, { app, description: options.description });
        spinner.stop();

        if (!outcome.ok) {
          printError(outcome.error);
        } else if (isJsonOutput()) {
          printJson(outcome.entry);
        } else {
          printSuccess(`Saved baseline '${name}' (${outcome.path})`);
        }
      } catch (err) {
        printError(errorMessage(err));
      }
    });

  baseline
    .command('compare <name>')
    .description('Compare the current state against a baseline')
    .option('-c, --current <path>', 'compare this capture instead of capturing again')
    .action(async (name: string, options: { current?: string }) => {
      try {
        const ctx = await getContext();
        const spinner = startSpinner(`Comparing against '${name}'...`);
        const result = await ctx.baselines.compare(name, options.current).finally(() => spinner.stop());
        if (isJsonOutput()) printJson(result);
        else console.log(formatComparison(result));
        if (!result.matches) process.exitCode = 1;
      } catch (err) {
        printError(errorMessage(err));
      }
    });

  baseline
    .command('delete <name>')
    .description('Delete a baseline and its file')
    .action(async (name: string) => {
      try {
        const ctx = await getContext();
        if (await ctx.baselines.delete(name)) {
          printSuccess(`Deleted baseline '${name}'`);
        } else {
          printError(`Baseline '${name}' not found`);
        }
      } catch (err) {
        printError(errorMessage(err));
      }
    });
}
