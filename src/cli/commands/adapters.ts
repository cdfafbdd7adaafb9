import type { Command } from 'commander';
import { getContext } from '../context.js';
import { isJsonOutput, printError, printJson, printTable, statusColor } from '../output.js';
import { describeAdapters } from '../../capture/router.js';
import { errorMessage } from '../../utils/guards.js';

export function registerAdaptersCommand(program: Command): void {
  program
    .command('adapters')
    .description('Show capture adapters and whether they can run here')
    .action(async () => {
      try {
        const ctx = await getContext();
        const adapters = await describeAdapters(ctx.config.capture.browserPath);
        if (isJsonOutput()) {
          printJson(adapters);
          return;
        }
        printTable(
          ['Adapter', 'Status', 'Targets', 'Features', 'Requires'],
          adapters.map(a => [
            a.name,
            statusColor(a.available ? 'available' : 'unavailable'),
            a.targets,
            a.features.join(', '),
            a.requires,
          ]),
        );
      } catch (err) {
        printError(errorMessage(err));
      }
    });
}
