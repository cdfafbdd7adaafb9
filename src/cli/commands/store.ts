import type { Command } from 'commander';
import { getContext } from '../context.js';
import { isJsonOutput, printError, printInfo, printJson, printSuccess, printTable, statusColor } from '../output.js';
import { errorMessage } from '../../utils/guards.js';

export function registerStoreCommands(program: Command): void {
  const store = program
    .command('store')
    .description('Manage captures pushed in from other tools');

  store
    .command('add <paths...>')
    .description('Copy capture files into the store')
    .option('-t, --tags <tags...>', 'tags for the new captures')
    .option('-d, --description <text>', 'description (single file only)')
    .action(async (paths: string[], options: { tags?: string[]; description?: string }) => {
      try {
        const ctx = await getContext();
        const added = paths.length === 1 && options.description
          ? [await ctx.hook.accept(paths[0] ?? '', { description: options.description, tags: options.tags })]
          : await ctx.hook.acceptBatch(paths, options.tags);
        if (isJsonOutput()) printJson(added);
        else printSuccess(`Stored ${added.length} of ${paths.length} capture(s)`);
        if (added.length < paths.length) process.exitCode = 1;
      } catch (err) {
        printError(errorMessage(err));
      }
    });

  store
    .command('list')
    .description('List stored captures')
    .option('-p, --pending', 'only captures not yet verified')
    .option('-t, --tag <tag>', 'only captures with this tag')
    .action(async (options: { pending?: boolean; tag?: string }) => {
      try {
        const ctx = await getContext();
        let captures = options.pending ? await ctx.store.pending() : await ctx.store.all();
        if (options.tag) {
          const tag = options.tag;
          captures = captures.filter(c => c.tags.includes(tag));
        }
        if (isJsonOutput()) {
          printJson(captures);
          return;
        }
        if (captures.length === 0) {
          printInfo('No captures stored');
          return;
        }
        printTable(
          ['ID', 'Event', 'Source', 'Verified', 'Tags', 'Stored'],
          captures.map(c => [
            c.id,
            c.event,
            c.source,
            statusColor(c.verified ? (c.verificationResult ?? 'yes') : 'pending'),
            c.tags.join(', '),
            c.storedPath,
          ]),
        );
      } catch (err) {
        printError(errorMessage(err));
      }
    });

  store
    .command('watch [dir]')
    .description('Store new capture files as they appear in a directory (Ctrl+C to stop)')
    .action(async (dir: string | undefined) => {
      try {
        const ctx = await getContext();
        const watched = await ctx.hook.startWatching(dir, capture => {
          printSuccess(`Stored ${capture.originalPath} as ${capture.id}`);
        });
        printInfo(`Watching ${watched}`);
        await new Promise<void>((resolveStop) => {
          process.once('SIGINT', () => resolveStop());
          process.once('SIGTERM', () => resolveStop());
        });
        await ctx.hook.stopWatching();
      } catch (err) {
        printError(errorMessage(err));
      }
    });

  store
    .command('clear')
    .description('Delete every stored capture')
    .action(async () => {
      try {
        const ctx = await getContext();
        const removed = await ctx.store.clear();
        printSuccess(`Removed ${removed} capture(s)`);
      } catch (err) {
        printError(errorMessage(err));
      }
    });
}
