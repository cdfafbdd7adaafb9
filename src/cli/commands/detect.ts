import type { Command } from 'commander';
import { isJsonOutput, printError, printInfo, printJson, printTable, statusColor } from '../output.js';
import { detectEditedFiles, detectRunningServer, summarizeEdits } from '../../tasks/files.js';
import { errorMessage } from '../../utils/guards.js';

interface DetectOptions {
  content: boolean;
  server?: boolean;
}

export function registerDetectCommand(program: Command): void {
  program
    .command('detect <files...>')
    .description('Decide from edited files whether to verify, and which kind of app to capture')
    .option('--no-content', 'match paths only, do not read files for terminal-UI imports')
    .option('--server', 'also look for a dev server on common ports')
    .action(async (files: string[], options: DetectOptions) => {
      try {
        const detections = await detectEditedFiles(files, { checkContent: options.content });
        const summary = summarizeEdits(detections);
        const server = options.server ? await detectRunningServer() : null;

        if (isJsonOutput()) {
          printJson({ ...summary, server, detections });
          return;
        }
        printTable(
          ['File', 'Verify', 'Category', 'Matched', 'Confidence'],
          detections.map(d => [
            d.path,
            statusColor(d.shouldVerify ? 'yes' : 'no'),
            d.category,
            d.matchedPattern ?? '-',
            d.confidence.toFixed(1),
          ]),
        );
        if (summary.appKind) printInfo(`Suggested app kind: ${summary.appKind}`);
        if (options.server) printInfo(server ? `Dev server detected: ${server.url}` : 'No dev server detected');
      } catch (err) {
        printError(errorMessage(err));
      }
    });
}
