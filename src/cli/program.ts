import { Command } from 'commander';
import { setJsonOutput } from './output.js';
import { registerVerifyCommand } from './commands/verify.js';
import { registerFixCommand } from './commands/fix.js';
import { registerCaptureCommand } from './commands/capture.js';
import { registerBatchCommand } from './commands/batch.js';
import { registerBaselineCommands } from './commands/baseline.js';
import { registerStoreCommands } from './commands/store.js';
import { registerTriggerCommand } from './commands/trigger.js';
import { registerAdaptersCommand } from './commands/adapters.js';
import { registerDetectCommand } from './commands/detect.js';
import { setLogLevel } from '../utils/logger.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('sightcheck')
    .description('Capture apps invisibly and have an LLM judge verify them against a checklist')
    .version('0.1.0')
    .option('--json', 'output in JSON format')
    .option('-v, --verbose', 'debug logging')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      if (opts.json) {
        setJsonOutput(true);
      }
      if (opts.verbose) {
        setLogLevel('debug');
      }
    });

  registerVerifyCommand(program);
  registerFixCommand(program);
  registerCaptureCommand(program);
  registerBatchCommand(program);
  registerBaselineCommands(program);
  registerStoreCommands(program);
  registerTriggerCommand(program);
  registerAdaptersCommand(program);
  registerDetectCommand(program);

  return program;
}

export async function run(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}
