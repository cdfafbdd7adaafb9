import { readFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { z } from 'zod';
import { getContext } from '../context.js';
import { isJsonOutput, printError, printJson, printTable, startSpinner, statusColor } from '../output.js';
import { BrowserSessionAdapter } from '../../capture/adapters/browser-session.js';
import { pathExists } from '../../utils/fs.js';
import { locationPath, toRecord, type CaptureEvent, type CaptureOptionsInput, type CaptureResult, type CaptureType } from '../../capture/types.js';
import { errorMessage } from '../../utils/guards.js';

const sequenceSchema = z.array(z.object({
  action: z.string().min(1),
  selector: z.string().optional(),
  waitAfterMs: z.number().nonnegative().optional(),
  stopOnFail: z.boolean().optional(),
}));

/** `click:#submit` -> { action: 'click', selector: '#submit' } */
export function parseEventSpec(spec: string): CaptureEvent {
  const i = spec.indexOf(':');
  if (i === -1) return { action: spec.trim() };
  const selector = spec.slice(i + 1).trim();
  return { action: spec.slice(0, i).trim(), selector: selector || undefined };
}

/** A JSON array of events, inline or in a file. */
export async function parseSequence(input: string): Promise<CaptureEvent[]> {
  const text = await pathExists(input) ? await readFile(input, 'utf-8') : input;
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new Error(`Invalid sequence JSON: ${errorMessage(err)}`);
  }
  const parsed = sequenceSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid sequence: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'not an event array'}`);
  }
  return parsed.data;
}

function captureType(value: string | undefined, fallback: CaptureType): CaptureType {
  if (value === undefined) return fallback;
  if (value === 'ansi' || value === 'screenshot') return value;
  throw new Error(`--type must be ansi or screenshot, got "${value}"`);
}

interface CaptureCommandOptions {
  event?: string[];
  sequence?: string;
  type?: string;
  output?: string;
  fullPage?: boolean;
  selector?: string;
  dom?: boolean;
}

export function registerCaptureCommand(program: Command): void {
  program
    .command('capture <target>')
    .description('Capture a URL, window, terminal program or command without touching your screen')
    .option('-e, --event <spec...>', 'capture after each event, e.g. click:#submit or key:enter')
    .option('-s, --sequence <json>', 'JSON event array, inline or a file path')
    .option('-t, --type <type>', 'terminal programs: ansi or screenshot')
    .option('-o, --output <dir>', 'directory for capture files')
    .option('--full-page', 'capture the whole scrollable page')
    .option('--selector <css>', 'capture a single element')
    .option('--dom', 'also save the page DOM (browser sessions only)')
    .action(async (target: string, options: CaptureCommandOptions) => {
      try {
        const ctx = await getContext();
        const events = options.sequence
          ? await parseSequence(options.sequence)
          : (options.event ?? []).map(parseEventSpec);
        const overrides: CaptureOptionsInput = {};
        if (options.output) overrides.outputDir = options.output;
        if (options.fullPage) overrides.fullPage = true;
        if (options.selector) overrides.selector = options.selector;

        const adapter = await ctx.adapterFor(target, captureType(options.type, ctx.config.capture.terminalCapture));
        const spinner = startSpinner(`Capturing ${target} with ${adapter.name}...`);
        let results: CaptureResult[] = [];
        try {
          if (events.length > 0) {
            if (await adapter.startSession(target, overrides)) {
              results = await adapter.captureSequence(target, events, overrides);
            } else {
              results = [await adapter.capture(target, overrides)];
            }
          } else {
            results = [await adapter.capture(target, overrides)];
          }
          if (options.dom && adapter instanceof BrowserSessionAdapter) {
            results.push(await adapter.captureDom(target, overrides));
          }
        } finally {
          spinner.stop();
          await adapter.endSession();
        }

        if (isJsonOutput()) {
          printJson({ adapter: adapter.name, results: results.map(toRecord) });
        } else {
          printTable(
            ['Event', 'Status', 'Kind', 'Output'],
            results.map(r => [
              r.event ?? 'capture',
              statusColor(r.success ? 'pass' : 'fail'),
              r.kind,
              r.success ? (locationPath(r) ?? 'inline') : `${r.errorKind ?? 'error'}: ${r.error ?? ''}`,
            ]),
          );
        }
        if (results.some(r => !r.success)) process.exitCode = 1;
      } catch (err) {
        printError(errorMessage(err));
      }
    });
}
