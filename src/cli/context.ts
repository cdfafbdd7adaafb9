import { join, resolve } from 'node:path';
import type { SightcheckConfig } from '../config/schema.js';
import { loadConfig } from '../config/config.js';
import { CliJudge } from '../judge/client.js';
import { selectAdapter } from '../capture/router.js';
import type { CaptureOptionsInput } from '../capture/types.js';
import { Verifier, type AdapterFactory } from '../verify/orchestrator.js';
import { BaselineStore } from '../baseline/store.js';
import { CaptureHook, CaptureStore } from '../capture/store.js';
import { getLogLevel, logger, setLogLevel } from '../utils/logger.js';
import { setJsonOutput } from './output.js';

export interface AppContext {
  config: SightcheckConfig;
  projectRoot: string;
  /** Absolute path of the project's working directory */
  workDir: string;
  captureDefaults: CaptureOptionsInput;
  adapterFor: AdapterFactory;
  judge: CliJudge;
  verifier: Verifier;
  baselines: BaselineStore;
  store: CaptureStore;
  hook: CaptureHook;
}

let cachedContext: AppContext | null = null;

export async function getContext(): Promise<AppContext> {
  if (cachedContext) return cachedContext;

  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot);
  // --verbose on the command line wins over the configured level
  if (getLogLevel() !== 'debug') setLogLevel(config.logLevel);
  if (config.jsonOutput) setJsonOutput(true);

  const workDir = resolve(projectRoot, config.workDir);
  const { capture } = config;
  const captureDefaults: CaptureOptionsInput = {
    outputDir: join(workDir, 'captures'),
    width: capture.width,
    height: capture.height,
    waitBeforeMs: capture.waitBeforeMs,
    waitAfterMs: capture.waitAfterMs,
    timeoutMs: capture.timeoutMs,
  };
  const adapterFor: AdapterFactory = (target, captureType) => selectAdapter(target, {
    captureType,
    defaults: captureDefaults,
    settleMs: capture.settleMs,
    browserPath: capture.browserPath,
    cols: capture.terminalCols,
    rows: capture.terminalRows,
    cwd: projectRoot,
    log: logger.child('capture'),
  });

  const judge = new CliJudge(config.judge.tool, { model: config.judge.model, timeoutMs: config.judge.timeoutMs });
  const verifier = new Verifier({
    judge,
    evidenceDir: join(workDir, 'evidence'),
    captureType: capture.terminalCapture,
    captureDefaults,
    judgeTimeoutMs: config.judge.timeoutMs,
    maxInlineChars: config.judge.maxInlineChars,
    adapterFor,
  });
  const baselines = new BaselineStore({
    baseDir: join(workDir, 'baselines'),
    judge,
    captureType: capture.terminalCapture,
    captureDefaults,
    judgeTimeoutMs: config.judge.timeoutMs,
    maxInlineChars: config.judge.maxInlineChars,
    adapterFor,
  });
  const store = new CaptureStore(join(workDir, 'captures', 'store'));
  const hook = new CaptureHook(store);

  cachedContext = {
    config, projectRoot, workDir, captureDefaults, adapterFor, judge, verifier, baselines, store, hook,
  };
  return cachedContext;
}
