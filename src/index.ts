// Capture
export type {
  CaptureErrorKind,
  CaptureEvent,
  CaptureLocation,
  CaptureOptions,
  CaptureOptionsInput,
  CaptureResult,
  CaptureType,
  ContentKind,
} from './capture/types.js';
export {
  CaptureError,
  CaptureOptionsError,
  DEFAULT_CAPTURE_OPTIONS,
  captureFailed,
  captureSucceeded,
  locationPath,
  resolveCaptureOptions,
  toRecord,
} from './capture/types.js';
export type { AdapterName, AdapterSettings, CaptureAdapter } from './capture/adapter.js';
export { BaseCaptureAdapter } from './capture/adapter.js';
export { CleanupStack } from './capture/cleanup.js';
export { classifyTarget, describeAdapters, selectAdapter } from './capture/router.js';
export type { AdapterDescription, RouterSettings, TargetKind } from './capture/router.js';
export { BrowserSessionAdapter } from './capture/adapters/browser-session.js';
export { HeadlessBrowserAdapter } from './capture/adapters/headless-browser.js';
export { WindowAdapter } from './capture/adapters/window.js';
export { TerminalWindowAdapter } from './capture/adapters/terminal-window.js';
export { TerminalPaneAdapter } from './capture/adapters/terminal-pane.js';
export { ProcessOutputAdapter } from './capture/adapters/process-output.js';
export type { WindowSystem } from './capture/display.js';
export { CaptureHook, CaptureStore } from './capture/store.js';
export type { StoredCapture } from './capture/store.js';

// Judge
export type { Judge, JudgeReply, JudgeRequest } from './judge/client.js';
export { CliJudge } from './judge/client.js';
export type { ParseOutcome } from './judge/parse.js';
export { parseJudgeResponse } from './judge/parse.js';

// Verification
export type { ItemVerdict, VerificationResult, VerifierOptions } from './verify/orchestrator.js';
export { Verifier, interpretVerdict } from './verify/orchestrator.js';
export type { AppDescriptor } from './verify/app.js';
export { detectApp } from './verify/app.js';
export type { BatchResult } from './verify/batch.js';
export { verifyBatch } from './verify/batch.js';

// Auto-fix
export type { AutoFixResult, FixAttempt, FixPolicy } from './fix/auto-fix.js';
export { runAutoFix } from './fix/auto-fix.js';
export type { ApplyOutcome } from './fix/apply.js';
export { applyFix } from './fix/apply.js';

// Baselines
export type { BaselineEntry, Manifest } from './baseline/manifest.js';
export { BaselineNotFoundError, BaselineStore } from './baseline/store.js';
export type { ComparisonResult } from './baseline/store.js';

// Tasks
export type { ChecklistItem, TaskFile } from './tasks/checklist.js';
export { TaskFileError, loadTaskFile, markItemComplete, parseTaskFile } from './tasks/checklist.js';
export type { TodoItem, TriggerDecision, TriggerPriority, TriggerReport } from './tasks/trigger.js';
export { checkVerificationNeeded, parseTodos, shouldVerify } from './tasks/trigger.js';

// Config
export type { SightcheckConfig } from './config/schema.js';
export { loadConfig, resetConfigCache, getGlobalConfigDir } from './config/config.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
