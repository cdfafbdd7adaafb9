import chalk from 'chalk';
import Table from 'cli-table3';
import ora, { type Ora } from 'ora';

let jsonMode = false;

export function setJsonOutput(enabled: boolean): void {
  jsonMode = enabled;
}

export function isJsonOutput(): boolean {
  return jsonMode;
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printTable(headers: string[], rows: string[][]): void {
  if (jsonMode) {
    printJson(rows.map(row => Object.fromEntries(headers.map((h, i) => [h, row[i] ?? '']))));
    return;
  }

  const table = new Table({
    head: headers.map(h => chalk.cyan(h)),
    style: { head: [], border: [] },
  });
  table.push(...rows);
  console.log(table.toString());
}

export function printSuccess(msg: string): void {
  if (jsonMode) {
    printJson({ status: 'success', message: msg });
  } else {
    console.log(chalk.green('✓ ') + msg);
  }
}

export function printError(msg: string): void {
  process.exitCode = 1;
  if (jsonMode) {
    printJson({ status: 'error', message: msg });
  } else {
    console.error(chalk.red('✗ ') + msg);
  }
}

export function printInfo(msg: string): void {
  if (jsonMode) {
    printJson({ status: 'info', message: msg });
  } else {
    console.log(chalk.blue('ℹ ') + msg);
  }
}

export function printWarning(msg: string): void {
  if (jsonMode) {
    printJson({ status: 'warning', message: msg });
  } else {
    console.log(chalk.yellow('⚠ ') + msg);
  }
}

/** Spinner for long captures and judge calls; silent in JSON mode. */
export function startSpinner(text: string): Ora {
  return ora({ text, isSilent: jsonMode }).start();
}

export function statusColor(status: string): string {
  switch (status.toLowerCase()) {
    case 'pass': case 'completed': case 'available': case 'yes': return chalk.green(status);
    case 'fail': case 'failed': case 'not_completed': case 'unavailable': case 'no': return chalk.red(status);
    case 'uncertain': case 'partial': case 'pending': return chalk.yellow(status);
    default: return status;
  }
}
