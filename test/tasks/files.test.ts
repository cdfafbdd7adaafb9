import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { createServer, type Server } from 'node:net';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  appKindForCategory,
  appKindForFile,
  detectEditedFile,
  detectEditedFiles,
  detectRunningServer,
  summarizeEdits,
} from '../../src/tasks/files.js';

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      if (!addr || typeof addr === 'string') reject(new Error('no port'));
      else resolve(addr.port);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe('detectEditedFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sightcheck-files-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should match component files as web app code', async () => {
    expect(await detectEditedFile('src/components/Button.tsx')).toEqual({
      path: 'src/components/Button.tsx',
      shouldVerify: true,
      category: 'webapp',
      matchedPattern: '**/*.tsx',
      confidence: 1,
      reason: 'File matches webapp pattern: **/*.tsx',
    });
  });

  it('should pick the category by path', async () => {
    const cases: Array<[string, string, string]> = [
      ['styles/main.scss', 'styles', '**/*.scss'],
      ['src/theme/colors.ts', 'styles', '**/theme/**/*'],
      ['/home/dev/app/MainWindow.xaml', 'gui', '**/*.xaml'],
      ['C:\\proj\\ui\\form.Designer.cs', 'gui', '**/*.Designer.cs'],
      ['tools/cli/main.py', 'tui', '**/cli/**/*.py'],
    ];
    for (const [path, category, pattern] of cases) {
      const detection = await detectEditedFile(path, { checkContent: false });
      expect([detection.category, detection.matchedPattern]).toEqual([category, pattern]);
    }
  });

  it('should not verify files outside every pattern', async () => {
    expect(await detectEditedFile('README.md')).toEqual({
      path: 'README.md',
      shouldVerify: false,
      category: 'unknown',
      matchedPattern: null,
      confidence: 0,
      reason: 'File does not match any UI patterns',
    });
  });

  it('should sniff code files for terminal UI imports', async () => {
    const monitor = join(dir, 'monitor.py');
    const dash = join(dir, 'dash.ts');
    const plain = join(dir, 'plain.ts');
    await writeFile(monitor, 'import curses\n\ncurses.wrapper(main)\n');
    await writeFile(dash, "import { render, Box } from 'ink';\n");
    await writeFile(plain, 'export const answer = 42;\n');

    expect(await detectEditedFile(monitor)).toMatchObject({
      shouldVerify: true,
      category: 'tui',
      matchedPattern: 'content:tui-import',
      confidence: 0.9,
      reason: 'File contains TUI library imports',
    });
    expect((await detectEditedFile(dash)).category).toBe('tui');
    expect((await detectEditedFile(plain)).category).toBe('unknown');
    expect((await detectEditedFile(monitor, { checkContent: false })).category).toBe('unknown');
  });

  it('should treat an unreadable code file as unmatched', async () => {
    expect((await detectEditedFile(join(dir, 'gone.py'))).shouldVerify).toBe(false);
  });
});

describe('app kind for edited files', () => {
  it('should map categories to app kinds', () => {
    expect(appKindForCategory('webapp')).toBe('web');
    expect(appKindForCategory('styles')).toBe('web');
    expect(appKindForCategory('gui')).toBe('native-window');
    expect(appKindForCategory('tui')).toBe('terminal-program');
    expect(appKindForCategory('unknown')).toBe('web');
  });

  it('should resolve a file to the app kind that shows it', async () => {
    expect(await appKindForFile('qml/Main.qml')).toBe('native-window');
  });

  it('should summarize a set of edits by the first UI file', async () => {
    const detections = await detectEditedFiles(['README.md', 'tui/app.ts', 'src/App.tsx'], { checkContent: false });
    expect(summarizeEdits(detections)).toEqual({
      shouldVerify: true,
      appKind: 'terminal-program',
      uiFiles: ['tui/app.ts', 'src/App.tsx'],
    });
    expect(summarizeEdits(detections.slice(0, 1))).toEqual({ shouldVerify: false, appKind: null, uiFiles: [] });
  });
});

describe('detectRunningServer', () => {
  it('should report the first port that accepts connections', async () => {
    const closed = createServer();
    const closedPort = await listen(closed);
    await close(closed);

    const server = createServer();
    const port = await listen(server);
    try {
      expect(await detectRunningServer([closedPort, port], { timeoutMs: 500 })).toEqual({
        url: `http://localhost:${port}`,
        port,
      });
    } finally {
      await close(server);
    }
  });

  it('should return null when nothing listens', async () => {
    const closed = createServer();
    const closedPort = await listen(closed);
    await close(closed);

    expect(await detectRunningServer([closedPort], { timeoutMs: 500 })).toBeNull();
  });
});
