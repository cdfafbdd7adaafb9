import { describe, it, expect } from 'vitest';
import { stripAnsi, toTmuxKey } from '../../src/capture/tmux.js';

describe('toTmuxKey', () => {
  it('should map named keys', () => {
    expect(toTmuxKey('enter')).toBe('Enter');
    expect(toTmuxKey('Esc')).toBe('Escape');
    expect(toTmuxKey('backspace')).toBe('BSpace');
    expect(toTmuxKey('pagedown')).toBe('NPage');
  });

  it('should pass single characters through', () => {
    expect(toTmuxKey('q')).toBe('q');
    expect(toTmuxKey('Q')).toBe('Q');
  });

  it('should map function and control keys', () => {
    expect(toTmuxKey('F5')).toBe('F5');
    expect(toTmuxKey('f12')).toBe('F12');
    expect(toTmuxKey('ctrl+c')).toBe('C-c');
    expect(toTmuxKey('C-x')).toBe('C-x');
  });

  it('should return null for unknown names', () => {
    expect(toTmuxKey('f13')).toBeNull();
    expect(toTmuxKey('hyper')).toBeNull();
  });
});

describe('stripAnsi', () => {
  it('should remove colour and cursor sequences', () => {
    expect(stripAnsi('\x1b[1;32mOK\x1b[0m \x1b[?25lready')).toBe('OK ready');
  });
});
