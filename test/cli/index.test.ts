import { describe, it, expect } from 'vitest';
import { parseArgs, run } from '../../src/cli/index';
import { getGlobalHelp, getCommandHelp } from '../../src/cli/help';

function argv(...args: string[]): string[] {
  return ['node', 'doctags', ...args];
}

describe('parseArgs', () => {
  it('splits command, positionals, flags and options', () => {
    expect(parseArgs(argv('build', 'extra', '--docs-dir=content', '--site-dir', 'public', '--json', '-v'))).toEqual({
      command: 'build',
      args: ['extra'],
      flags: { json: true, v: true },
      options: { 'docs-dir': 'content', 'site-dir': 'public' },
    });
  });

  it('does not let boolean flags swallow the next argument', () => {
    expect(parseArgs(argv('--verbose', 'build'))).toEqual({
      command: 'build',
      args: [],
      flags: { verbose: true },
      options: {},
    });
  });

  it('returns an empty command for no arguments', () => {
    expect(parseArgs(argv()).command).toBe('');
  });
});

describe('run', () => {
  it('prints global help for no command', () => {
    const out: string[] = [];
    expect(run(argv(), (m) => out.push(m))).toBe(0);
    expect(out).toEqual([getGlobalHelp()]);
  });

  it('prints command help with --help', () => {
    const out: string[] = [];
    expect(run(argv('tags', '--help'), (m) => out.push(m))).toBe(0);
    expect(out).toEqual([getCommandHelp('tags')]);
  });

  it('falls back to global help for an unknown command with --help', () => {
    const out: string[] = [];
    expect(run(argv('nope', '--help'), (m) => out.push(m))).toBe(0);
    expect(out).toEqual([getGlobalHelp()]);
  });

  it('rejects an unknown command', () => {
    const out: string[] = [];
    expect(run(argv('publish'), (m) => out.push(m))).toBe(2);
    expect(out).toEqual(['Unknown command: publish. Run `doctags help` for usage.']);
  });
});

describe('help', () => {
  it('has help for every command', () => {
    expect(getCommandHelp('build')).toMatch(/^SYNOPSIS\n  doctags build/);
    expect(getCommandHelp('tags')).toMatch(/^SYNOPSIS\n  doctags tags/);
    expect(getCommandHelp('unknown')).toBeNull();
  });
});
