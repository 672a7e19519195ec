import { describe, it, expect } from 'vitest';
import { createProgram } from './program.js';

describe('createProgram', () => {
  it('creates a commander program with the correct name', () => {
    const program = createProgram();
    expect(program.name()).toBe('buildbrief');
  });

  it('has the expected top-level commands', () => {
    const program = createProgram();
    const commandNames = program.commands.map((c) => c.name());
    expect(commandNames).toEqual(['analyze', 'render', 'config']);
  });

  it('has global --json, --verbose, --log-json, --cwd and --config options', () => {
    const program = createProgram();
    const optionNames = program.options.map((o) => o.long);
    expect(optionNames).toContain('--json');
    expect(optionNames).toContain('--verbose');
    expect(optionNames).toContain('--log-json');
    expect(optionNames).toContain('--cwd');
    expect(optionNames).toContain('--config');
  });

  it('analyze takes an optional log file and the tuning flags', () => {
    const program = createProgram();
    const analyze = program.commands.find((c) => c.name() === 'analyze');
    const optionNames = analyze?.options.map((o) => o.long) ?? [];

    expect(analyze?.registeredArguments.map((a) => a.required)).toEqual([false]);
    expect(optionNames).toEqual(expect.arrayContaining([
      '--repo', '--run', '--max-candidates', '--timeout-ms', '--max-retries', '--no-search', '--format', '--out',
    ]));
  });

  it('render requires a brief file', () => {
    const program = createProgram();
    const render = program.commands.find((c) => c.name() === 'render');
    expect(render?.registeredArguments.map((a) => a.required)).toEqual([true]);
  });
});
