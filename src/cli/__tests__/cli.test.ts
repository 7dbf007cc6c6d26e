import { describe, it, expect } from 'vitest';
import { createProgram } from '../cli.js';

describe('CLI program', () => {
  it('creates a commander program with name "recipe-forge"', () => {
    const program = createProgram();
    expect(program.name()).toBe('recipe-forge');
  });

  it('has build, analyze, self-host and cache commands', () => {
    const program = createProgram();
    expect(program.commands.map((c) => c.name())).toEqual(['build', 'analyze', 'self-host', 'cache']);
  });

  it('gives build its flags and the common options', () => {
    const buildCmd = createProgram().commands.find((c) => c.name() === 'build');
    expect(buildCmd?.options.map((o) => o.long)).toEqual([
      '--force',
      '--dry-run',
      '--output',
      '--stream',
      '--cache-dir',
      '--workers',
      '--model',
      '--log-level',
      '--verbose',
      '--json',
    ]);
  });

  it('has "stats" and "clear" under cache', () => {
    const cacheCmd = createProgram().commands.find((c) => c.name() === 'cache');
    expect(cacheCmd?.commands.map((c) => c.name())).toEqual(['stats', 'clear']);
  });
});
