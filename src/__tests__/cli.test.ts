/**
 * CLI Program Tests
 */

import { describe, expect, it } from 'vitest';
import { createProgram, findSimilarCommands, levenshtein } from '../cli.js';

describe('levenshtein', () => {
  it('should count edits', () => {
    expect(levenshtein('sensor', 'sensor')).toBe(0);
    expect(levenshtein('sensr', 'sensor')).toBe(1);
    expect(levenshtein('', 'get')).toBe(3);
    expect(levenshtein('eval', 'put')).toBe(4);
  });
});

describe('findSimilarCommands', () => {
  const commands = ['sensor', 'motion', 'sub', 'get', 'eval', 'put'];

  it('should suggest the closest commands first', () => {
    expect(findSimilarCommands('snsor', commands)).toEqual(['sensor']);
    expect(findSimilarCommands('gut', commands)).toEqual(['get', 'put', 'sub']);
  });

  it('should ignore case', () => {
    expect(findSimilarCommands('EVAL', commands)).toEqual(['eval']);
  });

  it('should suggest nothing for distant input', () => {
    expect(findSimilarCommands('replicate', commands)).toEqual([]);
  });
});

describe('createProgram', () => {
  it('should register every command', () => {
    const program = createProgram();

    expect(program.name()).toBe('pubtrace');
    expect(program.version()).toBe('0.1.0');
    expect(program.commands.map((cmd) => cmd.name())).toEqual(['sensor', 'motion', 'sub', 'get', 'eval', 'put']);
  });

  it('should default the command options', () => {
    const program = createProgram();
    const options = (name: string) => program.commands.find((cmd) => cmd.name() === name)?.opts();

    expect(options('sensor')).toMatchObject({ path: '/demo/example/sensor', value: 'Put from pubtrace!' });
    expect(options('motion')).toMatchObject({ selector: '/demo/example/**', workMs: 100 });
    expect(options('sub')).toMatchObject({ selector: '/demo/example/**', workMs: 50 });
    expect(options('get')).toMatchObject({ selector: '/demo/example/**', tracePath: '/demo/example/eval' });
    expect(options('eval')).toMatchObject({ path: '/demo/example/eval', workMs: 1000, multicastScouting: true });
    expect(options('put')).toMatchObject({ type: 'string' });
  });
});
