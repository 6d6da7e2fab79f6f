/**
 * Session Option Tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command, CommanderError } from 'commander';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigNotFoundError } from '../../errors.js';
import { addSessionOptions, buildSessionProperties } from '../options.js';

function sessionCommand(): Command {
  return addSessionOptions(new Command('test'))
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
}

describe('addSessionOptions', () => {
  it('should parse every session flag', () => {
    const command = sessionCommand().parse(
      ['-m', 'client', '-e', 'tcp/10.0.0.1:4222', 'tcp/10.0.0.2:4222', '-c', 'session.properties', '--no-multicast-scouting'],
      { from: 'user' }
    );

    expect(command.opts()).toEqual({
      mode: 'client',
      peer: ['tcp/10.0.0.1:4222', 'tcp/10.0.0.2:4222'],
      config: 'session.properties',
      multicastScouting: false,
    });
  });

  it('should reject an unknown mode', () => {
    expect(() => sessionCommand().parse(['-m', 'router'], { from: 'user' })).toThrow(CommanderError);
  });
});

describe('buildSessionProperties', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pubtrace-options-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should map flags onto session properties', async () => {
    const properties = await buildSessionProperties({
      mode: 'client',
      peer: ['tcp/10.0.0.1:4222', 'tcp/10.0.0.2:4222'],
      multicastScouting: false,
    });

    expect(properties.toRecord()).toEqual({
      mode: 'client',
      peer: 'tcp/10.0.0.1:4222,tcp/10.0.0.2:4222',
      multicast_scouting: 'false',
    });
  });

  it('should leave scouting unset when it is not disabled', async () => {
    const properties = await buildSessionProperties({ multicastScouting: true });

    expect(properties.size).toBe(0);
  });

  it('should overlay flags on the config file', async () => {
    const file = join(dir, 'session.properties');
    await writeFile(file, '# lab setup\nmode=peer\nuser=tester\npassword=test-secret\n');

    const properties = await buildSessionProperties({ config: file, mode: 'client', listener: ['tcp/0.0.0.0:7447'] });

    expect(properties.toRecord()).toEqual({
      mode: 'client',
      user: 'tester',
      password: 'test-secret',
      listener: 'tcp/0.0.0.0:7447',
    });
  });

  it('should report a missing config file', async () => {
    await expect(buildSessionProperties({ config: join(dir, 'missing.properties') })).rejects.toBeInstanceOf(
      ConfigNotFoundError
    );
  });
});
