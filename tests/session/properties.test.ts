/**
 * Properties Tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigNotFoundError, ErrorCodes } from '../../src/errors.js';
import { Properties } from '../../src/session/properties.js';

describe('Properties', () => {
  describe('parse', () => {
    it('should split entries on semicolons', () => {
      const props = Properties.parse('mode=client;peer=tcp/10.0.0.1:7447');

      expect(props.get('mode')).toBe('client');
      expect(props.get('peer')).toBe('tcp/10.0.0.1:7447');
      expect(props.size).toBe(2);
    });

    it('should split entries on newlines and skip comments and blanks', () => {
      const props = Properties.parse('# session\nmode = peer\n\n  listener=tcp/0.0.0.0:7447  \r\n');

      expect(props.toRecord()).toEqual({ mode: 'peer', listener: 'tcp/0.0.0.0:7447' });
    });

    it('should split on the first equals sign only', () => {
      const props = Properties.parse('query=a=b');

      expect(props.get('query')).toBe('a=b');
    });

    it('should map an entry without a value to the empty string', () => {
      const props = Properties.parse('flag;x=1');

      expect(props.get('flag')).toBe('');
      expect(props.get('x')).toBe('1');
    });

    it('should skip entries with an empty key', () => {
      const props = Properties.parse('=orphan;k=v');

      expect(Array.from(props.keys())).toEqual(['k']);
    });
  });

  describe('toString', () => {
    it('should render entries in insertion order', () => {
      const props = Properties.from({ p1: 'v1', p2: 'v2' });

      expect(props.toString()).toBe('p1=v1;p2=v2');
    });

    it('should render an empty value as the bare key', () => {
      expect(Properties.parse('flag;x=1').toString()).toBe('flag;x=1');
    });
  });

  describe('fromFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'pubtrace-props-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should read and parse a properties file', async () => {
      const file = join(dir, 'session.properties');
      await writeFile(file, 'mode=client\npeer=tcp/127.0.0.1:4222\n');

      const props = await Properties.fromFile(file);

      expect(props.toRecord()).toEqual({ mode: 'client', peer: 'tcp/127.0.0.1:4222' });
    });

    it('should throw ConfigNotFoundError for a missing file', async () => {
      const file = join(dir, 'missing.properties');

      const error = await Properties.fromFile(file).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigNotFoundError);
      expect(error).toMatchObject({ code: ErrorCodes.CONFIG_NOT_FOUND, filePath: file });
    });
  });
});
