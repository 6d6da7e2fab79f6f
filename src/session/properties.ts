/**
 * Session Properties
 *
 * Flat string map used for session configuration and for the
 * `(key=value;...)` part of selectors.
 *
 * @module session/properties
 */

import { readFile } from 'node:fs/promises';
import { ConfigNotFoundError } from '../errors.js';

const ENTRY_SEPARATOR = /[;\n\r]/;

export class Properties extends Map<string, string> {
  /**
   * Parse `k1=v1;k2=v2` text. Newlines separate entries as well,
   * and entries starting with `#` are comments.
   */
  static parse(text: string): Properties {
    const props = new Properties();
    for (const rawEntry of text.split(ENTRY_SEPARATOR)) {
      const entry = rawEntry.trim();
      if (entry === '' || entry.startsWith('#')) {
        continue;
      }
      const eq = entry.indexOf('=');
      if (eq === -1) {
        props.set(entry, '');
      } else {
        const key = entry.slice(0, eq).trim();
        if (key !== '') {
          props.set(key, entry.slice(eq + 1).trim());
        }
      }
    }
    return props;
  }

  static async fromFile(filePath: string): Promise<Properties> {
    let text: string;
    try {
      text = await readFile(filePath, 'utf8');
    } catch (error) {
      throw new ConfigNotFoundError(filePath, error instanceof Error ? error : undefined);
    }
    return Properties.parse(text);
  }

  static from(entries: Record<string, string>): Properties {
    return new Properties(Object.entries(entries));
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this);
  }

  toString(): string {
    return Array.from(this, ([k, v]) => (v === '' ? k : `${k}=${v}`)).join(';');
  }
}
