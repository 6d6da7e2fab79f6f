#!/usr/bin/env node
/**
 * Entry point for the `pubtrace` command.
 *
 * @module bin/pubtrace
 */

import { createProgram } from '../cli.js';

await createProgram().parseAsync();
