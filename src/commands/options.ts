/**
 * Session options shared by every command
 *
 * @module commands/options
 */

import { Option, type Command } from 'commander';
import { Properties } from '../session/properties.js';
import { PropertyKeys } from '../session/Session.js';

export const DEFAULT_SENSOR_PATH = '/demo/example/sensor';
export const DEFAULT_SENSOR_VALUE = 'Put from pubtrace!';
export const DEFAULT_SELECTOR = '/demo/example/**';
export const DEFAULT_EVAL_PATH = '/demo/example/eval';

export const VALUE_TYPES = ['string', 'json', 'integer', 'float', 'properties', 'raw', 'custom'] as const;
export type ValueType = (typeof VALUE_TYPES)[number];

export interface SessionCommandOptions {
  mode?: string;
  peer?: string[];
  listener?: string[];
  config?: string;
  /** false when --no-multicast-scouting is given */
  multicastScouting?: boolean;
}

/**
 * Add -m/-e/-l/-c and --no-multicast-scouting to a command
 */
export function addSessionOptions(command: Command): Command {
  return command
    .addOption(
      new Option('-m, --mode <mode>', 'The session mode (peer by default)').choices(['peer', 'client'])
    )
    .option('-e, --peer <locator...>', 'Peer locators used to initiate the session')
    .option('-l, --listener <locator...>', 'Locators to listen on')
    .option('-c, --config <file>', 'A configuration file')
    .option('--no-multicast-scouting', 'Disable the multicast-based scouting mechanism');
}

/**
 * Session properties from the config file overlaid with the flags
 */
export async function buildSessionProperties(options: SessionCommandOptions): Promise<Properties> {
  const properties = options.config ? await Properties.fromFile(options.config) : new Properties();

  if (options.mode !== undefined) {
    properties.set(PropertyKeys.MODE, options.mode);
  }
  if (options.peer !== undefined) {
    properties.set(PropertyKeys.PEER, options.peer.join(','));
  }
  if (options.listener !== undefined) {
    properties.set(PropertyKeys.LISTENER, options.listener.join(','));
  }
  if (options.multicastScouting === false) {
    properties.set(PropertyKeys.MULTICAST_SCOUTING, 'false');
  }

  return properties;
}
