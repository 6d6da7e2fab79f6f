/**
 * CLI Commands Registry
 *
 * Registers the pubtrace commands with the main program.
 *
 * @module commands
 */

import { Command, Option } from 'commander';
import {
  DEFAULT_EVAL_PATH,
  DEFAULT_SELECTOR,
  DEFAULT_SENSOR_PATH,
  DEFAULT_SENSOR_VALUE,
  VALUE_TYPES,
  addSessionOptions,
} from './options.js';
import type { EvalCommandOptions } from './eval.js';
import type { GetCommandOptions } from './get.js';
import type { MotionCommandOptions } from './motion.js';
import type { PutCommandOptions } from './put.js';
import type { SensorCommandOptions } from './sensor.js';
import type { SubCommandOptions } from './sub.js';
import { handleError, parseMilliseconds } from './utils.js';

/**
 * Registers the 'sensor' command (start a trace, put its traceparent)
 */
export function createSensorCommand(): Command {
  return addSessionOptions(new Command('sensor'))
    .description('Put the traceparent of a new trace on a path')
    .option('-p, --path <path>', 'The path the value is put on', DEFAULT_SENSOR_PATH)
    .option('-v, --value <value>', 'Value put when tracing yields no traceparent', DEFAULT_SENSOR_VALUE)
    .action(async (options: SensorCommandOptions) => {
      const { sensorCommand } = await import('./sensor.js');
      await sensorCommand(options).catch(handleError);
    });
}

/**
 * Registers the 'motion' command (continue traces from subscribed values)
 */
export function createMotionCommand(): Command {
  return addSessionOptions(new Command('motion'))
    .description('Subscribe and run a traced motion computation per value')
    .option('-s, --selector <selector>', 'The selection of resources to subscribe', DEFAULT_SELECTOR)
    .option('--work-ms <ms>', 'Simulated computation per change', parseMilliseconds, 100)
    .action(async (options: MotionCommandOptions) => {
      const { motionCommand } = await import('./motion.js');
      await motionCommand(options).catch(handleError);
    });
}

/**
 * Registers the 'sub' command (consumer span per change)
 */
export function createSubCommand(): Command {
  return addSessionOptions(new Command('sub'))
    .description('Subscribe and record a consumer span per change')
    .option('-s, --selector <selector>', 'The selection of resources to subscribe', DEFAULT_SELECTOR)
    .option('--work-ms <ms>', 'Simulated processing per change', parseMilliseconds, 50)
    .action(async (options: SubCommandOptions) => {
      const { subCommand } = await import('./sub.js');
      await subCommand(options).catch(handleError);
    });
}

/**
 * Registers the 'get' command (traced query)
 */
export function createGetCommand(): Command {
  return addSessionOptions(new Command('get'))
    .description('Start a trace, share it with the eval and get data')
    .option('-s, --selector <selector>', 'The selection of resources to get', DEFAULT_SELECTOR)
    .option('-t, --trace-path <path>', 'Where the traceparent is put for the eval', DEFAULT_EVAL_PATH)
    .action(async (options: GetCommandOptions) => {
      const { getCommand } = await import('./get.js');
      await getCommand(options).catch(handleError);
    });
}

/**
 * Registers the 'eval' command (traced replies to gets)
 */
export function createEvalCommand(): Command {
  return addSessionOptions(new Command('eval'))
    .description('Answer gets on a path inside the trace put there first')
    .option('-p, --path <path>', 'The path the eval will respond for', DEFAULT_EVAL_PATH)
    .option('--work-ms <ms>', 'Simulated computation per request', parseMilliseconds, 1000)
    .action(async (options: EvalCommandOptions) => {
      const { evalCommand } = await import('./eval.js');
      await evalCommand(options).catch(handleError);
    });
}

/**
 * Registers the 'put' command (typed value)
 */
export function createPutCommand(): Command {
  return addSessionOptions(new Command('put'))
    .description('Put a typed value on a path')
    .option('-p, --path <path>', 'The path the value is put on', DEFAULT_SENSOR_PATH)
    .option('-v, --value <value>', 'The value (hex for raw and custom)', DEFAULT_SENSOR_VALUE)
    .addOption(
      new Option('-t, --type <type>', 'The value type')
        .choices(VALUE_TYPES)
        .default('string')
    )
    .option('--encoding <descriptor>', 'Encoding descriptor for --type custom')
    .action(async (options: PutCommandOptions) => {
      const { putCommand } = await import('./put.js');
      await putCommand(options).catch(handleError);
    });
}

/**
 * Registers all commands with the program
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  program.addCommand(createSensorCommand());
  program.addCommand(createMotionCommand());
  program.addCommand(createSubCommand());
  program.addCommand(createGetCommand());
  program.addCommand(createEvalCommand());
  program.addCommand(createPutCommand());
}
