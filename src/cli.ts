/**
 * pubtrace CLI program
 *
 * Traced pub/sub demo programs (sensor, motion, sub, get, eval, put) with
 * did-you-mean suggestions for unknown commands.
 *
 * @module cli
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { registerCommands } from './commands/index.js';
import { shouldUseColor } from './commands/utils.js';
import { VERSION } from './version.js';

/**
 * Calculate Levenshtein distance between two strings
 */
export function levenshtein(a: string, b: string): number {
  const matrix: number[][] = [];
  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i];
  }
  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j;
  }
  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1,
          matrix[i][j - 1] + 1,
          matrix[i - 1][j] + 1
        );
      }
    }
  }
  return matrix[b.length][a.length];
}

/**
 * Closest command names for did-you-mean suggestions
 */
export function findSimilarCommands(input: string, commands: string[], maxDistance = 2): string[] {
  return commands
    .map((cmd) => ({ cmd, distance: levenshtein(input.toLowerCase(), cmd.toLowerCase()) }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .map(({ cmd }) => cmd);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('pubtrace')
    .description('Traced pub/sub demo programs over NATS and OpenTelemetry')
    .version(VERSION)
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.optsWithGlobals();
      if (opts.color === false || !shouldUseColor()) {
        chalk.level = 0;
      }
    })
    .addHelpText(
      'after',
      `
Examples:
  $ pubtrace eval                                   Serve gets on /demo/example/eval
  $ pubtrace get -s '/demo/example/eval?(name=Bob)' Query it inside a new trace
  $ pubtrace motion -e tcp/127.0.0.1:4222           Continue traces from subscribed values
  $ pubtrace sensor -p /demo/example/sensor         Start a trace and put its traceparent
  $ pubtrace put -t integer -v 3 -p /demo/example/Integer
`
    );

  registerCommands(program);

  program.on('command:*', (operands: string[]) => {
    const unknownCommand = operands[0];
    const suggestions = findSimilarCommands(
      unknownCommand,
      program.commands.map((cmd) => cmd.name())
    );

    console.error(chalk.red(`error: unknown command '${unknownCommand}'`));

    if (suggestions.length > 0) {
      console.error();
      console.error(chalk.yellow('Did you mean one of these?'));
      suggestions.forEach((cmd) => {
        console.error(`  ${chalk.cyan(cmd)}`);
      });
    }

    console.error();
    console.error(`Run ${chalk.cyan('pubtrace --help')} for a list of available commands.`);
    process.exit(1);
  });

  return program;
}
