import { performance } from 'node:perf_hooks';
import { CliUsageError, parseArgv, runCommand, usage } from './commands.js';
import { createUi, type Ui } from './ui.js';
import { createLogger, type Logger } from '../log.js';
import { getConfigSources } from '../config/index.js';
import { isHugeIntError, normalizeError } from '../lib/num/index.js';

/**
 * Print the failure and pick an exit code: 1 for bad input (usage or
 * arithmetic errors), 2 for anything unexpected
 */
function reportFailure(ui: Ui, log: Logger | undefined, err: unknown): number {
  const info = normalizeError(err);
  if (err instanceof CliUsageError) {
    ui.say(info.message, 'error');
    ui.say('Run hugeint --help for the command list', 'dim');
    return 1;
  }
  if (isHugeIntError(err)) {
    ui.say(`${info.name}: ${info.message}`, 'error');
    log?.error({ code: err.code }, info.message);
    return 1;
  }
  ui.say(`${info.name}: ${info.message}`, 'error');
  log?.error({ err }, 'unexpected failure');
  return 2;
}

export function main(argv: string[]): number {
  const ui = createUi({
    noColor: argv.includes('--no-color'),
    verbose: argv.includes('--verbose'),
    quiet: argv.includes('--quiet'),
  });
  let log: Logger | undefined;

  try {
    const { command, operands, flags } = parseArgv(argv);
    if (flags.help || !command) {
      ui.result(usage());
      return command || flags.help ? 0 : 1;
    }

    log = createLogger('cli');
    log.debug({ sources: getConfigSources() }, 'config loaded');
    log.debug({ command, operands }, 'command start');

    const start = performance.now();
    const output = runCommand(command, operands);
    const ms = performance.now() - start;

    ui.result(output);
    if (flags.time) ui.elapsed(command, ms);
    log.debug({ command, ms }, 'command finished');
    return 0;
  } catch (err) {
    return reportFailure(ui, log, err);
  }
}
