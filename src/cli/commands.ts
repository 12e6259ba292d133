import {
  HugeInt,
  parseHugeInt,
  pow,
  sqrt,
  log,
  gcd,
  lcm,
  factorial,
  nextPrime,
  random,
  RANDOM_DIGITS_UNSPECIFIED,
} from '../lib/num/index.js';
import type { RNG } from '../util/rng.js';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type CommandContext = {
  rng?: RNG;
};

type CommandSpec = {
  args: string;
  summary: string;
  arity: [min: number, max: number];
  run: (ops: HugeInt[], ctx: CommandContext) => string;
};

const unary = (summary: string, fn: (a: HugeInt) => HugeInt | number): CommandSpec => ({
  args: '<a>',
  summary,
  arity: [1, 1],
  run: ([a]) => String(fn(a)),
});

const binary = (summary: string, fn: (a: HugeInt, b: HugeInt) => HugeInt | number | string, args = '<a> <b>'): CommandSpec => ({
  args,
  summary,
  arity: [2, 2],
  run: ([a, b]) => String(fn(a, b)),
});

export const COMMANDS: Record<string, CommandSpec> = {
  add: binary('a + b', (a, b) => a.add(b)),
  sub: binary('a - b', (a, b) => a.sub(b)),
  mul: binary('a * b', (a, b) => a.mul(b)),
  div: binary('a / b, truncated toward zero', (a, b) => a.div(b)),
  mod: binary('a % b, sign follows a', (a, b) => a.mod(b)),
  divmod: binary('quotient and remainder', (a, b) => a.divMod(b).join(' ')),
  cmp: binary('-1, 0 or 1', (a, b) => a.cmp(b)),
  gcd: binary('greatest common divisor', (a, b) => gcd(a, b)),
  lcm: binary('least common multiple', (a, b) => lcm(a, b)),
  log: binary('floor(log_base(n))', (n, base) => log(n, base), '<n> <base>'),
  neg: unary('-a', (a) => a.negate()),
  abs: unary('|a|', (a) => a.abs()),
  inc: unary('a + 1', (a) => a.clone().increment()),
  dec: unary('a - 1', (a) => a.clone().decrement()),
  sqrt: unary('floor(sqrt(n))', (a) => sqrt(a)),
  factorial: unary('n!', (a) => factorial(a)),
  'next-prime': unary('smallest prime > n', (a) => nextPrime(a)),
  hash: unary('32-bit hash', (a) => a.hashCode()),
  digits: unary('number of decimal digits', (a) => a.digitCount()),
  pow: {
    args: '<base> <exp> [mod]',
    summary: 'base ** exp, reduced by mod unless mod is 0',
    arity: [2, 3],
    run: ([base, exp, mod]) => pow(base, exp, mod ?? 0).toString(),
  },
  random: {
    args: '[digits]',
    summary: 'random non-negative integer',
    arity: [0, 1],
    run: ([digits], ctx) =>
      random(digits ? digits.toNumber() : RANDOM_DIGITS_UNSPECIFIED, { rng: ctx.rng }).toString(),
  },
};

const FLAGS = ['--time', '--verbose', '--quiet', '--no-color', '--help'] as const;
type Flag = (typeof FLAGS)[number];

export type ParsedArgs = {
  command?: string;
  operands: string[];
  flags: {
    time: boolean;
    verbose: boolean;
    quiet: boolean;
    noColor: boolean;
    help: boolean;
  };
};

function isFlag(arg: string): arg is Flag {
  return (FLAGS as readonly string[]).includes(arg);
}

/**
 * Split argv into command, operands and flags. Only `--` prefixes mark a
 * flag, so "-5" stays an operand.
 */
export function parseArgv(argv: string[]): ParsedArgs {
  const seen = new Set<Flag>();
  const positional: string[] = [];
  for (const arg of argv) {
    if (arg.startsWith('--')) {
      if (!isFlag(arg)) throw new CliUsageError(`Unknown option ${arg}`);
      seen.add(arg);
    } else {
      positional.push(arg);
    }
  }
  const [command, ...operands] = positional;
  return {
    command,
    operands,
    flags: {
      time: seen.has('--time'),
      verbose: seen.has('--verbose'),
      quiet: seen.has('--quiet'),
      noColor: seen.has('--no-color'),
      help: seen.has('--help'),
    },
  };
}

export function usage(): string {
  const names = Object.keys(COMMANDS);
  const width = Math.max(...names.map((n) => `${n} ${COMMANDS[n].args}`.length));
  const lines = names.map((n) => `  ${`${n} ${COMMANDS[n].args}`.padEnd(width)}  ${COMMANDS[n].summary}`);
  return [
    'Usage: hugeint <command> [args...] [--time] [--verbose] [--quiet] [--no-color]',
    '',
    'Commands:',
    ...lines,
  ].join('\n');
}

/**
 * Run one command and return what it prints. Operands accept digit group
 * separators ("1_000", "1,000").
 */
export function runCommand(command: string, operands: string[], ctx: CommandContext = {}): string {
  const spec = Object.prototype.hasOwnProperty.call(COMMANDS, command) ? COMMANDS[command] : undefined;
  if (!spec) throw new CliUsageError(`Unknown command "${command}"`);

  const [lo, hi] = spec.arity;
  if (operands.length < lo || operands.length > hi) {
    throw new CliUsageError(`Usage: hugeint ${command} ${spec.args}`);
  }

  const ops = operands.map((text) => parseHugeInt(text, { trim: true, allowSeparators: true }));
  return spec.run(ops, ctx);
}
