#!/usr/bin/env tsx

import { performance } from 'node:perf_hooks';
import prettyMs from 'pretty-ms';
import { HugeInt, random, sqrt, factorial, pow } from '../src/lib/num/index.js';
import { seededRNG } from '../src/util/rng.js';
import { createUi } from '../src/cli/ui.js';
import { createLogger } from '../src/log.js';

const log = createLogger('bench');
const ui = createUi({ noColor: process.argv.includes('--no-color') });
const rng = seededRNG(20240101);

interface BenchResult {
    operation: string;
    digits: number;
    iterations: number;
    durationMs: number;
    p50: number;
    p95: number;
}

function operand(digits: number): HugeInt {
    return random(digits, { rng });
}

function bench(operation: string, digits: number, iterations: number, fn: () => unknown): BenchResult {
    const latencies: number[] = [];
    const start = performance.now();

    for (let i = 0; i < iterations; i++) {
        const startOp = performance.now();
        fn();
        latencies.push(performance.now() - startOp);
    }

    const duration = performance.now() - start;
    latencies.sort((a, b) => a - b);

    return {
        operation,
        digits,
        iterations,
        durationMs: duration,
        p50: latencies[Math.floor(latencies.length * 0.5)],
        p95: latencies[Math.floor(latencies.length * 0.95)],
    };
}

function runSize(digits: number): BenchResult[] {
    const a = operand(digits);
    const b = operand(digits);
    const half = operand(Math.max(1, Math.floor(digits / 2)));
    const iterations = digits >= 1000 ? 5 : 50;

    return [
        bench('add', digits, iterations, () => a.add(b)),
        bench('sub', digits, iterations, () => a.sub(b)),
        bench('mul', digits, iterations, () => a.mul(b)),
        bench('div', digits, iterations, () => a.div(half)),
        bench('sqrt', digits, Math.min(iterations, 5), () => sqrt(a)),
        bench('pow mod', digits, Math.min(iterations, 5), () => pow(b, 5, a)),
    ];
}

function main(): void {
    const sizes = [10, 100, 500, 1000];
    const results: BenchResult[] = [];

    for (const digits of sizes) {
        ui.say(`Benchmarking ${digits}-digit operands`, 'info');
        results.push(...runSize(digits));
    }
    results.push(bench('factorial', 300, 3, () => factorial(300)));

    ui.table(results.map((r) => ({
        operation: r.operation,
        digits: r.digits,
        iterations: r.iterations,
        total: prettyMs(r.durationMs, { millisecondsDecimalDigits: 1 }),
        p50: prettyMs(r.p50, { millisecondsDecimalDigits: 2 }),
        p95: prettyMs(r.p95, { millisecondsDecimalDigits: 2 }),
    })));

    ui.say('Benchmark complete', 'success');
}

if (require.main === module) {
    try {
        main();
    } catch (err) {
        log.error({ err }, 'bench_error');
        process.exitCode = 1;
    }
}
