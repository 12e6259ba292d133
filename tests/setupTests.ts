// Reduce incidental info logging during Jest runs
import { isTestEnv } from '../src/util/env.js';
if (isTestEnv()) {
    console.info = (..._args: unknown[]) => { /* drop noisy infos */ };
}
// Config must come from the test itself, not the developer's shell
delete process.env.HUGEINT_CONFIG;
delete process.env.HUGEINT_RANDOM_MAX_DIGITS;
delete process.env.HUGEINT_LOG_PRETTY;
