// Keep Jest output to assertions
import { isTestEnv } from '../src/util/env.js';
if (isTestEnv()) {
    process.env.LOG_LEVEL = 'silent';
    process.env.NO_COLOR = '1';
}
