/**
 * CLI Commands Index
 */

export { checkCommand, type CheckOptions } from './check.js';
export { simulateCommand, type SimulateOptions } from './simulate.js';
export { examplesCommand, type ExamplesOptions } from './examples.js';
