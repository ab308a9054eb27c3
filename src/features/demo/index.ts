export { runDemo } from './runDemo.js';
export type { DemoOptions, DemoResult } from './runDemo.js';
