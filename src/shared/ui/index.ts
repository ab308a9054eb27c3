export {
  initOutput,
  getOutput,
  isOutputInitialized,
  resetOutput,
  trace,
  debug,
  info,
  warn,
  error,
  print,
  logger,
  progress,
  prompt,
  confirm,
} from './output.js';
