export {
  TesspipeCLI,
  oraSpinner,
  parseConfigVariables,
  parseFormats,
  toRecognizeOptions,
  getConfigValue,
  setConfigValue,
} from './cli.js';
export type { CLIDependencies, Spinner, SpinnerFactory } from './cli.js';
export { OutputFormatter } from './formatter.js';
