export * from './constants.js';
export {
  OUTPUT_FORMATS,
  isOutputFormat,
  defaultRecognizeOptions,
  resolveOptions,
  buildArgs,
  configFilesFor,
  runConfigFilesFor,
} from './options.js';
export type { OutputFormat, ConfigVariables, RecognizeOptions, ArgOptions } from './options.js';
export { execute, executeChecked } from './process.js';
export type { ExecuteOptions, CheckedExecuteOptions, ProcessResult } from './process.js';
export { resolveImage, assertImageInput, isImageInput, describeType } from './image.js';
export type { ImageInput } from './image.js';
