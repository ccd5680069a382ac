/**
 * lib.ts — Library entry point
 */

export {
  rasterHistory,
  rasterInfo,
  parseRasterInfo,
  mapcalc,
  mapcalcStart,
  withMapcalcJob,
  rasterWhat,
  parseSampleOutput,
  localizeSamplePoints,
  SAMPLE_FIELDS,
  type BridgeOptions,
  type HistoryOptions,
  type RasterInfo,
  type MapcalcOptions,
  type ScopedJobResult,
  type Coordinate,
  type SampleFields,
  type SamplePoint,
  type LocalizedSamplePoint,
} from "./bridge/raster.js";
export { MapcalcJob, type JobState } from "./bridge/job.js";
export {
  gisenv,
  currentWorkspace,
  findFile,
  type WorkspaceContext,
  type FoundFile,
} from "./bridge/workspace.js";
export {
  processRunner,
  captureTool,
  readTool,
  runTool,
  writeTool,
  feedTool,
  type ToolRunner,
  type ToolInvocation,
  type ToolOutput,
  type ToolEnv,
  type FedTool,
  type InvokeOptions,
} from "./bridge/executor.js";
export { buildToolArgs, type ToolParams, type OptionValue } from "./bridge/params.js";
export { parseKeyVal, type KeyValOptions, type KeyValRecord } from "./utils/keyval.js";
export { parseFloatStrict, floatOrDms } from "./utils/numbers.js";
export { substitute, placeholders, type TemplateBindings } from "./utils/template.js";
export { deriveSeed, resolveSeed, SEED_LIMIT, type SeedSource } from "./utils/seed.js";
export { loadConfig, resolveLocale, type BridgeConfig } from "./config.js";
export { t } from "./i18n/messages.js";
export { locales, defaultLocale, type Locale } from "./i18n/config.js";
export { consoleMessages, collectMessages, type MessageSink } from "./ui/messages.js";
export * from "./errors.js";
