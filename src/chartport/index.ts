/**
 * chartport - Vega and Vega-Lite conversion facade
 */

export { Converter } from "./convert/Converter.js";
export type { ConverterOptions } from "./convert/Converter.js";
export { LegacyConverter } from "./convert/LegacyConverter.js";
export { SyncConverter } from "./convert/SyncConverter.js";
export { runCall, ConversionCallSchema } from "./convert/ConversionCall.js";
export type { ConversionCall } from "./convert/ConversionCall.js";
export { saveChart, toJson, parseExportFormat, EXPORT_FORMATS } from "./convert/Export.js";
export type { ExportFormat, JsonOptions, JsonTarget, SaveOptions } from "./convert/Export.js";
export { parseSpec } from "./convert/SpecIntake.js";
export { resolveConfig, parseRenderer, parseVlVersion, INVALID_RENDERER, INVALID_VL_VERSION } from "./convert/OptionResolver.js";
export { dispatchText, dispatchBinary } from "./convert/ConversionDispatcher.js";
export { encodeText, encodeBinary, isOk } from "./convert/ResultEncoder.js";
export * from "./convert/types.js";

export { EngineError } from "./engine/ConversionEngine.js";
export type { ConversionEngine, EngineFactory, VgOptions, VlOptions } from "./engine/ConversionEngine.js";
export { VlConverter } from "./engine/VlConverter.js";

export { loadConfig, DEFAULT_CONFIG } from "./config/Config.js";
export type { ChartportConfig, FontConfig } from "./config/Config.js";
export { createLogger } from "./util/Logger.js";
export type { Logger } from "./util/Logger.js";
