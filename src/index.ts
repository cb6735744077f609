export * from './lib/types';
export * from './lib/errors';
export * from './lib/parsers';
export * from './lib/parcelInput';
export * from './lib/adapters';
export { ArcGisClient, arcgisClient, type QueryParams, type RawFeature } from './lib/api';
export { DEFAULT_CONFIG, getConfig, loadConfig, parseConfig, resetConfig, setConfig, type Config, type ServiceConfig } from './lib/config';
export { NetworkDiagnostics, type DiagnosticResult } from './lib/diagnostics';
export { DEFAULT_CENTER, parseSelection, selectFeatures, summarizeFeatures } from './lib/features';
export { exportFileName, formatArea, formatFolderName } from './lib/formatters';
export { COLOR_PRESETS, buildGeoJson, buildKml, buildKmz, colorFromHex, renderExport } from './lib/kml';
export { Logger, logger, type LogLevel } from './lib/logger';
