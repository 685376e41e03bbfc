/**
 * Road Reference - TMC Location Table Loader
 *
 * Turns a directory of semicolon-delimited location table files into a
 * published SQLite store with R*Tree spatial indexes:
 * - Schema-driven parsing of every DAT file category
 * - Cross-reference resolution between roads, segments, points and areas
 * - EOV (EPSG:23700) to WGS84 coordinate transformation
 * - Atomic store publication and read-only spatial queries
 *
 * @packageDocumentation
 */

// Pipeline
export {
    PipelineOrchestrator,
    runPipeline,
    type PipelineOptions,
    type PipelineEvent,
    type PipelineListener,
} from './pipeline/orchestrator.js';
export {
    getSummary,
    type PipelineState,
    type RunStatus,
    type RunReport,
    type FileReadReport,
    type RunFailure,
} from './pipeline/report.js';

// Schema and parsing
export {
    SCHEMAS,
    FILE_CATEGORIES,
    categoryForFile,
    fieldsFor,
    validateHeader,
    type FileCategory,
    type RowFor,
} from './schema/registry.js';
export { DAT_ENCODINGS, type DatEncoding, type FieldSpec, type SemanticType } from './schema/types.js';
export { readDatFile, type ParseOutcome, type DatReadOptions } from './parsing/dat-reader.js';
export type { ParsedDataset, ParsedFile, ParsedRow } from './parsing/types.js';

// Resolution
export { resolveNetwork, type ResolveOptions, type ResolutionResult } from './resolution/resolver.js';

// Transformation
export {
    SOURCE_CRS,
    NATIONAL_ENVELOPE,
    eovToWgs84,
    wgs84ToEov,
    transformPoint,
    transformNetwork,
    type SourceCrs,
    type Envelope,
} from './transformation/eov.js';

// Persistence
export { StoreBuilder, validateStore, computeStatistics } from './persistence/store-builder.js';
export type {
    StoreStatistics,
    StoreMetadata,
    StoreValidationResult,
} from './persistence/types.js';

// Serving
export {
    RoadNetworkStore,
    StoreReadError,
    type RoadFeature,
    type RoadDetails,
    type PointFeature,
    type SearchResult,
    type Motorway,
} from './serving/road-network-store.js';
export { QueryValidationError, parseBoundingBoxParam } from './serving/input-validator.js';

// Errors and warnings
export {
    PipelineError,
    SchemaError,
    RowParseError,
    TransformError,
    StoreWriteError,
    ConfigError,
} from './core/errors.js';
export { describeWarning, type PipelineWarning, type WarningKind } from './core/warnings.js';
export type * from './core/types.js';
