export { Inspector } from './application/Inspector.js';
export type { InspectorOptions, InspectorState, ErrorReporter, MatchReporter } from './application/Inspector.js';
export { buildReport } from './application/InspectionReport.js';
export type { InspectionReport, StampedPath, ReportedError, ReportOptions } from './application/InspectionReport.js';
export { rollUpStamps } from './application/StampRollup.js';
export { createTimeWindow, contains } from './domain/model/TimeWindow.js';
export type { TimeWindow, TimeWindowInput } from './domain/model/TimeWindow.js';
export { toTimestamps, TIMESTAMP_KINDS } from './domain/model/FileTimestamps.js';
export type { FileTimestamps, TimestampKind, TimestampSource } from './domain/model/FileTimestamps.js';
export {
    ScanInitiationError,
    PathMetadataError,
    InvalidWindowError,
    InspectorStateError
} from './domain/model/InspectionError.js';
