// Types
export type {
  GpxPoint,
  RawTrackPoint,
  DescriptionMode,
  RenamePlan,
  AnnotateOptions,
  TrackDuration,
  TrackAnnotation,
  AnnotationResult,
  LogFormat,
  AnnotateConfig,
} from './types.js';

// Errors
export {
  GpxAnnotateError,
  UsageError,
  OpenError,
  GpxParseError,
  InvalidGpxDataError,
  NoTracksError,
  WriteError,
} from './errors.js';

// Distance Utilities
export {
  EARTH_RADIUS_METERS,
  haversineDistance,
  pointToPointDistance,
  trackDistance,
} from './distance.js';

// Formatting
export { formatDistance, formatDuration, formatTimestamp, parseTimestamp } from './format.js';

// GPX Document
export {
  GPX_NAMESPACE,
  SUPPORTED_GPX_VERSION,
  GpxDocument,
  GpxTrackHandle,
  decodeGpxBytes,
  loadGpxDocument,
  readGpxFile,
} from './gpx-document.js';
export type { GpxDocumentOptions } from './gpx-document.js';

// Track Annotator
export {
  annotateTracks,
  annotateTrack,
  buildRenamePlan,
  describeTrack,
  TRACK_ANNOTATOR_DEFAULTS,
} from './track-annotator.js';

// Durable Writer
export { creditCreator, writeFileDurably, writeGpxDocument } from './durable-writer.js';
export type { WriterFs, WriteGpxOptions } from './durable-writer.js';

// Config & Logging
export { ANNOTATE_DEFAULTS, loadConfig } from './config.js';
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
