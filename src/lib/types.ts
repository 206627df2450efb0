// GPX Types
export interface GpxPoint {
  lat: number;
  lon: number;
  time: string | null;
}

/**
 * Raw view of a <trkpt> as found in the document. Coordinates stay as
 * attribute text until the track processor validates them.
 */
export interface RawTrackPoint {
  lat: string | null;
  lon: string | null;
  time: string | null;
}

// Annotation Types
export type DescriptionMode = 'replace' | 'append';

/** One optional new name per track slot, indexed like the tracks */
export type RenamePlan = ReadonlyArray<string | undefined>;

export interface AnnotateOptions {
  renames: RenamePlan;
  descriptionMode: DescriptionMode;
}

export interface TrackDuration {
  ms: number;
  start: Date;
  end: Date;
}

export interface TrackAnnotation {
  index: number;
  label: string;                    // <name> text, or "#<index>"
  pointCount: number;
  distance: number | null;          // meters, null when the track was skipped
  duration: TrackDuration | null;
  description: string | null;       // text written by this run
  renamedTo: string | null;
}

export interface AnnotationResult {
  tracks: TrackAnnotation[];
  warnings: string[];
}

// Configuration Types
export type LogFormat = 'text' | 'json';

export interface AnnotateConfig {
  toolName: string;
  descriptionMode: DescriptionMode;
  logFormat: LogFormat;
  debug: boolean;
}
