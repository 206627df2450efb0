import type {
  AnnotateOptions,
  AnnotationResult,
  GpxPoint,
  RawTrackPoint,
  RenamePlan,
  TrackAnnotation,
  TrackDuration,
} from './types.js';
import type { GpxDocument, GpxTrackHandle } from './gpx-document.js';
import { trackDistance } from './distance.js';
import { formatDistance, formatDuration, formatTimestamp, parseTimestamp } from './format.js';
import { InvalidGpxDataError } from './errors.js';

// Default annotation options
export const TRACK_ANNOTATOR_DEFAULTS: AnnotateOptions = {
  renames: [],
  descriptionMode: 'replace',
};

/**
 * Spread positional rename arguments over the tracks: slot i renames
 * track i. Names beyond the last track are returned as unused.
 */
export function buildRenamePlan(
  names: readonly string[],
  trackCount: number
): { plan: RenamePlan; unused: string[] } {
  const plan = Array.from({ length: trackCount }, (_, i): string | undefined =>
    i < names.length ? names[i] : undefined
  );
  return { plan, unused: names.slice(trackCount) };
}

// Plain decimal numbers with an optional exponent; no hex, binary or octal
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseCoordinate(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Turn raw <trkpt> attributes into numeric points. Any point without
 * usable coordinates fails the whole track.
 */
export function toGpxPoints(raw: readonly RawTrackPoint[], label: string): GpxPoint[] {
  return raw.map(pt => {
    if (pt.lat === null || pt.lon === null) {
      throw new InvalidGpxDataError(
        `While processing track ${label}: <trkpt> is missing \`lon' and/or \`lat' attributes.`
      );
    }

    const lat = parseCoordinate(pt.lat);
    const lon = parseCoordinate(pt.lon);
    if (lat === null || lon === null) {
      throw new InvalidGpxDataError(
        `While processing track ${label}: <trkpt> has invalid value for \`lon' and/or \`lat' attributes: lat="${pt.lat}" lon="${pt.lon}"`
      );
    }

    return { lat, lon, time: pt.time };
  });
}

/**
 * Elapsed time between the first and last point, when both carry a
 * timestamp. Needs at least two points.
 */
export function trackDuration(
  points: readonly GpxPoint[],
  label: string,
  warnings: string[]
): TrackDuration | null {
  if (points.length < 2) {
    return null;
  }

  const first = points[0].time;
  const last = points[points.length - 1].time;
  if (first === null || last === null) {
    return null;
  }

  const start = parseTimestamp(first);
  const end = parseTimestamp(last);
  if (!start || !end) {
    warnings.push(`Track ${label}: could not parse <time> of first and/or last point; omitting duration.`);
    return null;
  }

  return { ms: end.getTime() - start.getTime(), start, end };
}

export function describeTrack(distance: number, duration: TrackDuration | null): string {
  let text = `Distance: ${formatDistance(distance)}`;
  if (duration) {
    text += `\nDuration: ${formatDuration(duration.ms)} (${formatTimestamp(duration.start)} to ${formatTimestamp(duration.end)})`;
  }
  return text;
}

/**
 * Annotate one track: description with distance and duration, then the
 * optional rename. Tracks without points are only renamed.
 */
export function annotateTrack(
  track: GpxTrackHandle,
  index: number,
  options: AnnotateOptions,
  warnings: string[]
): TrackAnnotation {
  const name = track.name();
  const label = name ?? `#${index}`;
  const rawPoints = track.points();

  const annotation: TrackAnnotation = {
    index,
    label,
    pointCount: rawPoints.length,
    distance: null,
    duration: null,
    description: null,
    renamedTo: null,
  };

  if (rawPoints.length === 0) {
    warnings.push(`Track ${label} has no segments and/or points! Skipping.`);
  } else {
    const points = toGpxPoints(rawPoints, label);
    const distance = trackDistance(points);
    const duration = trackDuration(points, label, warnings);
    const description = describeTrack(distance, duration);

    const descElm = track.getOrCreateDescription();
    const existing = descElm.textContent ?? '';
    descElm.textContent = options.descriptionMode === 'append' && existing.trim()
      ? `${existing}\n${description}`
      : description;

    annotation.distance = distance;
    annotation.duration = duration;
    annotation.description = description;
  }

  const rename = options.renames[index];
  if (rename !== undefined) {
    track.getOrCreateName().textContent = rename;
    annotation.renamedTo = rename;
  }

  return annotation;
}

/**
 * Annotate every track of the document, in document order
 */
export function annotateTracks(
  doc: GpxDocument,
  options: Partial<AnnotateOptions> = {}
): AnnotationResult {
  const opts: AnnotateOptions = { ...TRACK_ANNOTATOR_DEFAULTS, ...options };
  const warnings: string[] = [];

  const tracks = doc.findTracks().map((track, index) =>
    annotateTrack(track, index, opts, warnings)
  );

  return { tracks, warnings };
}
