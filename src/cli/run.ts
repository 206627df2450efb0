import {
  ANNOTATE_DEFAULTS,
  GpxAnnotateError,
  GpxParseError,
  UsageError,
  annotateTracks,
  buildRenamePlan,
  createLogger,
  loadConfig,
  loadGpxDocument,
  readGpxFile,
  writeGpxDocument,
} from '../lib/index.js';
import type { AnnotateConfig, GpxDocument, Logger, WriterFs } from '../lib/index.js';

const CONTEXT = 'gpx-annotate';

export interface RunDependencies {
  config?: AnnotateConfig;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  fs?: WriterFs;
}

function parseFile(filePath: string): GpxDocument {
  const bytes = readGpxFile(filePath);
  try {
    return loadGpxDocument(bytes);
  } catch (error) {
    if (error instanceof GpxParseError) {
      throw new GpxParseError(`Could not parse file \`${filePath}': ${error.message}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Annotate one file in place: parse, validate, annotate every track,
 * then durably replace the file.
 */
export function annotateFile(
  args: readonly string[],
  config: AnnotateConfig,
  logger: Logger,
  fsOps?: WriterFs
): void {
  const [filePath, ...names] = args;
  if (filePath === undefined || filePath === '') {
    throw new UsageError(`Usage: ${config.toolName} gpx-file [new-track-name...]`);
  }

  logger.debug(CONTEXT, 'Reading GPX file', { file: filePath });
  const doc = parseFile(filePath);
  doc.validate(filePath);

  const { plan, unused } = buildRenamePlan(names, doc.findTracks().length);
  if (unused.length > 0) {
    logger.warn(CONTEXT, `More track names than tracks; ignoring: ${unused.join(', ')}`);
  }

  const result = annotateTracks(doc, {
    renames: plan,
    descriptionMode: config.descriptionMode,
  });

  for (const track of result.tracks) {
    if (track.description === null && track.renamedTo === null) {
      continue;
    }
    logger.info(CONTEXT, `Track ${track.label}:`);
    for (const line of track.description?.split('\n') ?? []) {
      logger.info(CONTEXT, `  ${line}`);
    }
    if (track.renamedTo !== null) {
      logger.info(CONTEXT, `  Renaming to \`${track.renamedTo}'.`);
    }
  }
  for (const warning of result.warnings) {
    logger.warn(CONTEXT, warning);
  }

  writeGpxDocument(doc, filePath, { toolName: config.toolName, fs: fsOps });
  logger.debug(CONTEXT, 'Wrote annotated file', { file: filePath, tracks: result.tracks.length });
}

/**
 * Run the CLI and return its exit code. Annotation failures are logged
 * and mapped to their exit code; anything else propagates.
 */
export function runAnnotate(args: readonly string[], deps: RunDependencies = {}): number {
  let logger = deps.logger ?? createLogger({ format: ANNOTATE_DEFAULTS.logFormat, debug: false });

  try {
    const config = deps.config ?? loadConfig(deps.env);
    logger = deps.logger ?? createLogger({ format: config.logFormat, debug: config.debug });
    annotateFile(args, config, logger, deps.fs);
    return 0;
  } catch (error) {
    if (error instanceof GpxAnnotateError) {
      logger.error(CONTEXT, error);
      return error.exitCode;
    }
    throw error;
  }
}
