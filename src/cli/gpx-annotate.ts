#!/usr/bin/env node
/**
 * Annotate the tracks of a GPX 1.0 file with their distance and duration.
 *
 * Usage: gpx-annotate gpx-file [new-track-name...]
 *   - Each further argument renames the track at the same position
 *   - The file is rewritten in place
 */
import { runAnnotate } from './run.js';

process.exitCode = runAnnotate(process.argv.slice(2));
