import * as fs from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';
import type { GpxDocument } from './gpx-document.js';
import { WriteError, describeCause } from './errors.js';

/** The fs calls the writer makes; swapped out in tests to inject failures */
export type WriterFs = Pick<
  typeof fs,
  'openSync' | 'writeSync' | 'fsyncSync' | 'closeSync' | 'renameSync' | 'unlinkSync' | 'statSync' | 'fchmodSync'
>;

export interface WriteGpxOptions {
  toolName: string;
  fs?: WriterFs;
}

/**
 * Credit the tool in the root's creator attribute.
 * Returns the new attribute value.
 */
export function creditCreator(doc: GpxDocument, toolName: string): string {
  const creator = doc.creator();
  const value = creator ? `${creator} (processed by ${toolName})` : toolName;
  doc.setCreator(value);
  return value;
}

/**
 * Temp file path next to the target, so the final rename stays on one
 * filesystem: <dir>/<basename>.<random>.new
 */
export function tempPathFor(target: string): string {
  const suffix = randomBytes(6).toString('hex');
  return path.join(path.dirname(target), `${path.basename(target)}.${suffix}.new`);
}

function existingMode(target: string, fsOps: WriterFs): number | null {
  const stats = fsOps.statSync(target, { throwIfNoEntry: false });
  return stats ? stats.mode & 0o7777 : null;
}

/**
 * Replace `target` with `content` without ever exposing a partial file:
 * write a temp file in the same directory, fsync it, then rename it over
 * the target. On failure the temp file is removed and the target is left
 * untouched.
 */
export function writeFileDurably(target: string, content: string, fsOps: WriterFs = fs): void {
  const tempPath = tempPathFor(target);
  let fd: number | null = null;
  let created = false;
  let stage: 'write' | 'rename' = 'write';

  try {
    fd = fsOps.openSync(tempPath, 'wx', 0o600);
    created = true;

    const mode = existingMode(target, fsOps);
    if (mode !== null) {
      fsOps.fchmodSync(fd, mode);
    }

    const data = Buffer.from(content, 'utf-8');
    let offset = 0;
    while (offset < data.length) {
      offset += fsOps.writeSync(fd, data, offset, data.length - offset);
    }

    fsOps.fsyncSync(fd);
    const openFd = fd;
    fd = null;
    fsOps.closeSync(openFd);

    stage = 'rename';
    fsOps.renameSync(tempPath, target);
  } catch (error) {
    const problems: string[] = [];

    if (fd !== null) {
      try {
        fsOps.closeSync(fd);
      } catch (closeError) {
        problems.push(`could not close temporary file: ${describeCause(closeError)}`);
      }
    }
    if (created) {
      try {
        fsOps.unlinkSync(tempPath);
      } catch (unlinkError) {
        problems.push(`could not remove temporary file: ${describeCause(unlinkError)}`);
      }
    }

    const message = stage === 'rename'
      ? `Could not move file \`${tempPath}' to \`${target}': ${describeCause(error)}`
      : `Could not create/write to temporary file \`${tempPath}': ${describeCause(error)}`;
    const suffix = problems.length > 0 ? ` (${problems.join('; ')})` : '';
    throw new WriteError(message + suffix, { cause: error });
  }
}

/**
 * Credit the tool, serialize the document and durably replace `target`
 */
export function writeGpxDocument(doc: GpxDocument, target: string, options: WriteGpxOptions): void {
  creditCreator(doc, options.toolName);

  let content: string;
  try {
    content = doc.serialize();
  } catch (error) {
    throw new WriteError(`Could not serialize document for \`${target}': ${describeCause(error)}`, { cause: error });
  }

  writeFileDurably(target, content, options.fs ?? fs);
}
