/**
 * Archive ingestion
 *
 * Extracts an uploaded zip into a working directory. Every entry is resolved
 * against the target directory first and skipped when it would land outside
 * it. A bad entry never stops the rest of the archive from extracting.
 */

import { once } from 'events';
import fs from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import yauzl from 'yauzl';
import { errorMessage } from '../errors';

export interface RawArchive {
  name: string;
  bytes: Buffer;
}

export interface SkippedEntry {
  entryName: string;
  reason: string;
}

export interface ExtractionSummary {
  extracted: string[];
  skipped: SkippedEntry[];
  /** Set when the archive itself could not be read to the end. */
  error?: string;
}

const UTF8_FLAG = 0x800;

// Names are decoded and validated here rather than by yauzl, whose own
// validation fails the whole archive on the first bad name.
const OPEN_OPTIONS: yauzl.Options = { lazyEntries: true, decodeStrings: false };

/**
 * Absolute path for `entryName` inside `targetDir`, or null when the entry
 * would escape it.
 */
export function resolveEntryPath(targetDir: string, entryName: string): string | null {
  const base = path.resolve(targetDir);
  const resolved = path.resolve(base, entryName);
  if (resolved === base || !resolved.startsWith(base + path.sep)) return null;
  return resolved;
}

function decodeEntryName(raw: string | Buffer, utf8: boolean): string {
  if (typeof raw === 'string') return raw;
  return raw.toString(utf8 ? 'utf8' : 'latin1');
}

function openArchive(source: RawArchive | string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    const callback = (err: Error | null | undefined, zipfile?: yauzl.ZipFile) => {
      if (err || !zipfile) {
        reject(err ?? new Error('Unable to open archive'));
      } else {
        resolve(zipfile);
      }
    };
    if (typeof source === 'string') {
      yauzl.open(source, OPEN_OPTIONS, callback);
    } else {
      yauzl.fromBuffer(source.bytes, OPEN_OPTIONS, callback);
    }
  });
}

function openEntryStream(zipfile: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err: Error | null | undefined, stream?: Readable) => {
      if (err || !stream) {
        reject(err ?? new Error('Unable to read entry'));
      } else {
        resolve(stream);
      }
    });
  });
}

async function extractEntry(zipfile: yauzl.ZipFile, entry: yauzl.Entry, target: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  const stream = await openEntryStream(zipfile, entry);
  const output = fs.createWriteStream(target);
  try {
    await pipeline(stream, output);
  } catch (error) {
    // a half-written file would still be picked up by detection
    if (!output.closed) await once(output, 'close');
    await fs.promises.rm(target, { force: true });
    throw error;
  }
}

/**
 * Extract `source` (archive bytes or a path to a zip file) into `targetDir`.
 * Resolves once every entry has been written or skipped; never rejects.
 */
export async function extractArchive(source: RawArchive | string, targetDir: string): Promise<ExtractionSummary> {
  const summary: ExtractionSummary = { extracted: [], skipped: [] };
  await fs.promises.mkdir(targetDir, { recursive: true });

  let zipfile: yauzl.ZipFile;
  try {
    zipfile = await openArchive(source);
  } catch (error) {
    summary.error = errorMessage(error);
    return summary;
  }

  return new Promise<ExtractionSummary>((resolve) => {
    zipfile.on('entry', (entry: yauzl.Entry) => {
      const entryName = decodeEntryName(entry.fileName, (entry.generalPurposeBitFlag & UTF8_FLAG) !== 0);
      const target = resolveEntryPath(targetDir, entryName);

      if (!target) {
        summary.skipped.push({ entryName, reason: 'resolves outside the target directory' });
        zipfile.readEntry();
        return;
      }

      const work = entryName.endsWith('/')
        ? fs.promises.mkdir(target, { recursive: true }).then(() => undefined)
        : extractEntry(zipfile, entry, target).then(() => {
            summary.extracted.push(target);
          });

      void work
        .catch((error: unknown) => {
          summary.skipped.push({ entryName, reason: errorMessage(error) });
        })
        .finally(() => zipfile.readEntry());
    });

    zipfile.once('end', () => resolve(summary));
    zipfile.once('error', (error: Error) => {
      summary.error = error.message;
      zipfile.close();
      resolve(summary);
    });

    zipfile.readEntry();
  });
}
