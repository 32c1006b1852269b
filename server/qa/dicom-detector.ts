import fs from 'fs';
import path from 'path';
import {
  PREAMBLE_LENGTH,
  dicomParserReader,
  type DicomReader,
  type IdentifyingTag,
} from './dicom-reader';

const MAGIC = 'DICM';
const MAGIC_OFFSET = 128;

// PatientID is read but does not count as evidence on its own
const ACCEPTED_IDENTIFIERS: readonly IdentifyingTag[] = [
  'SOPClassUID',
  'StudyInstanceUID',
  'SeriesInstanceUID',
  'SOPInstanceUID',
  'Modality',
];

export type DetectionMethod = 'magic-header' | 'metadata';

export type DetectionOutcome =
  | { kind: 'found'; method: DetectionMethod }
  | { kind: 'not-found'; reason: string };

/** A step either decides the outcome or defers to the next step. */
type StepResult = DetectionOutcome | { kind: 'inconclusive' };

type DetectionStep = (filePath: string, reader: DicomReader) => StepResult;

export interface CandidateFile {
  path: string;
  isDicom: boolean;
  detectedBy?: DetectionMethod;
}

const checkMagicHeader: DetectionStep = (filePath, reader) => {
  const preamble = reader.readPreamble(filePath);
  if (!preamble.ok) {
    return { kind: 'not-found', reason: `unreadable: ${preamble.error}` };
  }
  const bytes = preamble.value;
  if (bytes.length >= PREAMBLE_LENGTH) {
    const magic = String.fromCharCode(...bytes.subarray(MAGIC_OFFSET, MAGIC_OFFSET + 4));
    if (magic === MAGIC) return { kind: 'found', method: 'magic-header' };
  }
  return { kind: 'inconclusive' };
};

const checkIdentifyingMetadata: DetectionStep = (filePath, reader) => {
  const metadata = reader.readIdentifyingMetadata(filePath);
  if (!metadata.ok) {
    return { kind: 'not-found', reason: `not parseable as DICOM: ${metadata.error}` };
  }
  const attributes = metadata.value;
  if (attributes === null) return { kind: 'inconclusive' };
  const identified = ACCEPTED_IDENTIFIERS.some((tag) => Boolean(attributes[tag]));
  return identified
    ? { kind: 'found', method: 'metadata' }
    : { kind: 'not-found', reason: 'no identifying DICOM attributes' };
};

// Order matters: the header check always runs before the metadata fallback
const DETECTION_STEPS: readonly DetectionStep[] = [checkMagicHeader, checkIdentifyingMetadata];

export function detectDicom(filePath: string, reader: DicomReader = dicomParserReader): DetectionOutcome {
  for (const step of DETECTION_STEPS) {
    const result = step(filePath, reader);
    if (result.kind !== 'inconclusive') return result;
  }
  return { kind: 'not-found', reason: 'no detection step matched' };
}

export function classifyFile(filePath: string, reader: DicomReader = dicomParserReader): CandidateFile {
  const outcome = detectDicom(filePath, reader);
  return outcome.kind === 'found'
    ? { path: filePath, isDicom: true, detectedBy: outcome.method }
    : { path: filePath, isDicom: false };
}

function* walk(dirPath: string): Generator<string> {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch {
    return;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      yield* walk(fullPath);
    } else if (entry.isFile() && !entry.name.toLowerCase().endsWith('.zip')) {
      yield fullPath;
    }
  }
}

/**
 * Lazily walk `rootDir` for candidate files, skipping nested archives.
 * Each iteration starts a fresh walk.
 */
export function walkCandidateFiles(rootDir: string): Iterable<string> {
  return {
    [Symbol.iterator]: () => walk(rootDir),
  };
}

export function* classifyTree(rootDir: string, reader: DicomReader = dicomParserReader): Generator<CandidateFile> {
  for (const filePath of walkCandidateFiles(rootDir)) {
    yield classifyFile(filePath, reader);
  }
}

/** Paths under `rootDir` that look like DICOM, in walk order. */
export function findDicomFiles(rootDir: string, reader: DicomReader = dicomParserReader): string[] {
  const found: string[] = [];
  for (const candidate of classifyTree(rootDir, reader)) {
    if (candidate.isDicom) found.push(candidate.path);
  }
  return found;
}
