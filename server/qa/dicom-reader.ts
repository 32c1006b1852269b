/**
 * DICOM reader service
 *
 * Stateless wrapper around dicom-parser used by the detector and the loader.
 * Every method reports failure as a value; a parser or I/O exception never
 * escapes this module.
 */

import fs from 'fs';
import dicomParser from 'dicom-parser';
import { errorMessage } from '../errors';

export const PREAMBLE_LENGTH = 132;

/** Bytes read when looking for identifying attributes in a file without the DICM magic. */
export const METADATA_PREFIX_LENGTH = 64 * 1024;

export const TAG = {
  TransferSyntaxUID: 'x00020010',
  SOPClassUID: 'x00080016',
  SOPInstanceUID: 'x00080018',
  Modality: 'x00080060',
  SeriesDescription: 'x0008103e',
  PatientID: 'x00100020',
  SliceThickness: 'x00180050',
  StudyInstanceUID: 'x0020000d',
  SeriesInstanceUID: 'x0020000e',
  InstanceNumber: 'x00200013',
  SamplesPerPixel: 'x00280002',
  Rows: 'x00280010',
  Columns: 'x00280011',
  PixelSpacing: 'x00280030',
  BitsAllocated: 'x00280100',
  PixelRepresentation: 'x00280103',
  PixelData: 'x7fe00010',
} as const;

const IMPLICIT_VR_LITTLE_ENDIAN = '1.2.840.10008.1.2';
const EXPLICIT_VR_LITTLE_ENDIAN = '1.2.840.10008.1.2.1';
const EXPLICIT_VR_BIG_ENDIAN = '1.2.840.10008.1.2.2';
const NATIVE_TRANSFER_SYNTAXES = new Set([
  IMPLICIT_VR_LITTLE_ENDIAN,
  EXPLICIT_VR_LITTLE_ENDIAN,
  EXPLICIT_VR_BIG_ENDIAN,
]);

export type ReadResult<T> = { ok: true; value: T } | { ok: false; error: string };

export const IDENTIFYING_TAGS = [
  'SOPClassUID',
  'StudyInstanceUID',
  'SeriesInstanceUID',
  'SOPInstanceUID',
  'PatientID',
  'Modality',
] as const;

export type IdentifyingTag = (typeof IDENTIFYING_TAGS)[number];
export type IdentifyingMetadata = Partial<Record<IdentifyingTag, string>>;

export interface DicomTags extends IdentifyingMetadata {
  TransferSyntaxUID?: string;
  SeriesDescription?: string;
  InstanceNumber?: number;
  Rows?: number;
  Columns?: number;
  SliceThickness?: string;
  PixelSpacing?: [string, string];
  BitsAllocated?: number;
  PixelRepresentation?: number;
  SamplesPerPixel?: number;
}

/** Row-major 2-D array of pixel samples. */
export interface PixelArray {
  rows: number;
  columns: number;
  data: Float32Array;
}

export interface DecodedFile {
  tags: DicomTags;
  hasPixelData: boolean;
  pixels?: PixelArray;
}

export interface DicomReader {
  readPreamble(filePath: string): ReadResult<Uint8Array>;
  /** `null` when the attributes may lie past the bytes that were read. */
  readIdentifyingMetadata(filePath: string): ReadResult<IdentifyingMetadata | null>;
  readDataset(filePath: string): ReadResult<DecodedFile>;
}

type DataSet = ReturnType<typeof dicomParser.parseDicom>;

const stringTag = (dataSet: DataSet, tag: string): string | undefined => {
  const value = dataSet.string(tag);
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
};

const uint16Tag = (dataSet: DataSet, tag: string): number | undefined => {
  if (!dataSet.elements[tag]) return undefined;
  return dataSet.uint16(tag);
};

const intStringTag = (dataSet: DataSet, tag: string): number | undefined => {
  const value = stringTag(dataSet, tag);
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const pairTag = (dataSet: DataSet, tag: string): [string, string] | undefined => {
  const value = stringTag(dataSet, tag);
  if (!value) return undefined;
  const parts = value.split('\\').map((part) => part.trim());
  return parts.length >= 2 ? [parts[0], parts[1]] : undefined;
};

/**
 * Files without the Part 10 header carry no transfer syntax. Explicit VR data
 * starts with a tag followed by two upper-case VR characters.
 */
export function guessTransferSyntax(bytes: Uint8Array): string {
  const isUpper = (byte: number | undefined) => byte !== undefined && byte >= 0x41 && byte <= 0x5a;
  return isUpper(bytes[4]) && isUpper(bytes[5]) ? EXPLICIT_VR_LITTLE_ENDIAN : IMPLICIT_VR_LITTLE_ENDIAN;
}

function parseForced(bytes: Uint8Array, untilTag?: string): DataSet {
  return dicomParser.parseDicom(bytes, {
    TransferSyntaxUID: guessTransferSyntax(bytes),
    ...(untilTag ? { untilTag } : {}),
  });
}

function readIdentifying(dataSet: DataSet): IdentifyingMetadata {
  const metadata: IdentifyingMetadata = {};
  for (const name of IDENTIFYING_TAGS) {
    const value = stringTag(dataSet, TAG[name]);
    if (value !== undefined) metadata[name] = value;
  }
  return metadata;
}

function readTags(dataSet: DataSet): DicomTags {
  return {
    ...readIdentifying(dataSet),
    TransferSyntaxUID: stringTag(dataSet, TAG.TransferSyntaxUID),
    SeriesDescription: stringTag(dataSet, TAG.SeriesDescription),
    InstanceNumber: intStringTag(dataSet, TAG.InstanceNumber),
    Rows: uint16Tag(dataSet, TAG.Rows),
    Columns: uint16Tag(dataSet, TAG.Columns),
    SliceThickness: stringTag(dataSet, TAG.SliceThickness),
    PixelSpacing: pairTag(dataSet, TAG.PixelSpacing),
    BitsAllocated: uint16Tag(dataSet, TAG.BitsAllocated),
    PixelRepresentation: uint16Tag(dataSet, TAG.PixelRepresentation),
    SamplesPerPixel: uint16Tag(dataSet, TAG.SamplesPerPixel),
  };
}

/**
 * Decode the first frame of native (uncompressed) single-sample pixel data.
 * Encapsulated transfer syntaxes and inconsistent geometry yield undefined.
 */
export function decodePixels(dataSet: DataSet, tags: DicomTags): PixelArray | undefined {
  const element = dataSet.elements[TAG.PixelData];
  if (!element) return undefined;

  const transferSyntax = tags.TransferSyntaxUID ?? IMPLICIT_VR_LITTLE_ENDIAN;
  if (!NATIVE_TRANSFER_SYNTAXES.has(transferSyntax)) return undefined;

  const rows = tags.Rows ?? 0;
  const columns = tags.Columns ?? 0;
  const bitsAllocated = tags.BitsAllocated ?? 16;
  const signed = tags.PixelRepresentation === 1;
  if (!rows || !columns || (tags.SamplesPerPixel ?? 1) !== 1) return undefined;
  if (bitsAllocated !== 8 && bitsAllocated !== 16 && bitsAllocated !== 32) return undefined;

  const count = rows * columns;
  const bytesPerSample = bitsAllocated / 8;
  const byteLength = count * bytesPerSample;
  if (element.length < byteLength) return undefined;

  const { byteArray } = dataSet;
  if (byteArray.byteOffset + element.dataOffset + byteLength > byteArray.buffer.byteLength) return undefined;

  const view = new DataView(byteArray.buffer, byteArray.byteOffset + element.dataOffset, byteLength);
  const littleEndian = transferSyntax !== EXPLICIT_VR_BIG_ENDIAN;
  const data = new Float32Array(count);

  for (let i = 0; i < count; i++) {
    const offset = i * bytesPerSample;
    if (bitsAllocated === 8) {
      data[i] = signed ? view.getInt8(offset) : view.getUint8(offset);
    } else if (bitsAllocated === 16) {
      data[i] = signed ? view.getInt16(offset, littleEndian) : view.getUint16(offset, littleEndian);
    } else {
      data[i] = signed ? view.getInt32(offset, littleEndian) : view.getUint32(offset, littleEndian);
    }
  }

  return { rows, columns, data };
}

interface Prefix {
  bytes: Uint8Array;
  /** The file continues past `bytes`. */
  truncated: boolean;
}

function readPrefix(filePath: string, length: number): Prefix {
  const fd = fs.openSync(filePath, 'r');
  try {
    const size = fs.fstatSync(fd).size;
    const buffer = Buffer.alloc(Math.min(size, length));
    const bytesRead = fs.readSync(fd, buffer, 0, buffer.length, 0);
    return { bytes: new Uint8Array(buffer.subarray(0, bytesRead)), truncated: size > bytesRead };
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Default reader on top of dicom-parser. Parsing is forced: files without the
 * DICM preamble are read with a guessed transfer syntax.
 */
export const dicomParserReader: DicomReader = {
  readPreamble(filePath) {
    try {
      return { ok: true, value: readPrefix(filePath, PREAMBLE_LENGTH).bytes };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  },

  readIdentifyingMetadata(filePath) {
    let prefix: Prefix;
    try {
      prefix = readPrefix(filePath, METADATA_PREFIX_LENGTH);
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
    try {
      const dataSet = parseForced(prefix.bytes, TAG.PixelData);
      return { ok: true, value: readIdentifying(dataSet) };
    } catch (error) {
      // An element running past a cut-off prefix proves nothing either way
      if (prefix.truncated) return { ok: true, value: null };
      return { ok: false, error: errorMessage(error) };
    }
  },

  readDataset(filePath) {
    try {
      const bytes = new Uint8Array(fs.readFileSync(filePath));
      const dataSet = parseForced(bytes);
      const tags = readTags(dataSet);
      return {
        ok: true,
        value: {
          tags,
          hasPixelData: Boolean(dataSet.elements[TAG.PixelData]),
          pixels: decodePixels(dataSet, tags),
        },
      };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  },
};
