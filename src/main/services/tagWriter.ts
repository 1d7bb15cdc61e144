/**
 * Tag Writer Service
 *
 * Per-format tag mapping plus the writers that put Year, Label and front
 * cover art into files.
 *
 * Key design decisions:
 * - FORMAT_TAG_MAP is the single lookup table for which native fields carry
 *   Year and Label and whether a format can hold art; reconciliation logic
 *   never branches on format itself
 * - Uses `node-id3` for MP3 ID3v2 writing (update mode preserves other frames)
 * - FLAC is rewritten at the metadata-block level; audio frames are copied as-is
 * - Formats with a mapping but no writer report failure instead of throwing
 * - Read-only files are made writable for the write and restored afterwards
 */

import * as fs from 'fs';
import NodeID3 from 'node-id3';
import type { AudioFormat } from '../../shared/types';
import { withWritableFile } from '../utils/fileScanner';
import { getImageDimensions } from '../utils/imageInfo';
import { errorMessage } from './errors';

// ─── Format Mapping ───────────────────────────────────────────────────────────

/** Tag container family */
export type TagFamily = 'id3' | 'vorbis' | 'mp4' | 'asf';

export interface FormatTagMapping {
  family: TagFamily;
  /** Upper-cased native ids that hold the year */
  yearFields: readonly string[];
  /** Upper-cased native ids that hold the label */
  labelFields: readonly string[];
  /** Whether the format can carry embedded cover art */
  artCapability: boolean;
}

const ID3_FIELDS = { yearFields: ['TYER', 'TDRC'], labelFields: ['TPUB', 'TXXX:LABEL'] } as const;
const VORBIS_FIELDS = { yearFields: ['DATE', 'YEAR'], labelFields: ['LABEL', 'PUBLISHER'] } as const;

export const FORMAT_TAG_MAP: Readonly<Record<AudioFormat, FormatTagMapping>> = {
  mp3: { family: 'id3', ...ID3_FIELDS, artCapability: true },
  wav: { family: 'id3', ...ID3_FIELDS, artCapability: false },
  aiff: { family: 'id3', ...ID3_FIELDS, artCapability: false },
  flac: { family: 'vorbis', ...VORBIS_FIELDS, artCapability: true },
  ogg: { family: 'vorbis', ...VORBIS_FIELDS, artCapability: false },
  opus: { family: 'vorbis', ...VORBIS_FIELDS, artCapability: false },
  m4a: {
    family: 'mp4',
    yearFields: ['©DAY'],
    labelFields: ['----:COM.APPLE.ITUNES:LABEL'],
    artCapability: true,
  },
  wma: { family: 'asf', yearFields: ['WM/YEAR'], labelFields: ['WM/PUBLISHER'], artCapability: false },
};

export function getTagMapping(format: AudioFormat | null): FormatTagMapping | null {
  return format ? FORMAT_TAG_MAP[format] : null;
}

// ─── Types ────────────────────────────────────────────────────────────────────

/** Values to write; null means leave that field alone */
export interface YearLabelValues {
  year: string | null;
  label: string | null;
}

/** Image bytes ready to embed */
export interface ImageData {
  data: Buffer;
  mimeType: string;
}

/** Result of a write operation */
export interface WriteTagsResult {
  success: boolean;
  filePath: string;
  /** Error message if the write failed */
  error: string | null;
}

/**
 * Writes tags and art. Implementations never throw for per-file problems;
 * they report them through WriteTagsResult.
 */
export interface TagWriter {
  supportsTags(format: AudioFormat | null): boolean;
  supportsArt(format: AudioFormat | null): boolean;
  writeYearLabel(filePath: string, format: AudioFormat, values: YearLabelValues): Promise<WriteTagsResult>;
  embedArt(filePath: string, format: AudioFormat, image: ImageData): Promise<WriteTagsResult>;
}

function ok(filePath: string): WriteTagsResult {
  return { success: true, filePath, error: null };
}

function failed(filePath: string, error: string): WriteTagsResult {
  return { success: false, filePath, error };
}

// ─── MP3 (node-id3) ───────────────────────────────────────────────────────────

/**
 * Builds the node-id3 frames for Year and Label.
 * Year goes to TYER and TDRC, Label to TPUB and TXXX:LABEL.
 */
export function buildId3Tags(values: YearLabelValues): NodeID3.Tags {
  const tags: NodeID3.Tags = {};

  if (values.year !== null) {
    tags.year = values.year;
    tags.recordingTime = values.year;
  }

  if (values.label !== null) {
    tags.publisher = values.label;
    tags.userDefinedText = [{ description: 'LABEL', value: values.label }];
  }

  return tags;
}

export function buildId3Image(image: ImageData): NodeID3.Tags {
  return {
    image: {
      mime: image.mimeType,
      type: { id: 3, name: 'front cover' },
      description: 'Cover',
      imageBuffer: image.data,
    },
  };
}

function updateId3(filePath: string, tags: NodeID3.Tags): void {
  const result = NodeID3.update(tags, filePath);
  if (result instanceof Error) {
    throw result;
  }
}

// ─── FLAC Metadata Blocks ─────────────────────────────────────────────────────

const FLAC_MAGIC = 'fLaC';
const FLAC_BLOCK_TYPE_PADDING = 1;
const FLAC_BLOCK_TYPE_VORBIS_COMMENT = 4;
const FLAC_BLOCK_TYPE_PICTURE = 6;
const VORBIS_VENDOR = 'crate-tagger';

export interface FlacBlock {
  type: number;
  data: Buffer;
}

/** Parses FLAC metadata blocks; returns blocks and the byte offset where audio frames begin. */
export function parseFlacBlocks(fileData: Buffer): { blocks: FlacBlock[]; audioOffset: number } {
  if (fileData.length < 4 || fileData.toString('ascii', 0, 4) !== FLAC_MAGIC) {
    throw new Error('Not a valid FLAC file (missing fLaC magic)');
  }
  const blocks: FlacBlock[] = [];
  let offset = 4;
  while (offset + 4 <= fileData.length) {
    const headerByte = fileData[offset];
    const isLast = (headerByte & 0x80) !== 0;
    const type = headerByte & 0x7f;
    const length = (fileData[offset + 1] << 16) | (fileData[offset + 2] << 8) | fileData[offset + 3];
    offset += 4;
    if (offset + length > fileData.length) throw new Error('Truncated FLAC metadata block');
    blocks.push({ type, data: Buffer.from(fileData.subarray(offset, offset + length)) });
    offset += length;
    if (isLast) break;
  }
  return { blocks, audioOffset: offset };
}

/** Parses a Vorbis Comment block into a key→values map (keys uppercased). */
export function parseVorbisComments(data: Buffer): Map<string, string[]> {
  const result = new Map<string, string[]>();
  let offset = 0;
  if (offset + 4 > data.length) return result;
  const vendorLen = data.readUInt32LE(offset);
  offset += 4 + vendorLen;
  if (offset + 4 > data.length) return result;
  const count = data.readUInt32LE(offset);
  offset += 4;
  for (let i = 0; i < count; i++) {
    if (offset + 4 > data.length) break;
    const len = data.readUInt32LE(offset);
    offset += 4;
    if (offset + len > data.length) break;
    const comment = data.subarray(offset, offset + len).toString('utf8');
    offset += len;
    const eqIdx = comment.indexOf('=');
    if (eqIdx < 0) continue;
    const key = comment.slice(0, eqIdx).toUpperCase();
    const existing = result.get(key) ?? [];
    existing.push(comment.slice(eqIdx + 1));
    result.set(key, existing);
  }
  return result;
}

/** Serialises a key→values map into a Vorbis Comment block buffer. */
export function buildVorbisComments(comments: Map<string, string[]>): Buffer {
  const vendor = Buffer.from(VORBIS_VENDOR, 'utf8');
  const vendorLen = Buffer.allocUnsafe(4);
  vendorLen.writeUInt32LE(vendor.length, 0);
  const entries: Buffer[] = [];
  let totalCount = 0;
  for (const [key, values] of comments) {
    for (const val of values) {
      const entry = Buffer.from(`${key}=${val}`, 'utf8');
      const lenBuf = Buffer.allocUnsafe(4);
      lenBuf.writeUInt32LE(entry.length, 0);
      entries.push(lenBuf, entry);
      totalCount++;
    }
  }
  const countBuf = Buffer.allocUnsafe(4);
  countBuf.writeUInt32LE(totalCount, 0);
  return Buffer.concat([vendorLen, vendor, countBuf, ...entries]);
}

/** Builds a FLAC METADATA_BLOCK_PICTURE body (front cover = type 3). */
export function buildFlacPicture(image: ImageData): Buffer {
  const { width, height, depth } = getImageDimensions(image.data, image.mimeType);
  const mimeBytes = Buffer.from(image.mimeType, 'ascii');
  // pic type + mime len + mime + desc len + width + height + depth + colours + data len
  const header = Buffer.allocUnsafe(4 + 4 + mimeBytes.length + 4 * 6);
  let pos = 0;
  header.writeUInt32BE(3, pos); pos += 4;
  header.writeUInt32BE(mimeBytes.length, pos); pos += 4;
  mimeBytes.copy(header, pos); pos += mimeBytes.length;
  header.writeUInt32BE(0, pos); pos += 4; // empty description
  header.writeUInt32BE(width, pos); pos += 4;
  header.writeUInt32BE(height, pos); pos += 4;
  header.writeUInt32BE(depth, pos); pos += 4;
  header.writeUInt32BE(0, pos); pos += 4;
  header.writeUInt32BE(image.data.length, pos);
  return Buffer.concat([header, image.data]);
}

/** Serialises FLAC metadata blocks + audio data back into a complete file buffer. */
export function serializeFlacBlocks(blocks: FlacBlock[], audioData: Buffer): Buffer {
  const parts: Buffer[] = [Buffer.from(FLAC_MAGIC, 'ascii')];
  for (let i = 0; i < blocks.length; i++) {
    const block = blocks[i];
    const isLast = i === blocks.length - 1;
    const header = Buffer.allocUnsafe(4);
    header[0] = (isLast ? 0x80 : 0x00) | (block.type & 0x7f);
    header[1] = (block.data.length >> 16) & 0xff;
    header[2] = (block.data.length >> 8) & 0xff;
    header[3] = block.data.length & 0xff;
    parts.push(header, block.data);
  }
  parts.push(audioData);
  return Buffer.concat(parts);
}

/**
 * Reads a FLAC file, lets `edit` replace its block list, and writes it back.
 * Old padding is dropped.
 */
async function rewriteFlac(filePath: string, edit: (blocks: FlacBlock[]) => FlacBlock[]): Promise<void> {
  const fileData = await fs.promises.readFile(filePath);
  const { blocks, audioOffset } = parseFlacBlocks(fileData);
  const kept = blocks.filter((block) => block.type !== FLAC_BLOCK_TYPE_PADDING);
  await fs.promises.writeFile(filePath, serializeFlacBlocks(edit(kept), fileData.subarray(audioOffset)));
}

/**
 * Sets DATE/YEAR and LABEL/PUBLISHER, keeping every other comment.
 */
export function applyVorbisYearLabel(blocks: FlacBlock[], values: YearLabelValues): FlacBlock[] {
  const vcBlock = blocks.find((b) => b.type === FLAC_BLOCK_TYPE_VORBIS_COMMENT);
  const comments = vcBlock ? parseVorbisComments(vcBlock.data) : new Map<string, string[]>();

  if (values.year !== null) {
    for (const field of VORBIS_FIELDS.yearFields) comments.set(field, [values.year]);
  }
  if (values.label !== null) {
    for (const field of VORBIS_FIELDS.labelFields) comments.set(field, [values.label]);
  }

  const others = blocks.filter((b) => b.type !== FLAC_BLOCK_TYPE_VORBIS_COMMENT);
  return [...others, { type: FLAC_BLOCK_TYPE_VORBIS_COMMENT, data: buildVorbisComments(comments) }];
}

/** Replaces every PICTURE block with a single front cover. */
export function applyFlacPicture(blocks: FlacBlock[], image: ImageData): FlacBlock[] {
  const others = blocks.filter((b) => b.type !== FLAC_BLOCK_TYPE_PICTURE);
  return [...others, { type: FLAC_BLOCK_TYPE_PICTURE, data: buildFlacPicture(image) }];
}

// ─── Default Writer ───────────────────────────────────────────────────────────

/** Formats with a tag writer available */
const WRITABLE_FORMATS: ReadonlySet<AudioFormat> = new Set(['mp3', 'flac']);

/**
 * Writes MP3 (node-id3) and FLAC (block rewrite). Every other format has a
 * mapping in FORMAT_TAG_MAP but no writer, so it is reported as unsupported.
 */
export class FileTagWriter implements TagWriter {
  supportsTags(format: AudioFormat | null): boolean {
    return format !== null && WRITABLE_FORMATS.has(format);
  }

  supportsArt(format: AudioFormat | null): boolean {
    return this.supportsTags(format) && getTagMapping(format)?.artCapability === true;
  }

  async writeYearLabel(filePath: string, format: AudioFormat, values: YearLabelValues): Promise<WriteTagsResult> {
    if (!this.supportsTags(format)) {
      return failed(filePath, `No tag writer for ${format.toUpperCase()}`);
    }
    if (values.year === null && values.label === null) {
      return ok(filePath);
    }

    try {
      await withWritableFile(filePath, async () => {
        if (format === 'mp3') {
          updateId3(filePath, buildId3Tags(values));
        } else {
          await rewriteFlac(filePath, (blocks) => applyVorbisYearLabel(blocks, values));
        }
      });
      return ok(filePath);
    } catch (error: unknown) {
      return failed(filePath, errorMessage(error));
    }
  }

  async embedArt(filePath: string, format: AudioFormat, image: ImageData): Promise<WriteTagsResult> {
    if (!this.supportsArt(format)) {
      return failed(filePath, `No art writer for ${format.toUpperCase()}`);
    }

    try {
      await withWritableFile(filePath, async () => {
        if (format === 'mp3') {
          updateId3(filePath, buildId3Image(image));
        } else {
          await rewriteFlac(filePath, (blocks) => applyFlacPicture(blocks, image));
        }
      });
      return ok(filePath);
    } catch (error: unknown) {
      return failed(filePath, errorMessage(error));
    }
  }
}
