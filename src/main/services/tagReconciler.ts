/**
 * Tag Reconciler
 *
 * Decides which Year and Label to write for a matched catalog record and
 * whether the file already holds them. Field lookups go through
 * FORMAT_TAG_MAP, so adding a format never touches this module.
 */

import { AudioFormat, CatalogRecord, TagStatus } from '../../shared/types';
import { cleanYear, normalizeTagValue } from '../utils/textNormalizer';
import { FormatTagMapping, TagWriter, getTagMapping } from './tagWriter';

/** Values chosen from the record plus the resulting tag status */
export interface TagOutcome {
  writeYear: string | null;
  writeLabel: string | null;
  status: TagStatus;
}

/**
 * First non-empty label in catalog order, trimmed.
 */
export function chooseLabel(labels: readonly string[]): string | null {
  for (const label of labels) {
    const trimmed = normalizeTagValue(label);
    if (trimmed) return trimmed;
  }
  return null;
}

function allFieldsEqual(fields: Readonly<Record<string, string>>, names: readonly string[], expected: string): boolean {
  return names.every((name) => normalizeTagValue(fields[name]) === expected);
}

/**
 * True when every mapped field already holds the value to write.
 * A null value needs no write.
 */
export function isAlreadyTagged(
  fields: Readonly<Record<string, string>>,
  mapping: FormatTagMapping,
  year: string | null,
  label: string | null,
): boolean {
  const yearOk = year === null || allFieldsEqual(fields, mapping.yearFields, year);
  const labelOk = label === null || allFieldsEqual(fields, mapping.labelFields, label);
  return yearOk && labelOk;
}

/**
 * Reconciles Year/Label for one file and performs the write when needed.
 */
export async function reconcileTags(
  filePath: string,
  format: AudioFormat | null,
  fields: Readonly<Record<string, string>>,
  record: CatalogRecord,
  writer: TagWriter,
): Promise<TagOutcome> {
  const writeYear = cleanYear(record.year);
  const writeLabel = chooseLabel(record.labels);

  const mapping = getTagMapping(format);
  if (format === null || mapping === null) {
    return { writeYear, writeLabel, status: 'unsupported_format' };
  }

  if (isAlreadyTagged(fields, mapping, writeYear, writeLabel)) {
    return { writeYear, writeLabel, status: 'unchanged' };
  }

  if (!writer.supportsTags(format)) {
    return { writeYear, writeLabel, status: 'unsupported_format' };
  }

  const result = await writer.writeYearLabel(filePath, format, { year: writeYear, label: writeLabel });
  if (!result.success) {
    return { writeYear, writeLabel, status: `write_failed: ${result.error ?? 'unknown error'}` };
  }
  return { writeYear, writeLabel, status: 'updated' };
}
