import { parse as parsePath } from 'node:path';
import { silentLogger, type Logger } from '../log.js';
import { OTO_FIELDS, type OtoEntry, type OtoField, type OtoFieldValue } from '../types/oto.js';

const NUMBER_PATTERN = /^-?(\d+\.?\d*|\.\d+)$/;
const NUMERIC_FIELD_COUNT = 5;

export function defaultOtoEntry(): OtoEntry {
  return { file: '', alias: '', offset: 0, fixed: 0, blank: 0, preutter: 0, overlap: 0 };
}

/** True for the placeholder `findEntries` returns when nothing matched. */
export function isDefaultOtoEntry(entry: OtoEntry): boolean {
  const blank = defaultOtoEntry();
  return OTO_FIELDS.every((f) => entry[f] === blank[f]);
}

export function getOtoField<F extends OtoField>(entry: OtoEntry, field: F): OtoFieldValue<F> {
  return entry[field];
}

function fileStem(file: string): string {
  return parsePath(file).name;
}

// Empty means 0; anything else must look like a plain decimal number.
function parseNumericGroup(fields: readonly string[]): number[] | undefined {
  const values: number[] = [];
  for (let i = 0; i < NUMERIC_FIELD_COUNT; i++) {
    const raw = (fields[i] ?? '').trim();
    if (raw === '') {
      values.push(0);
    } else if (NUMBER_PATTERN.test(raw)) {
      values.push(Number(raw));
    } else {
      return undefined;
    }
  }
  return values;
}

/**
 * Parse `file=alias,offset,fixed,blank,preutter,overlap`.
 *
 * Never rejects a line: a numeric group that does not parse is replaced by
 * zeros and reported through the logger.
 */
export function parseOtoLine(line: string, logger: Logger = silentLogger): OtoEntry {
  const text = line.trim();
  const eq = text.indexOf('=');
  const file = eq < 0 ? text : text.slice(0, eq);
  const rest = eq < 0 ? '' : text.slice(eq + 1);

  const parts = rest.split(',');
  const fields = [...parts.slice(0, 5), parts.slice(5).join(',')];
  const alias = fields[0] || fileStem(file);

  let numbers = parseNumericGroup(fields.slice(1));
  if (!numbers) {
    logger.warn(
      `Malformed OTO numbers in "${text}"; using offset=0, fixed=0, blank=0, preutter=0, overlap=0`,
    );
    numbers = [0, 0, 0, 0, 0];
  }
  const [offset, fixed, blank, preutter, overlap] = numbers;
  return { file, alias, offset, fixed, blank, preutter, overlap };
}

export function formatOtoLine(entry: OtoEntry): string {
  const { file, alias, offset, fixed, blank, preutter, overlap } = entry;
  return `${file}=${alias},${[offset, fixed, blank, preutter, overlap].join(',')}`;
}
