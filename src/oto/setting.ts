import { existsSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import type { CoreConfig } from '../config.js';
import { NotFoundError, PreconditionError, describeError, fail, ok, type Result } from '../errors.js';
import { decodeText, encodeText, splitLines } from '../text.js';
import type { OtoEntry, OtoField, OtoFieldValue } from '../types/oto.js';
import { defaultOtoEntry, formatOtoLine, getOtoField, parseOtoLine } from './entry.js';

/**
 * Every entry whose `field` equals `value`, in order. When nothing matches
 * the result is a single default entry, never an empty array; check it with
 * `isDefaultOtoEntry`.
 */
export function matchEntries<F extends OtoField>(
  entries: Iterable<Readonly<OtoEntry>>,
  field: F,
  value: OtoFieldValue<F>,
): Readonly<OtoEntry>[] {
  const matches: Readonly<OtoEntry>[] = [];
  for (const entry of entries) {
    if (getOtoField(entry, field) === value) matches.push(entry);
  }
  return matches.length > 0 ? matches : [defaultOtoEntry()];
}

/** The entries of one oto.ini file, held as frozen copies. */
export class OtoSetting {
  readonly entries: readonly Readonly<OtoEntry>[];

  constructor(
    entries: readonly OtoEntry[],
    readonly path: string,
  ) {
    this.entries = entries.map((e) => Object.freeze({ ...e }));
  }

  get size(): number {
    return this.entries.length;
  }

  findEntries<F extends OtoField>(field: F, value: OtoFieldValue<F>): Readonly<OtoEntry>[] {
    return matchEntries(this.entries, field, value);
  }

  toText(): string {
    return this.entries.map((e) => `${formatOtoLine(e)}\r\n`).join('');
  }
}

export function parseOtoText(text: string, path: string, config: Pick<CoreConfig, 'logger'>): OtoSetting {
  const entries = splitLines(text)
    .filter((line) => line.trim() !== '')
    .map((line) => parseOtoLine(line, config.logger));
  return new OtoSetting(entries, path);
}

export function loadOtoSetting(path: string, config: CoreConfig): Result<OtoSetting, NotFoundError> {
  if (!existsSync(path) || !statSync(path).isFile()) {
    config.logger.error(`OTO file not found: ${path}`);
    return fail(new NotFoundError(`${path} is not a file, or does not exist`, path));
  }
  let text: string;
  try {
    text = decodeText(readFileSync(path), config.encoding);
  } catch (err) {
    const error = new NotFoundError(`${path} could not be read (${describeError(err)})`, path, { cause: err });
    config.logger.error(error.message);
    return fail(error);
  }
  const setting = parseOtoText(text, path, config);
  config.logger.info(`Loaded ${setting.size} OTO entries from ${path}`);
  return ok(setting);
}

export function saveOtoSetting(setting: OtoSetting, path: string, config: CoreConfig): Result<string, PreconditionError> {
  if (existsSync(path) && statSync(path).isDirectory()) {
    return fail(new PreconditionError(`OTO output path ${path} is a directory`));
  }
  try {
    writeFileSync(path, encodeText(setting.toText(), config.encoding));
  } catch (err) {
    const error = new PreconditionError(`OTO output path ${path} could not be written (${describeError(err)})`, { cause: err });
    config.logger.error(error.message);
    return fail(error);
  }
  config.logger.info(`Saved ${setting.size} OTO entries to ${path}`);
  return ok(path);
}
