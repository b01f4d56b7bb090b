/** UTAU Sequence Text (UST) → Project. */

import { existsSync, readFileSync, statSync } from 'node:fs';
import type { CoreConfig } from '../config.js';
import { NotFoundError, ParseError, describeError, fail, ok, type Result } from '../errors.js';
import { silentLogger, type Logger } from '../log.js';
import { Project, createNote } from '../project/Project.js';
import type { Note, ProjectFields, SettingEntry } from '../types/project.js';
import { decodeText, splitLines } from '../text.js';

export interface UstChunk {
  header: string;   // raw header line, e.g. "[#0001]"
  name: string;     // normalized: brackets and leading '#' removed, lower case
  lines: string[];  // trimmed body lines
}

export function normalizeChunkName(header: string): string {
  return header
    .trim()
    .replace(/^\[/, '')
    .replace(/\]$/, '')
    .replace(/^#+/, '')
    .toLowerCase();
}

/**
 * Group lines into chunks. A repeated header replaces the earlier chunk's
 * body but keeps its position. Content before the first header is dropped.
 */
export function splitChunks(lines: readonly string[], logger: Logger = silentLogger): UstChunk[] {
  const chunks = new Map<string, UstChunk>();
  let current: UstChunk | undefined;

  for (const [i, line] of lines.entries()) {
    if (line.startsWith('[')) {
      const header = line.trim();
      current = { header, name: normalizeChunkName(header), lines: [] };
      chunks.set(header, current);
      continue;
    }
    const content = line.trim();
    if (current) {
      current.lines.push(content);
    } else if (content) {
      logger.warn(`Line ${i + 1} precedes any chunk header, skipped: "${content}"`);
    }
  }
  return [...chunks.values()];
}

function parseVersion(lines: readonly string[]): string {
  return lines.find((l) => l.length > 0) ?? '';
}

interface ParsedSetting {
  fields: Partial<ProjectFields>;
  settings: SettingEntry[];
  tools: string[];
  modes: string[];
  flags: string[];
}

function parseSetting(lines: readonly string[], logger: Logger): ParsedSetting {
  const result: ParsedSetting = { fields: {}, settings: [], tools: [], modes: [], flags: [] };

  for (const line of lines) {
    if (!line) continue;
    const eq = line.indexOf('=');
    if (eq < 0) {
      logger.warn(`[#SETTING] line without '=' skipped: "${line}"`);
      continue;
    }
    const key = line.slice(0, eq);
    const value = line.slice(eq + 1);

    if (key.startsWith('Tool')) result.tools.push(value);
    else if (key.startsWith('Mode')) result.modes.push(value);
    else if (key.startsWith('Flags')) result.flags.push(value);
    result.settings.push({ key, value });

    switch (key) {
      case 'Tempo': {
        const tempo = Number(value);
        if (value.trim() && Number.isFinite(tempo) && tempo > 0) {
          result.fields.tempo = tempo;
        } else {
          logger.warn(`Tempo: expected a positive number, found "${value}"; keeping default`);
        }
        break;
      }
      case 'Tracks': {
        const tracks = Number(value);
        if (value.trim() && Number.isInteger(tracks) && tracks >= 1) {
          result.fields.tracks = tracks;
        } else {
          logger.warn(`Tracks: expected a positive integer, found "${value}"; keeping default`);
        }
        break;
      }
      case 'ProjectName':
        result.fields.name = value;
        break;
      case 'VoiceDir':
        result.fields.voiceDir = value;
        break;
      case 'OutFile':
        result.fields.outFile = value;
        break;
      case 'CacheDir':
        result.fields.cacheDir = value;
        break;
    }
  }
  return result;
}

function coerceCount(raw: string | undefined, key: string, chunk: string, logger: Logger): number {
  if (raw === undefined || raw.trim() === '') return 0;
  const n = Number(raw);
  if (Number.isInteger(n) && n >= 0) return n;
  logger.warn(`${chunk} ${key}: expected a non-negative integer, found "${raw}"; using 0`);
  return 0;
}

function parseNote(chunk: UstChunk, logger: Logger): Note | undefined {
  if (chunk.lines.every((l) => l === '')) return undefined;

  const pairs = new Map<string, string>();
  for (const line of chunk.lines) {
    const parts = line.split('=');
    if (parts.length !== 2) {
      if (line) logger.warn(`${chunk.header} line skipped, expected exactly one '=': "${line}"`);
      continue;
    }
    pairs.set(parts[0], parts[1]);
  }

  const count = (key: string) => coerceCount(pairs.get(key), key, chunk.header, logger);
  const note = createNote({
    length: count('Length'),
    lyric: pairs.get('Lyric') ?? '',
    noteNum: count('NoteNum'),
    preUtterance: count('PreUtterance'),
    velocity: count('Velocity'),
    intensity: count('Intensity'),
    modulation: count('Modulation'),
    startPoint: count('StartPoint'),
  });
  if (!note.ok) {
    logger.warn(`${chunk.header} dropped: ${note.error.message}`);
    return undefined;
  }
  return note.value;
}

function isNoteChunk(name: string): boolean {
  return /^\d+$/.test(name);
}

function isRecognized(chunk: UstChunk): boolean {
  return chunk.name === 'version' || chunk.name === 'setting' || isNoteChunk(chunk.name);
}

/**
 * Parse UST text. Fails when no chunk is a version, setting or note chunk;
 * anything malformed inside a chunk is replaced by its default and logged.
 */
export function parseUst(text: string, logger: Logger = silentLogger, source = '<text>'): Result<Project, ParseError> {
  const chunks = splitChunks(splitLines(text), logger);
  if (chunks.length === 0) {
    return fail(new ParseError(`${source}: no UST chunk headers found`, source));
  }
  if (!chunks.some(isRecognized)) {
    const headers = chunks.map((c) => c.header).join(', ');
    return fail(new ParseError(`${source}: no version, setting or note chunk found (saw ${headers})`, source));
  }

  let version = '';
  let setting: ParsedSetting = { fields: {}, settings: [], tools: [], modes: [], flags: [] };
  const notes: Note[] = [];

  for (const chunk of chunks) {
    if (chunk.name === 'version') {
      version = parseVersion(chunk.lines);
    } else if (chunk.name === 'setting') {
      setting = parseSetting(chunk.lines, logger);
    } else if (isNoteChunk(chunk.name)) {
      const note = parseNote(chunk, logger);
      if (note) notes.push(note);
    }
  }

  const created = Project.create({
    ...setting.fields,
    version,
    tools: setting.tools,
    modes: setting.modes,
    flags: setting.flags,
    settings: setting.settings,
  });
  if (!created.ok) {
    return fail(new ParseError(`${source}: ${created.error.message}`, source));
  }

  const added = created.value.addNote(...notes);
  if (!added.ok) {
    return fail(new ParseError(`${source}: ${added.error.message}`, source));
  }
  const project = added.value;
  logger.info(`Parsed ${source}: ${project.noteCount} notes, tempo ${project.tempo}`);
  return ok(project);
}

export function loadUstFile(path: string, config: CoreConfig): Result<Project, ParseError | NotFoundError> {
  if (!existsSync(path) || !statSync(path).isFile()) {
    config.logger.error(`UST file not found: ${path}`);
    return fail(new NotFoundError(`${path} is not a file, or does not exist`, path));
  }
  let text: string;
  try {
    text = decodeText(readFileSync(path), config.encoding);
  } catch (err) {
    const error = new ParseError(`${path}: could not be read (${describeError(err)})`, path, { cause: err });
    config.logger.error(error.message);
    return fail(error);
  }
  const result = parseUst(text, config.logger, path);
  if (!result.ok) config.logger.error(result.error.message);
  return result;
}
