/** Project → UST text. */

import { existsSync, statSync, writeFileSync } from 'node:fs';
import type { CoreConfig } from '../config.js';
import { PreconditionError, describeError, fail, ok, type Result } from '../errors.js';
import type { Project } from '../project/Project.js';
import { encodeText } from '../text.js';

const FIELD_KEYS = ['Tempo', 'Tracks', 'ProjectName', 'VoiceDir', 'OutFile', 'CacheDir'];
const LIST_PREFIXES = ['Tool', 'Mode', 'Flags'] as const;

type ListPrefix = (typeof LIST_PREFIXES)[number];

// Reuse the keys the list values were read under, e.g. "Mode2".
function listKeys(project: Project, prefix: ListPrefix, count: number): string[] {
  const seen = project.settings.map((s) => s.key).filter((k) => k.startsWith(prefix));
  return Array.from({ length: count }, (_, i) =>
    seen[i] ?? (prefix === 'Flags' && i === 0 ? 'Flags' : `${prefix}${i + 1}`),
  );
}

function listValues(project: Project, prefix: ListPrefix): string[] {
  switch (prefix) {
    case 'Tool':
      return project.tools;
    case 'Mode':
      return project.modes;
    case 'Flags':
      return project.flags;
  }
}

/**
 * UST lines are `key=value` with exactly one `=`, so a lyric holding `=` or
 * a line break is written as-is but will not read back. `saveUstFile`
 * rejects such projects.
 */
export function formatUst(project: Project): string {
  const lines: string[] = ['[#VERSION]', project.version, '[#SETTING]'];

  lines.push(
    `Tempo=${project.tempo.toFixed(2)}`,
    `Tracks=${project.tracks}`,
    `ProjectName=${project.name}`,
    `VoiceDir=${project.voiceDir}`,
    `OutFile=${project.outFile}`,
    `CacheDir=${project.cacheDir}`,
  );
  for (const prefix of LIST_PREFIXES) {
    const values = listValues(project, prefix);
    const keys = listKeys(project, prefix, values.length);
    values.forEach((value, i) => lines.push(`${keys[i]}=${value}`));
  }
  for (const { key, value } of project.settings) {
    if (FIELD_KEYS.includes(key) || LIST_PREFIXES.some((p) => key.startsWith(p))) continue;
    lines.push(`${key}=${value}`);
  }

  project.notes.forEach((note, i) => {
    lines.push(
      `[#${String(i).padStart(4, '0')}]`,
      `Length=${note.length}`,
      `Lyric=${note.lyric}`,
      `NoteNum=${note.noteNum}`,
      `PreUtterance=${note.preUtterance}`,
      `Velocity=${note.velocity}`,
      `Intensity=${note.intensity}`,
      `Modulation=${note.modulation}`,
      `StartPoint=${note.startPoint}`,
    );
  });
  lines.push('[#TRACKEND]');

  return lines.join('\r\n') + '\r\n';
}

/** Index of the first note whose lyric cannot be written as a UST line. */
function findUnwritableLyric(project: Project): number {
  return project.notes.findIndex((note) => /[=\r\n]/.test(note.lyric));
}

export function saveUstFile(project: Project, path: string, config: CoreConfig): Result<string, PreconditionError> {
  if (existsSync(path) && statSync(path).isDirectory()) {
    return fail(new PreconditionError(`UST output path ${path} is a directory`));
  }
  const bad = findUnwritableLyric(project);
  if (bad >= 0) {
    return fail(new PreconditionError(
      `Note ${bad} lyric ${JSON.stringify(project.notes[bad]?.lyric)} contains '=' or a line break`,
    ));
  }
  try {
    writeFileSync(path, encodeText(formatUst(project), config.encoding));
  } catch (err) {
    const error = new PreconditionError(`UST output path ${path} could not be written (${describeError(err)})`, { cause: err });
    config.logger.error(error.message);
    return fail(error);
  }
  config.logger.info(`Wrote ${project.noteCount} notes to ${path}`);
  return ok(path);
}
