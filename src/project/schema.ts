import { z } from 'zod';
import { MalformedInputError } from '../errors.js';

const nonNegativeInt = z.number().int().nonnegative();

export const NoteSchema = z.object({
  length: nonNegativeInt,
  lyric: z.string(),
  noteNum: nonNegativeInt,
  preUtterance: nonNegativeInt.default(0),
  velocity: nonNegativeInt.default(100),
  intensity: nonNegativeInt.default(0),
  modulation: nonNegativeInt.default(0),
  startPoint: nonNegativeInt.default(0),
});

export const SettingEntrySchema = z.object({
  key: z.string(),
  value: z.string(),
});

export const ProjectFieldsSchema = z.object({
  version: z.string().default(''),
  tempo: z.number().finite().positive().default(120.0),
  tracks: z.number().int().min(1).default(1),
  name: z.string().default('Untitled'),
  voiceDir: z.string().default(''),
  outFile: z.string().default(''),
  cacheDir: z.string().default(''),
  tools: z.array(z.string()).default([]),
  modes: z.array(z.string()).default([]),
  flags: z.array(z.string()).default([]),
  settings: z.array(SettingEntrySchema).default([]),
});

export const ProjectSnapshotSchema = ProjectFieldsSchema.extend({
  notes: z.array(NoteSchema),
});

/** Turn the first schema issue into a MalformedInputError naming the field. */
export function toMalformedInput(subject: string, error: z.ZodError, input: unknown): MalformedInputError {
  const issue = error.issues[0];
  const field = issue ? issue.path.join('.') : '';
  const found = field ? readPath(input, issue.path) : input;
  const reason = issue ? issue.message : 'invalid value';
  return new MalformedInputError(
    `${subject}: field '${field}' ${reason} (found ${JSON.stringify(found)})`,
    field,
    found,
  );
}

function readPath(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = input;
  for (const key of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}
