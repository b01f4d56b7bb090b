import { MalformedInputError, NotFoundError, fail, ok, type Result } from '../errors.js';
import type { Note, NoteInit, ProjectFields, ProjectInit, ProjectSnapshot, SettingEntry } from '../types/project.js';
import { NoteSchema, ProjectFieldsSchema, ProjectSnapshotSchema, toMalformedInput } from './schema.js';

export function createNote(init: NoteInit): Result<Note, MalformedInputError> {
  const parsed = NoteSchema.safeParse(init);
  if (!parsed.success) return fail(toMalformedInput('Note', parsed.error, init));
  return ok(parsed.data);
}

/**
 * Index at which a note starting at `startPoint` goes into `startPoints`
 * (ascending).
 *
 * - at or before the first start point: front
 * - at or after the last: end
 * - otherwise: before the first strictly greater start point, i.e. after
 *   the run of equal values
 *
 * A tie with the first start point therefore lands in front of it, while a
 * tie with an inner value lands behind it.
 */
export function findInsertIndex(startPoints: readonly number[], startPoint: number): number {
  if (startPoints.length === 0) return 0;
  if (startPoint <= startPoints[0]) return 0;
  if (startPoint >= startPoints[startPoints.length - 1]) return startPoints.length;
  return startPoints.findIndex((sp) => sp > startPoint);
}

/** A song: settings plus notes kept in ascending `startPoint` order. */
export class Project implements ProjectFields {
  version: string;
  tempo: number;
  tracks: number;
  name: string;
  voiceDir: string;
  outFile: string;
  cacheDir: string;
  tools: string[];
  modes: string[];
  flags: string[];
  settings: SettingEntry[];
  private noteList: Readonly<Note>[] = [];

  private constructor(fields: ProjectFields) {
    this.version = fields.version;
    this.tempo = fields.tempo;
    this.tracks = fields.tracks;
    this.name = fields.name;
    this.voiceDir = fields.voiceDir;
    this.outFile = fields.outFile;
    this.cacheDir = fields.cacheDir;
    this.tools = [...fields.tools];
    this.modes = [...fields.modes];
    this.flags = [...fields.flags];
    this.settings = fields.settings.map((s) => ({ ...s }));
  }

  /** Validate every field and note, then build the project. */
  static create(init: ProjectInit = {}): Result<Project, MalformedInputError> {
    const { notes = [], ...fields } = init;
    const parsed = ProjectFieldsSchema.safeParse(fields);
    if (!parsed.success) return fail(toMalformedInput('Project', parsed.error, fields));

    return new Project(parsed.data).addNote(...notes);
  }

  /**
   * Rebuild a project from its snapshot, keeping the stored note order
   * (notes are only re-sorted, stably, rather than re-inserted).
   */
  static restore(snapshot: unknown): Result<Project, MalformedInputError> {
    const parsed = ProjectSnapshotSchema.safeParse(snapshot);
    if (!parsed.success) return fail(toMalformedInput('Project', parsed.error, snapshot));
    const { notes, ...fields } = parsed.data;
    const project = new Project(fields);
    project.noteList = notes.map((n) => Object.freeze({ ...n }));
    return ok(project.sortNotes());
  }

  get notes(): readonly Readonly<Note>[] {
    return this.noteList;
  }

  get noteCount(): number {
    return this.noteList.length;
  }

  get isEmpty(): boolean {
    return this.noteList.length === 0;
  }

  /**
   * Validate and insert notes, keeping ascending order (see
   * `findInsertIndex`). The project stores frozen copies. If any note is
   * invalid nothing is inserted.
   */
  addNote(...notes: NoteInit[]): Result<this, MalformedInputError> {
    const validNotes: Readonly<Note>[] = [];
    for (const [i, init] of notes.entries()) {
      const note = createNote(init);
      if (!note.ok) return fail(toIndexed(note.error, i));
      validNotes.push(Object.freeze({ ...note.value }));
    }

    this.sortNotes();
    for (const note of validNotes) {
      const index = findInsertIndex(this.noteList.map((n) => n.startPoint), note.startPoint);
      this.noteList.splice(index, 0, note);
    }
    return ok(this);
  }

  removeNoteByIndex(index: number): Result<this, NotFoundError> {
    if (!Number.isInteger(index) || index < 0 || index >= this.noteList.length) {
      return fail(new NotFoundError(
        `Note index ${index} out of range (project has ${this.noteList.length} notes)`,
        `notes[${index}]`,
      ));
    }
    this.noteList.splice(index, 1);
    return ok(this);
  }

  getNote(index: number): Readonly<Note> | undefined {
    if (!Number.isInteger(index) || index < 0) return undefined;
    return this.noteList[index];
  }

  /** Stable sort by `startPoint`. */
  sortNotes(descending = false): this {
    const sign = descending ? -1 : 1;
    this.noteList.sort((a, b) => sign * (a.startPoint - b.startPoint));
    return this;
  }

  toJSON(): ProjectSnapshot {
    return {
      version: this.version,
      tempo: this.tempo,
      tracks: this.tracks,
      name: this.name,
      voiceDir: this.voiceDir,
      outFile: this.outFile,
      cacheDir: this.cacheDir,
      tools: [...this.tools],
      modes: [...this.modes],
      flags: [...this.flags],
      settings: this.settings.map((s) => ({ ...s })),
      notes: this.noteList.map((n) => ({ ...n })),
    };
  }
}

function toIndexed(error: MalformedInputError, index: number): MalformedInputError {
  return new MalformedInputError(`notes[${index}]: ${error.message}`, `notes.${index}.${error.field ?? ''}`, error.found);
}
