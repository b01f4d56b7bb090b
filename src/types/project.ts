/** A single sung syllable. Ticks are UST ticks (480 per quarter note). */
export interface Note {
  length: number;
  lyric: string;
  noteNum: number;        // pitch index (MIDI number)
  preUtterance: number;
  velocity: number;       // consonant speed, 100 = unchanged
  intensity: number;
  modulation: number;     // pitch-bend depth, percent
  startPoint: number;     // absolute tick offset
}

export type NoteInit = Partial<Note> & Pick<Note, 'length' | 'lyric' | 'noteNum'>;

/** A raw `key=value` line of a UST `[#SETTING]` chunk. */
export interface SettingEntry {
  key: string;
  value: string;
}

export interface ProjectFields {
  version: string;
  tempo: number;          // beats per minute
  tracks: number;
  name: string;
  voiceDir: string;
  outFile: string;
  cacheDir: string;
  tools: string[];
  modes: string[];
  flags: string[];
  settings: SettingEntry[];
}

export interface ProjectInit extends Partial<ProjectFields> {
  notes?: NoteInit[];
}

/** Plain-data form of a project, as persisted. */
export interface ProjectSnapshot extends ProjectFields {
  notes: Note[];
}
