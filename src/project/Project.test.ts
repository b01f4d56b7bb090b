import { describe, it, expect } from 'vitest';
import { Project, createNote, findInsertIndex } from './Project.js';
import type { Note } from '../types/project.js';

function note(lyric: string, startPoint: number): Note {
  const created = createNote({ length: 480, lyric, noteNum: 60, startPoint });
  if (!created.ok) throw created.error;
  return created.value;
}

function emptyProject(): Project {
  const created = Project.create();
  if (!created.ok) throw created.error;
  return created.value;
}

function withNotes(project: Project, ...notes: Note[]): Project {
  const added = project.addNote(...notes);
  if (!added.ok) throw added.error;
  return added.value;
}

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items];
  return items.flatMap((item, i) =>
    permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest]),
  );
}

// ── createNote ───────────────────────────────────────────────────────────────

describe('createNote', () => {
  it('fills optional fields with their defaults', () => {
    const result = createNote({ length: 480, lyric: 'a', noteNum: 60 });
    expect(result).toEqual({
      ok: true,
      value: {
        length: 480,
        lyric: 'a',
        noteNum: 60,
        preUtterance: 0,
        velocity: 100,
        intensity: 0,
        modulation: 0,
        startPoint: 0,
      },
    });
  });

  it('rejects a negative length with a field-level failure', () => {
    const result = createNote({ length: -1, lyric: 'a', noteNum: 60 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('MALFORMED_INPUT');
    expect(result.error.field).toBe('length');
    expect(result.error.found).toBe(-1);
  });

  it('rejects a fractional note number', () => {
    const result = createNote({ length: 10, lyric: 'a', noteNum: 60.5 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.field).toBe('noteNum');
  });
});

// ── Project.create ───────────────────────────────────────────────────────────

describe('Project.create', () => {
  it('applies project defaults', () => {
    const project = emptyProject();
    expect(project.version).toBe('');
    expect(project.tempo).toBe(120);
    expect(project.tracks).toBe(1);
    expect(project.name).toBe('Untitled');
    expect(project.voiceDir).toBe('');
    expect(project.tools).toEqual([]);
    expect(project.modes).toEqual([]);
    expect(project.flags).toEqual([]);
    expect(project.isEmpty).toBe(true);
  });

  it('rejects a non-positive tempo', () => {
    const result = Project.create({ tempo: 0 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.field).toBe('tempo');
  });

  it('reports the index of an invalid note', () => {
    const result = Project.create({
      notes: [
        { length: 1, lyric: 'a', noteNum: 1 },
        { length: 1, lyric: 'b', noteNum: -3 },
      ],
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.field).toBe('notes.1.noteNum');
    expect(result.error.message.startsWith('notes[1]: ')).toBe(true);
  });

  it('keeps duplicate list entries in order', () => {
    const result = Project.create({ tools: ['wavtool', 'wavtool'], flags: ['g-5', 'B40', 'g-5'] });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.tools).toEqual(['wavtool', 'wavtool']);
    expect(result.value.flags).toEqual(['g-5', 'B40', 'g-5']);
  });
});

// ── findInsertIndex ──────────────────────────────────────────────────────────

describe('findInsertIndex', () => {
  it('inserts into an empty list at 0', () => {
    expect(findInsertIndex([], 100)).toBe(0);
  });

  it('puts values before the first start point at the front', () => {
    expect(findInsertIndex([10, 20, 30], 5)).toBe(0);
  });

  it('puts a tie with the first start point at the front', () => {
    expect(findInsertIndex([10, 20, 30], 10)).toBe(0);
  });

  it('puts values at or after the last start point at the end', () => {
    expect(findInsertIndex([10, 20, 30], 30)).toBe(3);
    expect(findInsertIndex([10, 20, 30], 45)).toBe(3);
  });

  it('puts inner values before the next greater start point', () => {
    expect(findInsertIndex([10, 20, 30], 15)).toBe(1);
  });

  it('puts a tie with an inner value after the run of equal values', () => {
    expect(findInsertIndex([10, 20, 30], 20)).toBe(2);
    expect(findInsertIndex([10, 20, 20, 30], 20)).toBe(3);
  });
});

// ── note management ──────────────────────────────────────────────────────────

describe('Project.addNote', () => {
  it('keeps notes ascending for every insertion order', () => {
    const starts = [40, 0, 20, 20, 10];
    for (const order of permutations(starts)) {
      const project = emptyProject();
      order.forEach((sp, i) => withNotes(project, note(`n${i}`, sp)));
      expect(project.notes.map((n) => n.startPoint)).toEqual([0, 10, 20, 20, 40]);
    }
  });

  it('keeps notes ascending when added in one call', () => {
    const project = withNotes(emptyProject(), note('a', 30), note('b', 5), note('c', 15));
    expect(project.notes.map((n) => n.lyric)).toEqual(['b', 'c', 'a']);
  });

  it('places inner ties after existing equal notes', () => {
    const project = withNotes(emptyProject(), note('a', 10), note('b', 20), note('c', 30));
    withNotes(project, note('d', 20));
    expect(project.notes.map((n) => n.lyric)).toEqual(['a', 'b', 'd', 'c']);
  });

  it('places a tie with the earliest note in front of it', () => {
    const project = withNotes(emptyProject(), note('a', 10), note('b', 20));
    withNotes(project, note('e', 10));
    expect(project.notes.map((n) => n.lyric)).toEqual(['e', 'a', 'b']);
  });

  it('places a tie with the latest note behind it', () => {
    const project = withNotes(emptyProject(), note('a', 10), note('b', 20));
    withNotes(project, note('f', 20));
    expect(project.notes.map((n) => n.lyric)).toEqual(['a', 'b', 'f']);
  });

  it('stacks notes sharing start point 0 in reverse insertion order', () => {
    const project = withNotes(emptyProject(), note('x', 0), note('y', 0), note('z', 0));
    expect(project.notes.map((n) => n.lyric)).toEqual(['z', 'y', 'x']);
  });

  it('rejects a start point that is not a number and leaves the project unchanged', () => {
    const project = withNotes(emptyProject(), note('a', 0), note('b', 100));
    const result = project.addNote({ ...note('x', 0), startPoint: NaN });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('MALFORMED_INPUT');
    expect(result.error.field).toBe('notes.0.startPoint');
    expect(project.notes.map((n) => n.lyric)).toEqual(['a', 'b']);
  });

  it('inserts nothing when any note of the call is invalid', () => {
    const project = withNotes(emptyProject(), note('a', 0), note('b', 100));
    const result = project.addNote(note('ok', 50), { ...note('neg', 0), startPoint: -50 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.field).toBe('notes.1.startPoint');
    expect(project.notes.map((n) => n.lyric)).toEqual(['a', 'b']);
  });

  it('keeps its own copies of inserted notes', () => {
    const a = note('a', 0);
    const b = note('b', 100);
    const project = withNotes(emptyProject(), a, b);
    a.startPoint = 500;
    expect(project.notes.map((n) => n.startPoint)).toEqual([0, 100]);
  });

  it('hands out notes that cannot be modified', () => {
    const project = withNotes(emptyProject(), note('a', 0), note('b', 100));
    expect(Object.isFrozen(project.getNote(1))).toBe(true);
    expect(Reflect.set(project.notes[1], 'startPoint', -3)).toBe(false);
    expect(project.notes.map((n) => n.startPoint)).toEqual([0, 100]);
  });
});

describe('Project.removeNoteByIndex', () => {
  it('removes the note at the index', () => {
    const project = withNotes(emptyProject(), note('a', 0), note('b', 10), note('c', 20));
    const result = project.removeNoteByIndex(1);
    expect(result.ok).toBe(true);
    expect(project.notes.map((n) => n.lyric)).toEqual(['a', 'c']);
  });

  it('reports an index beyond the note count and leaves the project unchanged', () => {
    const project = withNotes(emptyProject(), note('a', 0), note('b', 10));
    const result = project.removeNoteByIndex(2);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('NOT_FOUND');
    expect(result.error.message).toBe('Note index 2 out of range (project has 2 notes)');
    expect(project.notes.map((n) => n.lyric)).toEqual(['a', 'b']);
  });

  it('reports a negative index', () => {
    const project = withNotes(emptyProject(), note('a', 0));
    expect(project.removeNoteByIndex(-1).ok).toBe(false);
    expect(project.noteCount).toBe(1);
  });
});

describe('Project.getNote', () => {
  it('returns the note at the index', () => {
    const project = withNotes(emptyProject(), note('a', 0), note('b', 10));
    expect(project.getNote(1)?.lyric).toBe('b');
  });

  it('returns undefined out of range', () => {
    const project = withNotes(emptyProject(), note('a', 0));
    expect(project.getNote(1)).toBeUndefined();
    expect(project.getNote(-1)).toBeUndefined();
  });
});

describe('Project.sortNotes', () => {
  it('sorts descending and back, keeping equal notes in their order', () => {
    // a(10), b(20) then c(10) lands in front: c, a, b
    const project = withNotes(emptyProject(), note('a', 10), note('b', 20), note('c', 10));
    expect(project.notes.map((n) => n.lyric)).toEqual(['c', 'a', 'b']);

    project.sortNotes(true);
    expect(project.notes.map((n) => n.lyric)).toEqual(['b', 'c', 'a']);

    project.sortNotes();
    expect(project.notes.map((n) => n.lyric)).toEqual(['c', 'a', 'b']);
  });
});

describe('Project.restore', () => {
  it('keeps the stored order of equal start points', () => {
    const snapshot = emptyProject().toJSON();
    snapshot.notes = [note('p', 0), note('q', 0), note('r', 5)];
    const result = Project.restore(snapshot);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.notes.map((n) => n.lyric)).toEqual(['p', 'q', 'r']);
  });

  it('sorts stored notes that are out of order', () => {
    const snapshot = emptyProject().toJSON();
    snapshot.notes = [note('late', 50), note('early', 0)];
    const result = Project.restore(snapshot);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.notes.map((n) => n.lyric)).toEqual(['early', 'late']);
  });

  it('does not share note objects with the snapshot', () => {
    const snapshot = emptyProject().toJSON();
    snapshot.notes = [note('a', 0), note('b', 10)];
    const result = Project.restore(snapshot);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    snapshot.notes[0].startPoint = 99;
    expect(result.value.notes.map((n) => n.startPoint)).toEqual([0, 10]);
    expect(Object.isFrozen(result.value.getNote(0))).toBe(true);
  });

  it('rejects a snapshot with a mistyped field', () => {
    const result = Project.restore({ tempo: 'fast', notes: [] });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.field).toBe('tempo');
  });
});

describe('Project.toJSON', () => {
  it('returns copies, not live references', () => {
    const project = withNotes(emptyProject(), note('a', 0));
    const snapshot = project.toJSON();
    snapshot.notes[0].lyric = 'changed';
    snapshot.tools.push('x');
    expect(project.getNote(0)?.lyric).toBe('a');
    expect(project.tools).toEqual([]);
  });
});
