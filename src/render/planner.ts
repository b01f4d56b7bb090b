import { dirname, join } from 'node:path';
import { silentLogger, type Logger } from '../log.js';
import type { Project } from '../project/Project.js';
import type { VoiceBank } from '../voicebank/VoiceBank.js';
import type { PlannedNote, RenderPlan } from './types.js';

export const TICKS_PER_BEAT = 480;
const A4_MIDI = 69;
const A4_HZ = 440;

export function midiToHz(noteNum: number): number {
  return A4_HZ * Math.pow(2, (noteNum - A4_MIDI) / 12);
}

export function ticksToMs(ticks: number, tempo: number): number {
  return (ticks * 60000) / (tempo * TICKS_PER_BEAT);
}

/** Consonant playback speed; velocity 100 plays as recorded, +100 doubles. */
export function velocityToSpeedRatio(velocity: number): number {
  return Math.pow(2, (velocity - 100) / 100);
}

/** Match every note's lyric to an OTO alias and derive its render inputs. */
export function planRender(project: Project, voiceBank: VoiceBank, logger: Logger = silentLogger): RenderPlan {
  const plan: RenderPlan = { tempo: project.tempo, notes: [], missing: [] };

  project.notes.forEach((note, index) => {
    const entry = voiceBank.findByAlias(note.lyric);
    if (!entry) {
      logger.warn(`No OTO alias "${note.lyric}" for note ${index}; it will be silent`);
      plan.missing.push({ index, lyric: note.lyric });
      return;
    }
    const setting = voiceBank.settingOf(entry);
    const baseDir = setting ? dirname(setting.path) : voiceBank.root;

    const planned: PlannedNote = {
      index,
      note,
      entry,
      samplePath: join(baseDir, entry.file),
      targetHz: midiToHz(note.noteNum),
      durationMs: ticksToMs(note.length, project.tempo),
      speedRatio: velocityToSpeedRatio(note.velocity),
    };
    plan.notes.push(planned);
  });

  return plan;
}
