import type { Note } from '../types/project.js';
import type { OtoEntry } from '../types/oto.js';

export interface PitchTrack {
  timestamps: Float64Array;   // seconds
  frequencies: Float64Array;  // Hz, 0 where unvoiced
}

/**
 * Pitch tracking and vocoder resynthesis, implemented outside the core
 * (a neural pitch tracker and a WORLD-style vocoder in practice).
 */
export interface VoiceRenderer {
  estimatePitch(samples: Float32Array, sampleRate: number): PitchTrack;
  resynthesize(
    samples: Float32Array,
    sampleRate: number,
    timestamps: Float64Array,
    frequencies: Float64Array,
    targetPitch: Float64Array,
    speedRatio: number,
    formantShift: number,
  ): Float32Array;
}

export interface DecodedSample {
  samples: Float32Array;
  sampleRate: number;
}

/** Reads a sample file into PCM; audio decoding happens outside the core. */
export interface SampleSource {
  read(path: string): DecodedSample;
}

export interface PlannedNote {
  index: number;
  note: Readonly<Note>;
  entry: Readonly<OtoEntry>;
  samplePath: string;
  targetHz: number;
  durationMs: number;
  speedRatio: number;
}

export interface RenderPlan {
  tempo: number;
  notes: PlannedNote[];
  /** Notes whose lyric has no OTO alias in the voicebank. */
  missing: { index: number; lyric: string }[];
}

export interface RenderedNote {
  index: number;
  lyric: string;
  sampleRate: number;
  samples: Float32Array;
}

export interface RenderOutcome {
  rendered: RenderedNote[];
  failed: { index: number; error: string }[];
  missing: RenderPlan['missing'];
}
