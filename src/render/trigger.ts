import { describeError } from '../errors.js';
import { silentLogger, type Logger } from '../log.js';
import type { Project } from '../project/Project.js';
import type { VoiceBank } from '../voicebank/VoiceBank.js';
import { planRender } from './planner.js';
import type { RenderOutcome, RenderPlan, SampleSource, VoiceRenderer } from './types.js';

/**
 * Target pitch per analysis frame: the note's frequency, carrying
 * `modulation` percent of the recorded contour's deviation from its mean.
 * Unvoiced frames (0 Hz) stay unvoiced.
 */
export function buildTargetPitch(frequencies: Float64Array, targetHz: number, modulation: number): Float64Array {
  let sum = 0;
  let voiced = 0;
  for (const f of frequencies) {
    if (f > 0) {
      sum += f;
      voiced++;
    }
  }
  const mean = voiced > 0 ? sum / voiced : targetHz;
  const depth = modulation / 100;
  return frequencies.map((f) => (f > 0 ? targetHz * Math.pow(f / mean, depth) : 0));
}

/**
 * Run every planned note through the renderer. A note whose sample cannot
 * be read or rendered is reported under `failed`; the rest still render.
 */
export function renderPlan(
  plan: RenderPlan,
  renderer: VoiceRenderer,
  samples: SampleSource,
  logger: Logger = silentLogger,
): RenderOutcome {
  const outcome: RenderOutcome = { rendered: [], failed: [], missing: [...plan.missing] };

  for (const planned of plan.notes) {
    try {
      const source = samples.read(planned.samplePath);
      const track = renderer.estimatePitch(source.samples, source.sampleRate);
      const target = buildTargetPitch(track.frequencies, planned.targetHz, planned.note.modulation);
      const output = renderer.resynthesize(
        source.samples,
        source.sampleRate,
        track.timestamps,
        track.frequencies,
        target,
        planned.speedRatio,
        0,
      );
      outcome.rendered.push({
        index: planned.index,
        lyric: planned.note.lyric,
        sampleRate: source.sampleRate,
        samples: output,
      });
    } catch (err) {
      const error = describeError(err);
      logger.error(`Note ${planned.index} ("${planned.note.lyric}") failed to render: ${error}`);
      outcome.failed.push({ index: planned.index, error });
    }
  }

  logger.info(
    `Rendered ${outcome.rendered.length}/${plan.notes.length + plan.missing.length} notes ` +
    `(${outcome.failed.length} failed, ${outcome.missing.length} without alias)`,
  );
  return outcome;
}

/** The zero-argument callback a front end binds to its "render" control. */
export function createRenderTrigger(
  project: Project,
  voiceBank: VoiceBank,
  renderer: VoiceRenderer,
  samples: SampleSource,
  logger: Logger = silentLogger,
): () => RenderOutcome {
  return () => renderPlan(planRender(project, voiceBank, logger), renderer, samples, logger);
}
