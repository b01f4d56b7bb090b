/** Public API: UST projects, OTO settings, voicebanks and project files. */

export { defineConfig, loadConfig, DEFAULT_PROJECT_EXTENSION } from './config.js';
export type { CoreConfig } from './config.js';
export { createConsoleLogger, silentLogger } from './log.js';
export type { Logger } from './log.js';
export {
  CoreError,
  MalformedInputError,
  NotFoundError,
  CorruptContainerError,
  PreconditionError,
  ParseError,
  ok,
  fail,
} from './errors.js';
export type { ErrorCode, Result } from './errors.js';

export { Project, createNote, findInsertIndex } from './project/Project.js';
export type { Note, NoteInit, ProjectFields, ProjectInit, ProjectSnapshot, SettingEntry } from './types/project.js';

export { parseUst, loadUstFile, splitChunks, normalizeChunkName } from './ust/parser.js';
export type { UstChunk } from './ust/parser.js';
export { formatUst, saveUstFile } from './ust/writer.js';

export { parseOtoLine, formatOtoLine, defaultOtoEntry, isDefaultOtoEntry, getOtoField } from './oto/entry.js';
export { OtoSetting, loadOtoSetting, saveOtoSetting, parseOtoText, matchEntries } from './oto/setting.js';
export { OTO_FIELDS } from './types/oto.js';
export type { OtoEntry, OtoField, OtoFieldValue } from './types/oto.js';

export { VoiceBank } from './voicebank/VoiceBank.js';
export { loadVoiceBank } from './voicebank/loader.js';
export { parseCharacterText } from './voicebank/character.js';
export type { CharacterInfo, VoiceBankSummary } from './types/voicebank.js';

export { saveProject, loadProject } from './storage/projectStore.js';
export type { SaveProjectOptions } from './storage/projectStore.js';
export { encodeContainer, decodeContainer } from './storage/container.js';

export { planRender, midiToHz, ticksToMs, velocityToSpeedRatio } from './render/planner.js';
export { renderPlan, createRenderTrigger, buildTargetPitch } from './render/trigger.js';
export type {
  VoiceRenderer,
  SampleSource,
  PitchTrack,
  RenderPlan,
  PlannedNote,
  RenderOutcome,
  RenderedNote,
} from './render/types.js';
