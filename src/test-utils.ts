import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import { defineConfig, type CoreConfig } from './config.js';
import { OtoSetting } from './oto/setting.js';
import { Project } from './project/Project.js';
import { VoiceBank } from './voicebank/VoiceBank.js';

export function mockLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function testConfig(
  overrides: Partial<Omit<CoreConfig, 'logger'>> = {},
): CoreConfig & { logger: ReturnType<typeof mockLogger> } {
  return { ...defineConfig(overrides), logger: mockLogger() };
}

/** A fresh temp directory and a function that removes it. */
export function makeTempDir(prefix = 'ust-core-'): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/** Two subdirectories: A3 with "ka", the root with "a". */
export function testVoiceBank(): VoiceBank {
  const ka = { file: '_ka.wav', alias: 'ka', offset: 20, fixed: 120, blank: -280, preutter: 70, overlap: 30 };
  const a = { file: '_a.wav', alias: 'a', offset: 10, fixed: 100, blank: -300, preutter: 50, overlap: 20 };
  return new VoiceBank(
    '/vb',
    { name: 'Test', author: '', image: '', sample: 'Random', web: '' },
    '',
    new Map([
      ['A3', new OtoSetting([ka], '/vb/A3/oto.ini')],
      ['vb', new OtoSetting([a], '/vb/oto.ini')],
    ]),
    2,
  );
}

export function testProject(): Project {
  const created = Project.create({
    tempo: 120,
    notes: [
      { length: 960, lyric: 'ka', noteNum: 57, velocity: 100, startPoint: 0 },
      { length: 480, lyric: 'zz', noteNum: 60, startPoint: 960 },
      { length: 240, lyric: 'a', noteNum: 69, velocity: 200, modulation: 50, startPoint: 1440 },
    ],
  });
  if (!created.ok) throw created.error;
  return created.value;
}
