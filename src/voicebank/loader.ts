import { existsSync, readFileSync, statSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import fg from 'fast-glob';
import type { CoreConfig } from '../config.js';
import { NotFoundError, describeError, fail, ok, type Result } from '../errors.js';
import { loadOtoSetting, type OtoSetting } from '../oto/setting.js';
import { decodeText } from '../text.js';
import { parseCharacterText } from './character.js';
import { VoiceBank } from './VoiceBank.js';

export const OTO_FILENAME = 'oto.ini';
export const CHARACTER_FILENAME = 'character.txt';
export const README_FILENAME = 'readme.txt';
export const SAMPLE_EXTENSION = '.wav';

function findFiles(root: string, pattern: string): string[] {
  return fg
    .sync(pattern, {
      cwd: root,
      absolute: true,
      onlyFiles: true,
      suppressErrors: true,
      caseSensitiveMatch: false,
    })
    .sort();
}

function readOptionalText(path: string, config: CoreConfig): string | undefined {
  if (!existsSync(path)) {
    config.logger.warn(`${path} not found; leaving its fields empty`);
    return undefined;
  }
  try {
    return decodeText(readFileSync(path), config.encoding);
  } catch (err) {
    config.logger.warn(`${path} could not be read (${describeError(err)}); leaving its fields empty`);
    return undefined;
  }
}

/**
 * Scan a voicebank directory: character.txt, readme.txt, every oto.ini at
 * any depth (keyed by the name of the directory holding it) and the number
 * of sample files.
 */
export function loadVoiceBank(root: string, config: CoreConfig): Result<VoiceBank, NotFoundError> {
  const dir = resolve(root);
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    config.logger.error(`Voicebank directory not found: ${dir}`);
    return fail(new NotFoundError(`${dir} is not a directory, or does not exist`, dir));
  }

  const character = parseCharacterText(readOptionalText(join(dir, CHARACTER_FILENAME), config) ?? '');
  const readme = readOptionalText(join(dir, README_FILENAME), config) ?? '';

  const otoSettings = new Map<string, OtoSetting>();
  for (const otoPath of findFiles(dir, `**/${OTO_FILENAME}`)) {
    const key = basename(dirname(otoPath));
    const loaded = loadOtoSetting(otoPath, config);
    if (!loaded.ok) continue;
    if (otoSettings.has(key)) {
      config.logger.warn(`Subdirectory name "${key}" seen twice; ${otoPath} replaces the earlier ${OTO_FILENAME}`);
    }
    otoSettings.set(key, loaded.value);
  }

  const fileCount = findFiles(dir, `**/*${SAMPLE_EXTENSION}`).length;
  const bank = new VoiceBank(dir, character, readme, otoSettings, fileCount);
  config.logger.info(
    `Loaded voicebank "${bank.name}" from ${dir}: ${otoSettings.size} ${OTO_FILENAME} files, ` +
    `${bank.otoCount} entries, ${fileCount} samples`,
  );
  return ok(bank);
}
