import { matchEntries, type OtoSetting } from '../oto/setting.js';
import type { OtoEntry, OtoField, OtoFieldValue } from '../types/oto.js';
import type { CharacterInfo, VoiceBankSummary } from '../types/voicebank.js';

/**
 * A scanned voicebank directory. Counters reflect the scan that built it
 * and are not recomputed.
 */
export class VoiceBank implements CharacterInfo {
  readonly name: string;
  readonly author: string;
  readonly image: string;
  readonly sample: string;
  readonly web: string;
  /** Reserved for prefix.map support; always empty for now. */
  readonly prefixMap: ReadonlyMap<string, string> = new Map();
  readonly otoCount: number;

  constructor(
    readonly root: string,
    character: CharacterInfo,
    readonly readme: string,
    readonly otoSettings: ReadonlyMap<string, OtoSetting>,
    readonly fileCount: number,
  ) {
    this.name = character.name;
    this.author = character.author;
    this.image = character.image;
    this.sample = character.sample;
    this.web = character.web;

    let count = 0;
    for (const setting of otoSettings.values()) count += setting.size;
    this.otoCount = count;
  }

  private *allEntries(): Generator<Readonly<OtoEntry>> {
    for (const setting of this.otoSettings.values()) yield* setting.entries;
  }

  /** Same contract as `OtoSetting.findEntries`, across every subdirectory. */
  findEntries<F extends OtoField>(field: F, value: OtoFieldValue<F>): Readonly<OtoEntry>[] {
    return matchEntries(this.allEntries(), field, value);
  }

  findByAlias(alias: string): Readonly<OtoEntry> | undefined {
    for (const entry of this.allEntries()) {
      if (entry.alias === alias) return entry;
    }
    return undefined;
  }

  /** The oto.ini an entry was read from. */
  settingOf(entry: Readonly<OtoEntry>): OtoSetting | undefined {
    for (const setting of this.otoSettings.values()) {
      if (setting.entries.includes(entry)) return setting;
    }
    return undefined;
  }

  summary(): VoiceBankSummary {
    return {
      root: this.root,
      name: this.name,
      author: this.author,
      image: this.image,
      sample: this.sample,
      web: this.web,
      readme: this.readme,
      otoCount: this.otoCount,
      fileCount: this.fileCount,
      subdirectories: [...this.otoSettings.keys()],
    };
  }
}
