export const CHARACTER_FIELDS = ['name', 'author', 'image', 'sample', 'web'] as const;

export type CharacterField = (typeof CHARACTER_FIELDS)[number];

/** Contents of a voicebank's character.txt. */
export type CharacterInfo = Record<CharacterField, string>;

export interface VoiceBankSummary extends CharacterInfo {
  root: string;
  readme: string;
  otoCount: number;
  fileCount: number;
  subdirectories: string[];
}
