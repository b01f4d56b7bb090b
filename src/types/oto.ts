/** Timing metadata of one sample, one line of an oto.ini. Times in ms. */
export interface OtoEntry {
  file: string;       // sample filename, e.g. "_ka.wav"
  alias: string;      // lookup key, e.g. "- ka"
  offset: number;
  fixed: number;      // consonant region, not stretched
  blank: number;      // cutoff; negative counts from the end of the sample
  preutter: number;
  overlap: number;
}

export const OTO_FIELDS = ['file', 'alias', 'offset', 'fixed', 'blank', 'preutter', 'overlap'] as const;

export type OtoField = (typeof OTO_FIELDS)[number];

export type OtoTextField = Extract<OtoField, 'file' | 'alias'>;
export type OtoNumericField = Exclude<OtoField, OtoTextField>;

/** Value type of a field, so `findEntries('offset', 'x')` does not compile. */
export type OtoFieldValue<F extends OtoField> = OtoEntry[F];
