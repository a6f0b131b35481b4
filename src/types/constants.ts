import type { Harmony, ToneRole } from './index';

export const SEMITONES_IN_OCTAVE = 12;

export const DEFAULT_ANCHOR = 'C4';
export const DEFAULT_MAX_NOTES = 5;
export const MIN_CHORD_NOTES = 2;

export const BASS_OCTAVE_OFFSET = -SEMITONES_IN_OCTAVE;
export const CHORD_NORMALIZE_WINDOW = 12;
export const PITCH_NORMALIZE_WINDOW = 6;

// Mayor peso = más esencial. Se descarta primero el de menor peso.
export const TONE_WEIGHTS: Record<ToneRole, number> = {
  fifth: 1,
  root: 3,
  harmony: 7,
  third: 9,
  upper: 9,
};

export const HARMONY_ORDER: readonly Harmony[] = [
  'flatNinth',
  'ninth',
  'sharpNinth',
  'eleventh',
  'sharpEleventh',
  'flatThirteenth',
  'thirteenth',
];

export const DEFAULT_EXPORT = {
  bpm: 120,
  beatsPerChord: 4,
  velocity: 0.8,
  name: 'Voicings',
} as const;

export const DEFAULT_PROGRESSION = 'Dm9 G13 Cmaj9';
export const DEFAULT_OUTPUT_FILE = 'iiVI.mid';
