import type { Pitch } from '../music/pitch';

export type ThirdQuality = 'major' | 'minor' | 'sus4' | 'sus2';
export type FifthQuality = 'perfect' | 'diminished' | 'augmented';
// 'dominantSeventh' no existe como variante: es un alias de 'minorSeventh'.
export type UpperQuality = 'sixth' | 'minorSeventh' | 'majorSeventh' | 'diminishedSeventh';
export type Harmony =
  | 'flatNinth'
  | 'ninth'
  | 'sharpNinth'
  | 'eleventh'
  | 'sharpEleventh'
  | 'flatThirteenth'
  | 'thirteenth';

export type ChordTone =
  | { kind: 'third'; quality: ThirdQuality }
  | { kind: 'fifth'; quality: FifthQuality }
  | { kind: 'upper'; quality: UpperQuality }
  | { kind: 'harmony'; quality: Harmony };

export type ToneRole = 'third' | 'fifth' | 'root' | 'upper' | 'harmony';

export type PitchInit = string | Pitch;

export interface VoicingOptions {
  anchor?: PitchInit;
  maxNotes?: number;
  bass?: PitchInit | null;
  includeRoot?: boolean;
}

export interface BassVoicingOptions {
  anchor?: PitchInit;
  maxNotes?: number;
  omitRoot?: boolean;
}

export interface ExportOptions {
  bpm?: number;
  beatsPerChord?: number;
  velocity?: number;
  name?: string;
}

export interface NoteEvent {
  time: number; // in beats
  duration: number; // in beats
  midi: number;
  velocity: number; // 0 - 1
}
