import { CHORD_NORMALIZE_WINDOW, PITCH_NORMALIZE_WINDOW, SEMITONES_IN_OCTAVE } from '../types/constants';
import type { Chord } from './chord';
import type { Pitch } from './pitch';

export function meanDistance(chord: Chord, reference: Pitch): number {
  if (chord.size === 0) {
    return 0;
  }
  const total = chord.pitches.reduce((sum, pitch) => sum + (pitch.midi - reference.midi), 0);
  return total / chord.size;
}

/** Shifts the whole chord by octaves until its mean lies within 12 semitones of the anchor. */
export function moveChord(chord: Chord, anchor: Pitch): Chord {
  let result = chord;
  let distance = meanDistance(result, anchor);
  while (Math.abs(distance) > CHORD_NORMALIZE_WINDOW) {
    result = result.transpose(distance < 0 ? SEMITONES_IN_OCTAVE : -SEMITONES_IN_OCTAVE);
    distance = meanDistance(result, anchor);
  }
  return result;
}

/** Shifts a single pitch by octaves until it lies within a tritone of the reference. */
export function movePitch(pitch: Pitch, reference: Pitch): Pitch {
  let result = pitch;
  while (Math.abs(result.midi - reference.midi) > PITCH_NORMALIZE_WINDOW) {
    result = result.transpose(result.midi < reference.midi ? SEMITONES_IN_OCTAVE : -SEMITONES_IN_OCTAVE);
  }
  return result;
}
