import type { Chord } from './chord';
import type { Pitch } from './pitch';

export function pitchCenter(chord: Chord): number {
  if (chord.size === 0) {
    return Number.NaN;
  }
  return chord.pitches.reduce((sum, pitch) => sum + pitch.midi, 0) / chord.size;
}

/** Mean absolute deviation of the chord's MIDI values from the anchor. */
export function chordMad(chord: Chord, anchor: Pitch): number {
  if (chord.size === 0) {
    return Number.POSITIVE_INFINITY;
  }
  return chord.pitches.reduce((sum, pitch) => sum + Math.abs(pitch.midi - anchor.midi), 0) / chord.size;
}

export function selectBestFit(chords: readonly Chord[], anchor: Pitch): Chord {
  const [first, ...rest] = chords;
  if (!first) {
    throw new Error('No hay acordes entre los que elegir.');
  }
  let best = first;
  let bestScore = chordMad(first, anchor);
  rest.forEach((candidate) => {
    const score = chordMad(candidate, anchor);
    if (score < bestScore) {
      best = candidate;
      bestScore = score;
    }
  });
  return best;
}
