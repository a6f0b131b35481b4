import { SEMITONES_IN_OCTAVE } from '../types/constants';
import { Chord } from './chord';

/**
 * Every rotation of the chord, starting with the chord itself. Each step takes
 * the lowest pitch up an octave and puts it on top.
 */
export function allInversions(chord: Chord): Chord[] {
  let pitches = [...chord.sortAscending().pitches];
  const inversions: Chord[] = [];
  for (let i = 0; i < chord.size; i += 1) {
    inversions.push(new Chord(pitches));
    const [lowest, ...rest] = pitches;
    if (!lowest) {
      break;
    }
    pitches = [...rest, lowest.transpose(SEMITONES_IN_OCTAVE)];
  }
  return inversions;
}
