import { SEMITONES_IN_OCTAVE } from '../types/constants';
import type { Pitch } from './pitch';

function byMidi(a: Pitch, b: Pitch): number {
  return a.midi - b.midi;
}

/** Ordered, immutable set of pitches. Duplicates are kept. */
export class Chord {
  readonly pitches: readonly Pitch[];

  constructor(pitches: Iterable<Pitch>) {
    this.pitches = Object.freeze([...pitches]);
  }

  get size(): number {
    return this.pitches.length;
  }

  get lowest(): Pitch | undefined {
    return this.pitches.reduce<Pitch | undefined>(
      (low, pitch) => (low === undefined || pitch.midi < low.midi ? pitch : low),
      undefined
    );
  }

  midis(): number[] {
    return this.pitches.map((pitch) => pitch.midi);
  }

  names(): string[] {
    return this.pitches.map((pitch) => pitch.name);
  }

  transpose(semitones: number): Chord {
    return new Chord(this.pitches.map((pitch) => pitch.transpose(semitones)));
  }

  sortAscending(): Chord {
    // Array.prototype.sort es estable: las notas repetidas conservan su orden.
    return new Chord([...this.pitches].sort(byMidi));
  }

  add(pitch: Pitch): Chord {
    return new Chord([...this.pitches, pitch]).sortAscending();
  }

  /**
   * Keeps the lowest pitch where it is and folds every other pitch into the
   * octave above it, using the fewest octave shifts that land it in
   * [lowest, lowest + 12).
   */
  closedPosition(): Chord {
    const sorted = this.sortAscending();
    const [bass, ...upper] = sorted.pitches;
    if (!bass) {
      return sorted;
    }
    const folded = upper.map((pitch) => {
      const octaves = Math.floor((pitch.midi - bass.midi) / SEMITONES_IN_OCTAVE);
      return octaves === 0 ? pitch : pitch.transpose(-octaves * SEMITONES_IN_OCTAVE);
    });
    return new Chord([bass, ...folded]).sortAscending();
  }

  toString(): string {
    return `<${this.names().join(' ')}>`;
  }
}
