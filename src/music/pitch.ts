import { Interval, Note } from 'tonal';
import { PitchParseError } from '../errors';
import { SEMITONES_IN_OCTAVE } from '../types/constants';
import type { PitchInit } from '../types';

/**
 * Absolute pitch at semitone resolution. Spelling comes from tonal, so
 * octave shifts keep the original accidental (Eb4 - 12 = Eb3).
 */
export class Pitch {
  private constructor(
    readonly name: string,
    readonly midi: number
  ) {}

  static parse(text: string): Pitch {
    const note = Note.get(text.trim());
    if (note.empty || typeof note.midi !== 'number') {
      throw new PitchParseError(text);
    }
    return new Pitch(note.name, note.midi);
  }

  static fromMidi(midi: number): Pitch {
    return new Pitch(Note.fromMidiSharps(midi), midi);
  }

  get pitchClass(): number {
    return ((this.midi % SEMITONES_IN_OCTAVE) + SEMITONES_IN_OCTAVE) % SEMITONES_IN_OCTAVE;
  }

  /** Accepts a signed semitone count or a tonal interval name ("3M", "-8P", "13m"). */
  transpose(by: number | string): Pitch {
    const interval = typeof by === 'number' ? Interval.fromSemitones(by) : by;
    const semitones = typeof by === 'number' ? by : intervalSemitones(by);
    const name = Note.transpose(this.name, interval);
    if (!name) {
      return Pitch.fromMidi(this.midi + semitones);
    }
    return new Pitch(name, this.midi + semitones);
  }

  equals(other: Pitch): boolean {
    return this.midi === other.midi;
  }

  toString(): string {
    return this.name;
  }
}

function intervalSemitones(name: string): number {
  const semitones = Interval.get(name).semitones;
  if (typeof semitones !== 'number' || Number.isNaN(semitones)) {
    throw new Error(`Intervalo no válido: “${name}”`);
  }
  return semitones;
}

export function resolvePitch(init: PitchInit): Pitch {
  return typeof init === 'string' ? Pitch.parse(init) : init;
}
