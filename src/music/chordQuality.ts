import type { FifthQuality, Harmony, PitchInit, ThirdQuality, UpperQuality, VoicingOptions } from '../types';
import { HARMONY_ORDER } from '../types/constants';
import type { Chord } from './chord';
import { generateClosedChord } from './voicing';

/**
 * Root-independent description of a chord's colour. Every combinator returns a
 * new descriptor. Contradictory extensions (a 9 and a b9 together) are not
 * rejected: choosing them is up to the caller.
 */
export class ChordQuality {
  readonly harmonies: ReadonlySet<Harmony>;

  constructor(
    readonly third: ThirdQuality,
    readonly fifth: FifthQuality = 'perfect',
    readonly upper: UpperQuality | null = null,
    harmonies: Iterable<Harmony> = []
  ) {
    this.harmonies = new Set(harmonies);
    Object.freeze(this);
  }

  /** Extensions in canonical order (b9, 9, #9, 11, #11, b13, 13). */
  get orderedHarmonies(): Harmony[] {
    return HARMONY_ORDER.filter((harmony) => this.harmonies.has(harmony));
  }

  withHarmonies(harmonies: Harmony | readonly Harmony[]): ChordQuality {
    const extra = typeof harmonies === 'string' ? [harmonies] : harmonies;
    return new ChordQuality(this.third, this.fifth, this.upper, [...this.harmonies, ...extra]);
  }

  withUpperQuality(upper: UpperQuality): ChordQuality {
    return new ChordQuality(this.third, this.fifth, upper, this.harmonies);
  }

  addSixth(): ChordQuality {
    return this.withUpperQuality('sixth');
  }

  addDom7(): ChordQuality {
    return this.withUpperQuality('minorSeventh');
  }

  addMin7(): ChordQuality {
    return this.addDom7();
  }

  addMaj7(): ChordQuality {
    return this.withUpperQuality('majorSeventh');
  }

  addDim7(): ChordQuality {
    return this.withUpperQuality('diminishedSeventh');
  }

  addMin9(): ChordQuality {
    return this.withHarmonies('flatNinth');
  }

  addMaj9(): ChordQuality {
    return this.withHarmonies('ninth');
  }

  addSharp9(): ChordQuality {
    return this.withHarmonies('sharpNinth');
  }

  add11(): ChordQuality {
    return this.withHarmonies('eleventh');
  }

  addSharp11(): ChordQuality {
    return this.withHarmonies('sharpEleventh');
  }

  addMin13(): ChordQuality {
    return this.withHarmonies('flatThirteenth');
  }

  addMaj13(): ChordQuality {
    return this.withHarmonies('thirteenth');
  }

  equals(other: ChordQuality): boolean {
    return (
      this.third === other.third &&
      this.fifth === other.fifth &&
      this.upper === other.upper &&
      this.harmonies.size === other.harmonies.size &&
      [...this.harmonies].every((harmony) => other.harmonies.has(harmony))
    );
  }

  generateClosedChord(root: PitchInit, options?: VoicingOptions): Chord {
    return generateClosedChord(this, root, options);
  }
}

export const MAJOR = new ChordQuality('major');
export const MINOR = new ChordQuality('minor');
export const DIMINISHED = new ChordQuality('minor', 'diminished');
export const AUGMENTED = new ChordQuality('major', 'augmented');
export const SUS2 = new ChordQuality('sus2');
export const SUS4 = new ChordQuality('sus4');

export const MAJOR_SEVENTH = MAJOR.addMaj7();
export const MINOR_SEVENTH = MINOR.addMin7();
export const DIMINISHED_SEVENTH = DIMINISHED.addDim7();
export const DOMINANT_SEVENTH = MAJOR.addDom7();
export const SUS4_SEVENTH = SUS4.addDom7();
export const HALF_DIMINISHED = DIMINISHED.addMin7();
export const SIXTH = MAJOR.addSixth();
export const MINOR_SIXTH = MINOR.addSixth();
