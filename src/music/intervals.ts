import type { ChordTone, FifthQuality, Harmony, ThirdQuality, UpperQuality } from '../types';

const THIRD_INTERVALS: Record<ThirdQuality, string> = {
  major: '3M',
  minor: '3m',
  sus4: '4P',
  sus2: '2M',
};

const FIFTH_INTERVALS: Record<FifthQuality, string> = {
  perfect: '5P',
  diminished: '5d',
  augmented: '5A',
};

const UPPER_INTERVALS: Record<UpperQuality, string> = {
  sixth: '6M',
  minorSeventh: '7m',
  majorSeventh: '7M',
  diminishedSeventh: '7d',
};

const HARMONY_INTERVALS: Record<Harmony, string> = {
  flatNinth: '9m',
  ninth: '9M',
  sharpNinth: '9A',
  eleventh: '11P',
  sharpEleventh: '11A',
  flatThirteenth: '13m',
  thirteenth: '13M',
};

export function intervalFor(tone: ChordTone): string {
  switch (tone.kind) {
    case 'third':
      return THIRD_INTERVALS[tone.quality];
    case 'fifth':
      return FIFTH_INTERVALS[tone.quality];
    case 'upper':
      return UPPER_INTERVALS[tone.quality];
    case 'harmony':
      return HARMONY_INTERVALS[tone.quality];
    default: {
      const unreachable: never = tone;
      return unreachable;
    }
  }
}
