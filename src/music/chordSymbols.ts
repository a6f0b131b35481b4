import { z } from 'zod';
import rawSymbols from './chordSymbols.json';
import { ChordSymbolError } from '../errors';
import { AUGMENTED, ChordQuality, DIMINISHED, MAJOR, MINOR, SUS2, SUS4 } from './chordQuality';

const BASE_QUALITIES = {
  major: MAJOR,
  minor: MINOR,
  diminished: DIMINISHED,
  augmented: AUGMENTED,
  sus2: SUS2,
  sus4: SUS4,
} satisfies Record<string, ChordQuality>;

const symbolEntrySchema = z.object({
  suffix: z.string(),
  base: z.enum(['major', 'minor', 'diminished', 'augmented', 'sus2', 'sus4']),
  upper: z.enum(['sixth', 'minorSeventh', 'majorSeventh', 'diminishedSeventh']).optional(),
  harmonies: z
    .array(z.enum(['flatNinth', 'ninth', 'sharpNinth', 'eleventh', 'sharpEleventh', 'flatThirteenth', 'thirteenth']))
    .default([]),
});

const entries = z.array(symbolEntrySchema).parse(rawSymbols);

const SUFFIX_QUALITIES = new Map<string, ChordQuality>(
  entries.map(({ suffix, base, upper, harmonies }) => {
    const withUpper = upper ? BASE_QUALITIES[base].withUpperQuality(upper) : BASE_QUALITIES[base];
    return [suffix, withUpper.withHarmonies(harmonies)];
  })
);

const ROOT_REGEX = /^([A-G])(#|b)?(.*)$/i;

export interface ChordSymbol {
  symbol: string;
  root: string;
  quality: ChordQuality;
}

export const CHORD_SUFFIXES: readonly string[] = entries.map((entry) => entry.suffix);

export function parseChordSymbol(symbol: string): ChordSymbol {
  const trimmed = symbol.trim();
  const match = trimmed.match(ROOT_REGEX);
  if (!match) {
    throw new ChordSymbolError(symbol);
  }
  const [, letter = '', accidental = '', suffix = ''] = match;
  const quality = SUFFIX_QUALITIES.get(suffix);
  if (!quality) {
    throw new ChordSymbolError(symbol);
  }
  return { symbol: trimmed, root: `${letter.toUpperCase()}${accidental}`, quality };
}

export function isRecognizedChordSymbol(symbol: string): boolean {
  const match = symbol.trim().match(ROOT_REGEX);
  return match !== null && SUFFIX_QUALITIES.has(match[3] ?? '');
}
