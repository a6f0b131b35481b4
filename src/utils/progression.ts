import { z } from 'zod';
import { ChordSymbolError } from '../errors';
import type { Chord } from '../music/chord';
import { parseChordSymbol } from '../music/chordSymbols';
import type { ChordSymbol } from '../music/chordSymbols';
import { movePitch } from '../music/normalize';
import { Pitch, resolvePitch } from '../music/pitch';
import { generateClosedChord } from '../music/voicing';
import type { PitchInit } from '../types';
import { DEFAULT_ANCHOR, DEFAULT_MAX_NOTES } from '../types/constants';

const progressionSchema = z
  .string({ required_error: 'La progresión es obligatoria.' })
  .transform((value) => value.replace(/\s+/g, ' ').trim());

export interface ProgressionChord extends ChordSymbol {
  index: number;
  raw: string;
}

export interface VoicedChord {
  symbol: string;
  root: Pitch;
  chord: Chord;
}

export interface VoiceProgressionOptions {
  anchor?: PitchInit;
  maxNotes?: number;
  includeRoot?: boolean;
  withBass?: boolean;
}

export function normaliseProgressionText(text: string): string {
  const parsed = progressionSchema.safeParse(text ?? '');
  if (!parsed.success) {
    return '';
  }
  return parsed.data;
}

export function parseProgression(text: string): { chords: ProgressionChord[]; errors: string[] } {
  const normalised = normaliseProgressionText(text);
  if (!normalised) {
    return { chords: [], errors: [] };
  }

  const chords: ProgressionChord[] = [];
  const errors: string[] = [];
  const tokens = normalised.split(/[\s|]+/).filter(Boolean);

  tokens.forEach((token, position) => {
    if (token === '%') {
      const previous = chords[chords.length - 1];
      if (!previous) {
        errors.push('% no puede ir en el primer acorde');
        return;
      }
      chords.push({ ...previous, index: chords.length, raw: token });
      return;
    }

    try {
      chords.push({ ...parseChordSymbol(token), index: chords.length, raw: token });
    } catch (error) {
      if (!(error instanceof ChordSymbolError)) {
        throw error;
      }
      errors.push(`Acorde no reconocido en la posición ${position + 1}: “${token}”`);
    }
  });

  return { chords, errors };
}

/** Voices every chord on its own; there is no voice-leading between them. */
export function voiceProgression(
  chords: readonly ChordSymbol[],
  options: VoiceProgressionOptions = {}
): VoicedChord[] {
  const anchor = resolvePitch(options.anchor ?? DEFAULT_ANCHOR);
  const maxNotes = options.maxNotes ?? DEFAULT_MAX_NOTES;
  const includeRoot = options.includeRoot ?? true;
  const withBass = options.withBass ?? false;

  return chords.map((entry) => {
    const root = movePitch(Pitch.parse(`${entry.root}4`), anchor);
    const chord = generateClosedChord(entry.quality, root, {
      anchor,
      maxNotes,
      includeRoot,
      bass: withBass ? root : null,
    });
    return { symbol: entry.symbol, root, chord };
  });
}
