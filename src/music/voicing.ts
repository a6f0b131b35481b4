import { bassVoicingOptionsSchema, parseOptions, voicingOptionsSchema } from '../config/options';
import { InsufficientChordSizeError } from '../errors';
import type { BassVoicingOptions, PitchInit, ToneRole, VoicingOptions } from '../types';
import { BASS_OCTAVE_OFFSET, MIN_CHORD_NOTES, TONE_WEIGHTS } from '../types/constants';
import { Chord } from './chord';
import type { ChordQuality } from './chordQuality';
import { intervalFor } from './intervals';
import { allInversions } from './inversions';
import { moveChord, movePitch } from './normalize';
import { resolvePitch } from './pitch';
import type { Pitch } from './pitch';
import { selectBestFit } from './scoring';

export interface ToneCandidate {
  role: ToneRole;
  pitch: Pitch;
  weight: number;
  order: number;
}

/**
 * Candidate tones in insertion order: third, extensions, fifth, root, upper.
 * The order is the tie-break when trimming equal weights.
 */
export function collectCandidates(quality: ChordQuality, root: Pitch, includeRoot: boolean): ToneCandidate[] {
  const tones: { role: ToneRole; pitch: Pitch }[] = [
    { role: 'third', pitch: root.transpose(intervalFor({ kind: 'third', quality: quality.third })) },
    ...quality.orderedHarmonies.map((harmony) => ({
      role: 'harmony' as const,
      pitch: root.transpose(intervalFor({ kind: 'harmony', quality: harmony })),
    })),
    { role: 'fifth', pitch: root.transpose(intervalFor({ kind: 'fifth', quality: quality.fifth })) },
  ];

  if (includeRoot) {
    tones.push({ role: 'root', pitch: root });
  }
  if (quality.upper !== null) {
    tones.push({ role: 'upper', pitch: root.transpose(intervalFor({ kind: 'upper', quality: quality.upper })) });
  }

  return tones.map((tone, order) => ({ ...tone, weight: TONE_WEIGHTS[tone.role], order }));
}

/** Drops the least essential candidate, earliest first among equal weights, until maxNotes remain. */
export function trimCandidates(candidates: readonly ToneCandidate[], maxNotes: number): ToneCandidate[] {
  const kept = [...candidates];
  while (kept.length > Math.max(maxNotes, 0)) {
    const weakest = kept.reduce((current, candidate) =>
      candidate.weight < current.weight || (candidate.weight === current.weight && candidate.order < current.order)
        ? candidate
        : current
    );
    kept.splice(kept.indexOf(weakest), 1);
  }
  return kept;
}

export function generateClosedChord(quality: ChordQuality, rootNote: PitchInit, options?: VoicingOptions): Chord {
  const settings = parseOptions(voicingOptionsSchema, options);
  const root = resolvePitch(rootNote);
  const anchor = resolvePitch(settings.anchor);
  const bass = settings.bass == null ? null : resolvePitch(settings.bass);

  if (settings.maxNotes < MIN_CHORD_NOTES) {
    throw new InsufficientChordSizeError(settings.maxNotes);
  }

  const selected = trimCandidates(collectCandidates(quality, root, settings.includeRoot), settings.maxNotes);
  const base = new Chord(selected.map((candidate) => candidate.pitch)).sortAscending();

  const closed = moveChord(base, anchor).closedPosition();
  const inversions = allInversions(closed).map((inversion) => moveChord(inversion, anchor));
  const best = selectBestFit(inversions, anchor);

  if (bass === null) {
    return best;
  }
  return best.add(movePitch(bass, anchor.transpose(BASS_OCTAVE_OFFSET)));
}

/**
 * Voices the quality on top of a bass note: the bass supplies the root, and
 * sounds an octave under the anchor.
 */
export function generateVoicing(bassNote: PitchInit, quality: ChordQuality, options?: BassVoicingOptions): Chord {
  const settings = parseOptions(bassVoicingOptionsSchema, options);
  const bass = resolvePitch(bassNote);
  return generateClosedChord(quality, bass, {
    anchor: settings.anchor,
    maxNotes: settings.maxNotes,
    bass,
    includeRoot: !settings.omitRoot,
  });
}
