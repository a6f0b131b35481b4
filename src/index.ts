export * from './errors';
export type * from './types';
export * from './types/constants';
export { Pitch, resolvePitch } from './music/pitch';
export { Chord } from './music/chord';
export { intervalFor } from './music/intervals';
export * from './music/chordQuality';
export { meanDistance, moveChord, movePitch } from './music/normalize';
export { allInversions } from './music/inversions';
export { chordMad, pitchCenter, selectBestFit } from './music/scoring';
export { collectCandidates, generateClosedChord, generateVoicing, trimCandidates } from './music/voicing';
export type { ToneCandidate } from './music/voicing';
export { CHORD_SUFFIXES, isRecognizedChordSymbol, parseChordSymbol } from './music/chordSymbols';
export type { ChordSymbol } from './music/chordSymbols';
export { buildProgressionMidi, progressionToMidiBytes, readProgressionMidi } from './music/midiExport';
export { normaliseProgressionText, parseProgression, voiceProgression } from './utils/progression';
export type { ProgressionChord, VoicedChord, VoiceProgressionOptions } from './utils/progression';
