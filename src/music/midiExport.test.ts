import { describe, expect, it } from 'vitest';
import { InvalidOptionsError } from '../errors';
import { Chord } from './chord';
import { buildProgressionMidi, progressionToMidiBytes, readProgressionMidi } from './midiExport';
import { Pitch } from './pitch';

function chordOf(...names: string[]): Chord {
  return new Chord(names.map((name) => Pitch.parse(name)));
}

const progression = [chordOf('C4', 'E4', 'G4'), chordOf('D4', 'F4', 'A4')];

describe('buildProgressionMidi', () => {
  it('crea una pista con el tempo pedido', () => {
    const midi = buildProgressionMidi(progression, { bpm: 90, name: 'ii-V' });

    expect(midi.tracks).toHaveLength(1);
    expect(midi.tracks[0]?.name).toBe('ii-V');
    expect(midi.tracks[0]?.notes).toHaveLength(6);
    expect(midi.header.tempos[0]?.bpm).toBe(90);
  });

  it('rechaza opciones no válidas', () => {
    expect(() => buildProgressionMidi(progression, { bpm: -1 })).toThrow(InvalidOptionsError);
    expect(() => buildProgressionMidi(progression, { velocity: 2 })).toThrow(InvalidOptionsError);
  });
});

describe('progressionToMidiBytes', () => {
  it('coloca cada acorde como redonda tras el anterior', () => {
    const events = readProgressionMidi(progressionToMidiBytes(progression));

    expect(events.map((event) => event.midi)).toEqual([60, 64, 67, 62, 65, 69]);
    expect(events.map((event) => event.time)).toEqual([0, 0, 0, 4, 4, 4]);
    expect(events.every((event) => event.duration === 4)).toBe(true);
    expect(events[0]?.velocity).toBeCloseTo(0.8, 1);
  });

  it('respeta la duración por acorde', () => {
    const events = readProgressionMidi(progressionToMidiBytes(progression, { beatsPerChord: 2 }));

    expect(events.map((event) => event.time)).toEqual([0, 0, 0, 2, 2, 2]);
    expect(events.every((event) => event.duration === 2)).toBe(true);
  });
});
