import { describe, expect, it } from 'vitest';
import { Chord } from './chord';
import { Pitch } from './pitch';
import { chordMad, pitchCenter, selectBestFit } from './scoring';

const C4 = Pitch.parse('C4');

function chordOf(...midis: number[]): Chord {
  return new Chord(midis.map((midi) => Pitch.fromMidi(midi)));
}

describe('chordMad', () => {
  it('calcula la desviación absoluta media respecto al ancla', () => {
    expect(chordMad(chordOf(60, 64, 67), C4)).toBeCloseTo(11 / 3, 10);
    expect(chordMad(chordOf(55, 60, 64), C4)).toBe(3);
  });

  it('pitchCenter promedia los valores MIDI', () => {
    expect(pitchCenter(chordOf(60, 64, 68))).toBe(64);
  });
});

describe('selectBestFit', () => {
  it('elige el acorde más cercano al ancla', () => {
    const near = chordOf(55, 60, 64);
    const best = selectBestFit([chordOf(60, 64, 67), near, chordOf(64, 67, 72)], C4);
    expect(best).toBe(near);
  });

  it('en caso de empate se queda con el primero', () => {
    const first = chordOf(59, 61);
    const second = chordOf(61, 59);
    expect(selectBestFit([first, second], C4)).toBe(first);
  });

  it('falla si no hay candidatos', () => {
    expect(() => selectBestFit([], C4)).toThrow('No hay acordes');
  });
});
