import { describe, expect, it } from 'vitest';
import { Chord } from './chord';
import { Pitch } from './pitch';

function chordOf(...names: string[]): Chord {
  return new Chord(names.map((name) => Pitch.parse(name)));
}

describe('Chord', () => {
  it('ordena de grave a agudo conservando las notas repetidas', () => {
    const chord = chordOf('G4', 'C4', 'E4', 'C4').sortAscending();
    expect(chord.names()).toEqual(['C4', 'C4', 'E4', 'G4']);
    expect(chord.size).toBe(4);
  });

  it('add inserta y reordena sin modificar el acorde original', () => {
    const triad = chordOf('C4', 'E4', 'G4');
    const withBass = triad.add(Pitch.parse('C3'));

    expect(withBass.midis()).toEqual([48, 60, 64, 67]);
    expect(triad.midis()).toEqual([60, 64, 67]);
  });

  it('transporta todas las notas', () => {
    expect(chordOf('C4', 'E4', 'G4').transpose(-12).names()).toEqual(['C3', 'E3', 'G3']);
  });

  it('lleva el acorde a posición cerrada sobre la nota más grave', () => {
    const closed = chordOf('C4', 'E5', 'G3').closedPosition();

    expect(closed.midis()).toEqual([55, 60, 64]);
    expect(closed.names()).toEqual(['G3', 'C4', 'E4']);
  });

  it('la posición cerrada conserva las clases de altura y cabe en una octava', () => {
    const open = chordOf('D3', 'C5', 'F4', 'E6', 'A3');
    const closed = open.closedPosition();
    const span = closed.midis()[closed.size - 1] - closed.midis()[0];

    expect(span).toBeLessThan(12);
    expect(closed.pitches.map((pitch) => pitch.pitchClass).sort()).toEqual(
      open.pitches.map((pitch) => pitch.pitchClass).sort()
    );
    expect(closed.midis()).toEqual([50, 52, 53, 57, 60]);
  });

  it('un acorde vacío no tiene nota más grave', () => {
    const empty = new Chord([]);
    expect(empty.lowest).toBeUndefined();
    expect(empty.closedPosition().size).toBe(0);
  });
});
