import { describe, expect, it } from 'vitest';
import { ChordSymbolError } from '../errors';
import { DOMINANT_SEVENTH, HALF_DIMINISHED, MAJOR, MAJOR_SEVENTH, MINOR_SEVENTH, SUS4_SEVENTH } from './chordQuality';
import { CHORD_SUFFIXES, isRecognizedChordSymbol, parseChordSymbol } from './chordSymbols';

describe('parseChordSymbol', () => {
  it('reconoce los acordes del ii-V-I', () => {
    const ii = parseChordSymbol('Dm9');
    const V = parseChordSymbol('G13');
    const I = parseChordSymbol('Cmaj9');

    expect(ii.root).toBe('D');
    expect(ii.quality.equals(MINOR_SEVENTH.addMaj9())).toBe(true);
    expect(V.quality.equals(DOMINANT_SEVENTH.addMaj13())).toBe(true);
    expect(I.quality.equals(MAJOR_SEVENTH.addMaj9())).toBe(true);
  });

  it('separa la alteración de la fundamental', () => {
    const chord = parseChordSymbol('Bbm7b5');
    expect(chord.root).toBe('Bb');
    expect(chord.quality.equals(HALF_DIMINISHED)).toBe(true);
    expect(parseChordSymbol('F#').quality.equals(MAJOR)).toBe(true);
    expect(parseChordSymbol('f#7sus4').root).toBe('F#');
    expect(parseChordSymbol('f#7sus4').quality.equals(SUS4_SEVENTH)).toBe(true);
  });

  it('rechaza sufijos desconocidos', () => {
    expect(() => parseChordSymbol('Cxyz')).toThrow(ChordSymbolError);
    expect(() => parseChordSymbol('H7')).toThrow(ChordSymbolError);
  });
});

describe('isRecognizedChordSymbol', () => {
  it('distingue cifrados válidos de inválidos', () => {
    expect(isRecognizedChordSymbol('Ebmaj7#11')).toBe(true);
    expect(isRecognizedChordSymbol('Ebfoo')).toBe(false);
    expect(isRecognizedChordSymbol('')).toBe(false);
  });

  it('expone todos los sufijos de la tabla', () => {
    expect(CHORD_SUFFIXES).toContain('m7b5');
    expect(new Set(CHORD_SUFFIXES).size).toBe(CHORD_SUFFIXES.length);
  });
});
