export class PitchParseError extends Error {
  constructor(readonly input: string) {
    super(`Nota no válida: “${input}”`);
    this.name = 'PitchParseError';
  }
}

export class InsufficientChordSizeError extends Error {
  constructor(readonly maxNotes: number) {
    super(`Un acorde necesita al menos dos notas (maxNotes = ${maxNotes}).`);
    this.name = 'InsufficientChordSizeError';
  }
}

export class ChordSymbolError extends Error {
  constructor(readonly symbol: string) {
    super(`Acorde no reconocido: “${symbol}”`);
    this.name = 'ChordSymbolError';
  }
}

export class InvalidOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOptionsError';
  }
}
