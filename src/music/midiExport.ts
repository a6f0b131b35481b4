import { Midi } from '@tonejs/midi';
import { exportOptionsSchema, parseOptions } from '../config/options';
import type { ExportOptions, NoteEvent } from '../types';
import type { Chord } from './chord';

/** One track; chord i starts at i * beatsPerChord and holds for beatsPerChord beats. */
export function buildProgressionMidi(chords: readonly Chord[], options?: ExportOptions): Midi {
  const settings = parseOptions(exportOptionsSchema, options);
  const midi = new Midi();
  midi.header.setTempo(settings.bpm);
  midi.header.name = settings.name;

  const ppq = midi.header.ppq;
  const track = midi.addTrack();
  track.name = settings.name;
  const durationTicks = Math.round(settings.beatsPerChord * ppq);

  chords.forEach((chord, index) => {
    const ticks = index * durationTicks;
    chord.pitches.forEach((pitch) => {
      track.addNote({ midi: pitch.midi, ticks, durationTicks, velocity: settings.velocity });
    });
  });

  return midi;
}

export function progressionToMidiBytes(chords: readonly Chord[], options?: ExportOptions): Uint8Array {
  return buildProgressionMidi(chords, options).toArray();
}

export function readProgressionMidi(bytes: Uint8Array): NoteEvent[] {
  const midi = new Midi(bytes);
  const ppq = midi.header.ppq || 480;
  const events: NoteEvent[] = [];

  midi.tracks.forEach((track) => {
    track.notes.forEach((note) => {
      events.push({
        time: note.ticks / ppq,
        duration: note.durationTicks / ppq,
        midi: note.midi,
        velocity: note.velocity,
      });
    });
  });

  return events.sort((a, b) => a.time - b.time || a.midi - b.midi);
}
