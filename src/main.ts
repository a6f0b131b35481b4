import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { cliOptionsSchema, parseOptions } from './config/options';
import { progressionToMidiBytes } from './music/midiExport';
import { parseProgression, voiceProgression } from './utils/progression';

export async function run(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      progression: { type: 'string', short: 'p' },
      anchor: { type: 'string', short: 'a' },
      'max-notes': { type: 'string', short: 'n' },
      root: { type: 'boolean' },
      'no-bass': { type: 'boolean' },
      bpm: { type: 'string' },
      out: { type: 'string', short: 'o' },
    },
  });

  const settings = parseOptions(cliOptionsSchema, {
    progression: values.progression,
    anchor: values.anchor,
    maxNotes: values['max-notes'],
    includeRoot: values.root,
    withBass: values['no-bass'] === undefined ? undefined : !values['no-bass'],
    bpm: values.bpm,
    out: values.out,
  });

  const { chords, errors } = parseProgression(settings.progression);
  errors.forEach((error) => console.warn(error));
  if (chords.length === 0) {
    throw new Error('La progresión no contiene acordes reconocidos.');
  }

  const voiced = voiceProgression(chords, {
    anchor: settings.anchor,
    maxNotes: settings.maxNotes,
    includeRoot: settings.includeRoot,
    withBass: settings.withBass,
  });

  voiced.forEach(({ symbol, chord }) => {
    console.log(`${symbol.padEnd(8)} ${chord.names().join(' ').padEnd(24)} [${chord.midis().join(', ')}]`);
  });

  const bytes = progressionToMidiBytes(
    voiced.map(({ chord }) => chord),
    { bpm: settings.bpm, name: settings.progression }
  );
  await writeFile(settings.out, bytes);
  console.log(`MIDI guardado en ${settings.out}`);
}

run(process.argv.slice(2)).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
