import { z } from 'zod';
import { InvalidOptionsError } from '../errors';
import { Pitch } from '../music/pitch';
import {
  DEFAULT_ANCHOR,
  DEFAULT_EXPORT,
  DEFAULT_MAX_NOTES,
  DEFAULT_OUTPUT_FILE,
  DEFAULT_PROGRESSION,
} from '../types/constants';

const pitchInitSchema = z.union([
  z.string({ invalid_type_error: 'La nota debe ser texto o un Pitch.' }),
  z.custom<Pitch>((value) => value instanceof Pitch, { message: 'La nota debe ser texto o un Pitch.' }),
]);

// maxNotes < 2 no se valida aquí: tiene su propio error (InsufficientChordSizeError).
const maxNotesSchema = z.number().int('maxNotes debe ser un número entero.');

export const voicingOptionsSchema = z.object({
  anchor: pitchInitSchema.default(DEFAULT_ANCHOR),
  maxNotes: maxNotesSchema.default(DEFAULT_MAX_NOTES),
  bass: pitchInitSchema.nullish(),
  includeRoot: z.boolean().default(true),
});

export const bassVoicingOptionsSchema = z.object({
  anchor: pitchInitSchema.default(DEFAULT_ANCHOR),
  maxNotes: maxNotesSchema.default(DEFAULT_MAX_NOTES),
  omitRoot: z.boolean().default(false),
});

export const exportOptionsSchema = z.object({
  bpm: z.number().positive('bpm debe ser positivo.').default(DEFAULT_EXPORT.bpm),
  beatsPerChord: z.number().positive('beatsPerChord debe ser positivo.').default(DEFAULT_EXPORT.beatsPerChord),
  velocity: z.number().min(0).max(1).default(DEFAULT_EXPORT.velocity),
  name: z.string().default(DEFAULT_EXPORT.name),
});

export const cliOptionsSchema = z.object({
  progression: z
    .string()
    .transform((value) => value.replace(/\s+/g, ' ').trim())
    .default(DEFAULT_PROGRESSION),
  anchor: z.string().default(DEFAULT_ANCHOR),
  maxNotes: z.coerce.number().pipe(maxNotesSchema).default(DEFAULT_MAX_NOTES),
  includeRoot: z.boolean().default(false),
  withBass: z.boolean().default(true),
  bpm: z.coerce.number().pipe(z.number().positive('bpm debe ser positivo.')).default(DEFAULT_EXPORT.bpm),
  out: z.string().min(1).default(DEFAULT_OUTPUT_FILE),
});

export type VoicingSettings = z.output<typeof voicingOptionsSchema>;
export type BassVoicingSettings = z.output<typeof bassVoicingOptionsSchema>;
export type ExportSettings = z.output<typeof exportOptionsSchema>;
export type CliSettings = z.output<typeof cliOptionsSchema>;

export function parseOptions<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidOptionsError(`Opciones no válidas. ${message}`);
  }
  return parsed.data;
}
