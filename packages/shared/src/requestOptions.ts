import { z } from 'zod';

import { ValidationError, type ValidationIssue } from './errors';
import type { AccentControl } from './protocol';

export const MODEL_LIST = ['dd-etts-3.0', 'dd-etts-2.5', 'dd-etts-1.1'] as const;
export const DEFAULT_MODEL = 'dd-etts-2.5';
export const DEFAULT_LOCALE = 'en-US';
export const SUPPORTED_SAMPLE_RATES = [8000, 16000, 22050, 24000, 44100, 48000] as const;
export const DEFAULT_STREAM_SAMPLE_RATE = 16000;

export type SupportedSampleRate = (typeof SUPPORTED_SAMPLE_RATES)[number];

export const RestFormatSchema = z.enum(['headerless-wav', 'mp3', 'opus', 'mulaw']);
export const StreamingFormatSchema = z.enum(['headerless-wav', 'wav', 'mp3', 'opus', 'mulaw']);
export const TextStreamFormatSchema = z.enum(['headerless-wav', 'wav', 'mp3', 'opus', 'mulaw', 's16le']);

export type RestFormat = z.infer<typeof RestFormatSchema>;
export type StreamingFormat = z.infer<typeof StreamingFormatSchema>;
export type TextStreamFormat = z.infer<typeof TextStreamFormatSchema>;

export const GenderSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(['male', 'female']));

const ModelOptionSchema = z
  .string()
  .default(DEFAULT_MODEL)
  .refine(
    (model) => MODEL_LIST.some((known) => known === model) || !model.startsWith('dd-'),
    { message: `Invalid model; expected one of ${MODEL_LIST.join(', ')} or a non dd- model` },
  );

const SampleRateSchema = z
  .number()
  .int()
  .refine((rate) => SUPPORTED_SAMPLE_RATES.some((supported) => supported === rate), {
    message: `Invalid sample rate; expected one of ${SUPPORTED_SAMPLE_RATES.join(', ')}`,
  });

const voiceSettingsShape = {
  model: ModelOptionSchema,
  locale: z.string().min(1).default(DEFAULT_LOCALE),
  temperature: z.number().optional(),
  variance: z.number().optional(),
  tempo: z.number().optional(),
  promptBoost: z.boolean().optional(),
  accentBaseLocale: z.string().optional(),
  accentLocale: z.string().optional(),
  accentRatio: z.number().optional(),
};

const synthesisShape = {
  ...voiceSettingsShape,
  text: z.string().min(1, 'text must not be empty'),
  duration: z.number().positive().optional(),
  seed: z.number().int().optional(),
  sampleRate: SampleRateSchema.optional(),
};

type RefinableOptions = {
  tempo?: number | undefined;
  duration?: number | undefined;
  accentBaseLocale?: string | undefined;
  accentLocale?: string | undefined;
  accentRatio?: number | undefined;
};

function refineSynthesisOptions(value: RefinableOptions, ctx: z.RefinementCtx): void {
  if (value.tempo !== undefined && value.duration !== undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['tempo'],
      message: 'Tempo and duration are mutually exclusive',
    });
  }
  const accentFields = [value.accentBaseLocale, value.accentLocale, value.accentRatio].filter(
    (field) => field !== undefined,
  ).length;
  if (accentFields !== 0 && accentFields !== 3) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['accentBaseLocale'],
      message:
        'All three of accentBaseLocale, accentLocale, and accentRatio must be provided or none of them',
    });
  }
}

export const AudioInputSchema = z.union([
  z.custom<Uint8Array>((value) => value instanceof Uint8Array, { message: 'Expected bytes' }),
  z.object({ base64: z.string().min(1) }),
  z.object({ path: z.string().min(1) }),
]);
export type AudioInput = z.infer<typeof AudioInputSchema>;

export const RestTtsOptionsSchema = z
  .object({
    ...synthesisShape,
    voicePromptId: z.string().min(1).optional(),
    voiceReference: AudioInputSchema.optional(),
    format: RestFormatSchema.default('mp3'),
    extra: z.record(z.unknown()).optional(),
  })
  .superRefine((value, ctx) => {
    refineSynthesisOptions(value, ctx);
    if (value.voicePromptId === undefined && value.voiceReference === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['voicePromptId'],
        message: 'Either voiceReference or voicePromptId must be provided',
      });
    }
  });

export const RetroTtsOptionsSchema = z.object({
  text: z.string().min(1),
  voicePromptId: z.string().min(1),
  model: ModelOptionSchema,
  locale: z.string().min(1).default(DEFAULT_LOCALE),
});

export const StreamingTtsOptionsSchema = z
  .object({
    ...synthesisShape,
    voicePromptId: z.string().min(1).optional(),
    format: StreamingFormatSchema.default('wav'),
    generationId: z.string().uuid('Invalid UUID string for generationId').optional(),
    targetGender: z.string().optional(),
    extra: z.record(z.unknown()).optional(),
  })
  .superRefine(refineSynthesisOptions);

export const TextStreamOptionsSchema = z
  .object({
    ...voiceSettingsShape,
    voicePromptId: z.string().min(1),
    format: TextStreamFormatSchema.default('wav'),
    sampleRate: SampleRateSchema.default(DEFAULT_STREAM_SAMPLE_RATE),
  })
  .superRefine(refineSynthesisOptions);

export const AddVoiceOptionsSchema = z.object({
  data: AudioInputSchema,
  name: z.string().min(1),
  gender: GenderSchema,
  locale: z.string().min(1),
  publish: z.boolean().default(false),
  speakingStyle: z.string().min(1).default('Neutral'),
  age: z.number().int().nonnegative().default(0),
});

export const GenderClassifyOptionsSchema = z.object({
  sampleRate: z.number().int().positive().default(16000),
  timeoutMs: z.number().positive().default(5000),
  generationId: z.string().uuid('Invalid UUID string for generationId').optional(),
});

export type RestTtsOptions = z.input<typeof RestTtsOptionsSchema>;
export type ResolvedRestTtsOptions = z.output<typeof RestTtsOptionsSchema>;
export type RetroTtsOptions = z.input<typeof RetroTtsOptionsSchema>;
export type StreamingTtsOptions = z.input<typeof StreamingTtsOptionsSchema>;
export type ResolvedStreamingTtsOptions = z.output<typeof StreamingTtsOptionsSchema>;
export type TextStreamOptions = z.input<typeof TextStreamOptionsSchema>;
export type ResolvedTextStreamOptions = z.output<typeof TextStreamOptionsSchema>;
export type AddVoiceOptions = z.input<typeof AddVoiceOptionsSchema>;
export type ResolvedAddVoiceOptions = z.output<typeof AddVoiceOptionsSchema>;
export type GenderClassifyOptions = z.input<typeof GenderClassifyOptionsSchema>;

/**
 * Parses options against a schema, rethrowing zod failures as ValidationError.
 */
export function parseOptions<Schema extends z.ZodTypeAny>(
  schema: Schema,
  input: unknown,
  label: string,
): z.output<Schema> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const summary = issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ');
  throw new ValidationError(`Invalid ${label}: ${summary}`, issues);
}

export function toAccentControl(options: {
  accentBaseLocale?: string | undefined;
  accentLocale?: string | undefined;
  accentRatio?: number | undefined;
}): AccentControl | null {
  const { accentBaseLocale, accentLocale, accentRatio } = options;
  if (accentBaseLocale === undefined || accentLocale === undefined || accentRatio === undefined) {
    return null;
  }
  return { accentBaseLocale, accentLocale, accentRatio };
}
