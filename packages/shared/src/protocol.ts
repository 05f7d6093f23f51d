import { z } from 'zod';

/**
 * Bytes prepended to every WAV chunk the service emits. Stripped when the
 * caller asks for headerless output.
 */
export const DD_WAV_HEADER_LENGTH = 0x44;

export const ModelSchema = z.string().min(1);

export const AccentControlSchema = z.object({
  accentBaseLocale: z.string(),
  accentLocale: z.string(),
  accentRatio: z.number(),
});
export type AccentControl = z.infer<typeof AccentControlSchema>;

export const WireFormatSchema = z.enum(['wav', 'mp3', 'opus', 'mulaw', 's16le']);
export type WireFormat = z.infer<typeof WireFormatSchema>;

// ---------------------------------------------------------------------------
// Client -> server
// ---------------------------------------------------------------------------

export const TextToSpeechMessageSchema = z
  .object({
    action: z.literal('text-to-speech'),
    generationId: z.string().uuid(),
    targetText: z.string(),
    model: ModelSchema,
    voicePromptId: z.string().nullable(),
    locale: z.string(),
    temperature: z.number().nullable(),
    variance: z.number().nullable(),
    duration: z.number().nullable(),
    seed: z.number().int().nullable(),
    tempo: z.number().nullable(),
    promptBoost: z.boolean().nullable(),
    accentControl: AccentControlSchema.nullable(),
    format: WireFormatSchema,
    sampleRate: z.number().int().positive().nullable(),
    targetGender: z.string().nullable(),
  })
  .passthrough();

export const StreamConfigSchema = z.object({
  model: ModelSchema,
  locale: z.string(),
  voicePromptId: z.string(),
  format: WireFormatSchema,
  sampleRate: z.number().int().positive(),
  temperature: z.number().nullable(),
  variance: z.number().nullable(),
  tempo: z.number().nullable(),
  promptBoost: z.boolean().nullable(),
  accentControl: AccentControlSchema.nullable(),
});

export const StreamConfigMessageSchema = z.object({
  action: z.literal('stream-config'),
  config: StreamConfigSchema,
});

export const StreamTextMessageSchema = z.object({
  action: z.literal('stream-text'),
  data: z.object({
    text: z.string(),
  }),
});

export const GenderClassifyMessageSchema = z.object({
  action: z.literal('gender-classify'),
  generationId: z.string().uuid(),
  audio: z.string().min(1),
  sample_rate: z.number().int().positive(),
});

export const ClientMessageSchema = z.discriminatedUnion('action', [
  TextToSpeechMessageSchema,
  StreamConfigMessageSchema,
  StreamTextMessageSchema,
  GenderClassifyMessageSchema,
]);

export type TextToSpeechMessage = z.infer<typeof TextToSpeechMessageSchema>;
export type StreamConfig = z.infer<typeof StreamConfigSchema>;
export type StreamConfigMessage = z.infer<typeof StreamConfigMessageSchema>;
export type StreamTextMessage = z.infer<typeof StreamTextMessageSchema>;
export type GenderClassifyMessage = z.infer<typeof GenderClassifyMessageSchema>;
export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type ClientAction = ClientMessage['action'];

// ---------------------------------------------------------------------------
// Server -> client
// ---------------------------------------------------------------------------

export const ServerErrorFieldSchema = z.union([
  z.string(),
  z
    .object({
      code: z.union([z.string(), z.number()]).optional(),
      message: z.string().optional(),
    })
    .passthrough(),
]);

/**
 * The service replies with loosely shaped JSON objects. Audio replies carry
 * `data`, completion is flagged with `isFinished`, and failures carry `error`.
 * Absent fields may also arrive as `null`. Unknown keys are kept so newer
 * server fields survive decoding.
 */
export const ServerMessageSchema = z
  .object({
    action: z.string().nullish(),
    generationId: z.string().nullish(),
    data: z.string().nullish(),
    index: z.number().nullish(),
    isFinished: z.boolean().nullish(),
    error: ServerErrorFieldSchema.nullish(),
    predicted_gender: z.string().nullish(),
    confidence: z.number().nullish(),
  })
  .passthrough();

export type ServerErrorField = z.infer<typeof ServerErrorFieldSchema>;
export type ServerMessage = z.infer<typeof ServerMessageSchema>;

export const GenderClassificationSchema = z
  .object({
    predicted_gender: z.string(),
    confidence: z.number(),
    generationId: z.string().nullish(),
  })
  .passthrough();
export type GenderClassification = z.infer<typeof GenderClassificationSchema>;

export function validateClientMessage(data: unknown): ClientMessage {
  return ClientMessageSchema.parse(data);
}

export function safeValidateClientMessage(
  data: unknown,
): z.SafeParseReturnType<unknown, ClientMessage> {
  return ClientMessageSchema.safeParse(data);
}

export function safeValidateServerMessage(
  data: unknown,
): z.SafeParseReturnType<unknown, ServerMessage> {
  return ServerMessageSchema.safeParse(data);
}
