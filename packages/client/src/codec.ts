import {
  ClientMessageSchema,
  DD_WAV_HEADER_LENGTH,
  ProtocolError,
  ServerMessageSchema,
  ValidationError,
  stripHeader,
  toAccentControl,
  type ClientAction,
  type ClientMessage,
  type ResolvedStreamingTtsOptions,
  type ResolvedTextStreamOptions,
  type ServerErrorField,
  type ServerMessage,
  type WireFormat,
} from '@deepdub/shared';

import { isBase64 } from './audioInput';
import type { InboundData } from './transport';

export type CodecRequest =
  | { kind: 'text-to-speech'; generationId: string; options: ResolvedStreamingTtsOptions }
  | { kind: 'stream-config'; options: ResolvedTextStreamOptions }
  | { kind: 'stream-text'; text: string }
  | { kind: 'gender-classify'; generationId: string; audioBase64: string; sampleRate: number };

export type OutboundFrame = Readonly<{
  tag: 'request-init' | 'text-chunk';
  seq: number;
  action: ClientAction;
  generationId?: string;
  /**
   * Serialized wire text, ready for the transport.
   */
  payload: string;
}>;

export type ControlEventKind = 'ack' | 'finished' | 'classification' | 'unknown';

export type AudioChunkFrame = Readonly<{
  tag: 'audio-chunk';
  /**
   * Chunk sequence: the server's `index` when present, otherwise the codec's
   * running count of audio chunks.
   */
  seq: number;
  indexed: boolean;
  generationId?: string;
  data: Uint8Array;
  final: boolean;
}>;

export type ControlEventFrame = Readonly<{
  tag: 'control-event';
  seq: number;
  event: ControlEventKind;
  generationId?: string;
  body: ServerMessage;
}>;

export type ErrorFrame = Readonly<{
  tag: 'error';
  seq: number;
  generationId?: string;
  code: string;
  message: string;
}>;

export type InboundFrame = AudioChunkFrame | ControlEventFrame | ErrorFrame;

export interface MessageCodecOptions {
  /**
   * Drop the service's WAV header from every audio chunk.
   */
  stripWavHeader?: boolean;
  /**
   * Number audio chunks by the server's `index` when present. When false,
   * chunks are numbered in arrival order.
   */
  useServerIndex?: boolean;
}

const KNOWN_ACTIONS: ReadonlySet<string> = new Set<ClientAction>([
  'text-to-speech',
  'stream-config',
  'stream-text',
  'gender-classify',
]);

function toWireFormat(format: string): WireFormat {
  switch (format) {
    case 'headerless-wav':
    case 'wav':
      return 'wav';
    case 'mp3':
    case 'opus':
    case 'mulaw':
    case 's16le':
      return format;
    default:
      throw new ValidationError(`Unsupported format: ${format}`);
  }
}

function describeServerError(error: ServerErrorField): { code: string; message: string } {
  if (typeof error === 'string') {
    return { code: 'server_error', message: error };
  }
  const code = error.code !== undefined ? String(error.code) : 'server_error';
  const message = error.message ?? JSON.stringify(error);
  return { code, message };
}

function isServerErrorPresent(error: ServerErrorField | null | undefined): error is ServerErrorField {
  if (error === undefined || error === null) {
    return false;
  }
  return typeof error !== 'string' || error.length > 0;
}

/**
 * Per-session framing. Holds the outbound and inbound sequence counters, so
 * each session needs its own instance.
 */
export class MessageCodec {
  private readonly stripWavHeader: boolean;
  private readonly useServerIndex: boolean;
  private outboundSeq = 0;
  private inboundSeq = 0;
  private nextAudioSeq = 0;

  constructor(options: MessageCodecOptions = {}) {
    this.stripWavHeader = options.stripWavHeader ?? false;
    this.useServerIndex = options.useServerIndex ?? true;
  }

  encodeRequest(request: CodecRequest): OutboundFrame {
    const message = this.buildMessage(request);
    const checked = ClientMessageSchema.safeParse(message);
    if (!checked.success) {
      throw new ValidationError(
        `Invalid ${message.action} request`,
        checked.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      );
    }

    const seq = this.outboundSeq;
    this.outboundSeq += 1;

    return {
      tag: request.kind === 'stream-text' ? 'text-chunk' : 'request-init',
      seq,
      action: message.action,
      ...('generationId' in request ? { generationId: request.generationId } : {}),
      payload: JSON.stringify(message),
    };
  }

  decode(raw: InboundData): InboundFrame {
    const text =
      typeof raw === 'string'
        ? raw
        : Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength).toString('utf8');

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new ProtocolError('Malformed frame: payload is not JSON', {
        cause: err,
        details: { payload: text.slice(0, 200) },
      });
    }
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ProtocolError('Malformed frame: payload is not a JSON object');
    }

    const result = ServerMessageSchema.safeParse(parsed);
    if (!result.success) {
      throw new ProtocolError('Malformed frame: unexpected field types', {
        details: result.error.issues,
      });
    }

    const message = result.data;
    const seq = this.inboundSeq;
    this.inboundSeq += 1;
    const generation =
      message.generationId !== undefined && message.generationId !== null
        ? { generationId: message.generationId }
        : {};

    if (isServerErrorPresent(message.error)) {
      const { code, message: errorMessage } = describeServerError(message.error);
      return { tag: 'error', seq, ...generation, code, message: errorMessage };
    }

    if (typeof message.data === 'string' && message.data.length > 0) {
      if (!isBase64(message.data)) {
        throw new ProtocolError('Malformed frame: audio data is not base64');
      }
      const decoded = Buffer.from(message.data, 'base64');
      let bytes: Uint8Array = new Uint8Array(decoded.buffer, decoded.byteOffset, decoded.byteLength);
      if (this.stripWavHeader) {
        bytes = stripHeader(bytes, DD_WAV_HEADER_LENGTH);
      }
      const index = message.index;
      const serverIndex =
        this.useServerIndex && typeof index === 'number' && Number.isInteger(index) && index >= 0
          ? index
          : null;
      const indexed = serverIndex !== null;
      const chunkSeq = serverIndex ?? this.nextAudioSeq;
      this.nextAudioSeq = chunkSeq + 1;
      return {
        tag: 'audio-chunk',
        seq: chunkSeq,
        indexed,
        ...generation,
        data: bytes,
        final: message.isFinished === true,
      };
    }

    if (message.isFinished === true) {
      return { tag: 'control-event', seq, event: 'finished', ...generation, body: message };
    }

    if (typeof message.predicted_gender === 'string') {
      return { tag: 'control-event', seq, event: 'classification', ...generation, body: message };
    }

    const event: ControlEventKind =
      typeof message.action === 'string' && KNOWN_ACTIONS.has(message.action) ? 'ack' : 'unknown';
    return { tag: 'control-event', seq, event, ...generation, body: message };
  }

  private buildMessage(request: CodecRequest): ClientMessage {
    switch (request.kind) {
      case 'text-to-speech': {
        const { options } = request;
        return {
          action: 'text-to-speech',
          generationId: request.generationId,
          targetText: options.text,
          model: options.model,
          voicePromptId: options.voicePromptId ?? null,
          locale: options.locale,
          temperature: options.temperature ?? null,
          variance: options.variance ?? null,
          duration: options.duration ?? null,
          seed: options.seed ?? null,
          tempo: options.tempo ?? null,
          promptBoost: options.promptBoost ?? null,
          accentControl: toAccentControl(options),
          format: toWireFormat(options.format),
          sampleRate: options.sampleRate ?? null,
          targetGender: options.targetGender ?? null,
          ...(options.extra ?? {}),
        };
      }
      case 'stream-config': {
        const { options } = request;
        return {
          action: 'stream-config',
          config: {
            model: options.model,
            locale: options.locale,
            voicePromptId: options.voicePromptId,
            format: toWireFormat(options.format),
            sampleRate: options.sampleRate,
            temperature: options.temperature ?? null,
            variance: options.variance ?? null,
            tempo: options.tempo ?? null,
            promptBoost: options.promptBoost ?? null,
            accentControl: toAccentControl(options),
          },
        };
      }
      case 'stream-text':
        return { action: 'stream-text', data: { text: request.text } };
      case 'gender-classify':
        return {
          action: 'gender-classify',
          generationId: request.generationId,
          audio: request.audioBase64,
          sample_rate: request.sampleRate,
        };
    }
  }
}
