import { randomUUID } from 'node:crypto';

import {
  AddVoiceOptionsSchema,
  ConnectionError,
  GenderClassificationSchema,
  GenderClassifyOptionsSchema,
  ProtocolError,
  RestTtsOptionsSchema,
  RetroTtsOptionsSchema,
  StreamingTtsOptionsSchema,
  TextStreamOptionsSchema,
  ValidationError,
  decodeWav,
  downmixToMono,
  encodeWav,
  isWav,
  parseOptions,
  resampleMono,
  silentLogger,
  toAccentControl,
  trimSeconds,
  type AddVoiceOptions,
  type AudioInput,
  type GenderClassification,
  type GenderClassifyOptions,
  type Logger,
  type RestTtsOptions,
  type RetroTtsOptions,
  type StreamingTtsOptions,
  type TextStreamOptions,
} from '@deepdub/shared';

import { resolveAudioInput } from './audioInput';
import type { SleepFn } from './backoff';
import { MessageCodec } from './codec';
import { loadClientConfig, type ClientConfig, type ClientConfigOverrides } from './config';
import { httpRequest, type HttpRequestOptions, type HttpResult } from './httpClient';
import { SynthesisSession, errorFromServerFrame, type SessionRequest } from './session';
import { SessionSlots } from './slots';
import type { Connection, TransportChannel } from './transport';
import { WsTransportChannel } from './wsTransport';

export const GENDER_CLASSIFY_SAMPLE_RATE = 16000;
const GENDER_CLASSIFY_MAX_SECONDS = 1;

export interface DeepdubClientOptions {
  config: ClientConfig;
  logger?: Logger;
  transport?: TransportChannel;
  fetchImpl?: typeof fetch;
  sleep?: SleepFn;
}

export interface SessionCreateOptions {
  /**
   * Aborts the wait for a free session slot.
   */
  signal?: AbortSignal;
}

export interface Voice {
  [key: string]: unknown;
}

export type TtsResult = HttpResult;

/**
 * Entry point for the REST endpoints and the streaming sessions. Sessions get
 * their own connection and count against `maxConcurrentSessions`.
 */
export class DeepdubClient {
  readonly config: ClientConfig;

  private readonly logger: Logger;
  private readonly transport: TransportChannel;
  private readonly fetchImpl: typeof fetch | undefined;
  private readonly sleep: SleepFn | undefined;
  private readonly slots: SessionSlots;

  constructor(options: DeepdubClientOptions) {
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
    this.transport =
      options.transport ??
      new WsTransportChannel({
        connectTimeoutMs: options.config.connectTimeoutMs,
        heartbeatIntervalMs: options.config.heartbeatIntervalMs,
        heartbeatTimeoutMs: options.config.heartbeatTimeoutMs,
        logger: this.logger,
      });
    this.fetchImpl = options.fetchImpl;
    this.sleep = options.sleep;
    this.slots = new SessionSlots({ limit: options.config.maxConcurrentSessions });
  }

  static fromEnv(
    overrides: ClientConfigOverrides = {},
    options: Omit<DeepdubClientOptions, 'config'> = {},
  ): DeepdubClient {
    return new DeepdubClient({ ...options, config: loadClientConfig({ overrides }) });
  }

  async listVoices(signal?: AbortSignal): Promise<Voice[]> {
    const result = await this.request({ path: '/voice', ...(signal ? { signal } : {}) });
    if (result.kind !== 'json' || !Array.isArray(result.value)) {
      throw new ProtocolError('Expected a JSON array of voices');
    }
    return result.value.filter(
      (voice): voice is Voice => typeof voice === 'object' && voice !== null && !Array.isArray(voice),
    );
  }

  async addVoice(input: AddVoiceOptions, signal?: AbortSignal): Promise<unknown> {
    const options = parseOptions(AddVoiceOptionsSchema, input, 'voice');
    const audio = await resolveAudioInput(options.data);
    const body = {
      name: options.name,
      gender: options.gender,
      age: options.age,
      locale: options.locale,
      publish: options.publish,
      speaking_style: options.speakingStyle,
      speaker_id: randomUUID(),
      title: `${options.name}-${options.gender}-${options.age}-${options.locale}-${options.speakingStyle}`,
      data: audio.base64,
      filename: audio.filename,
    };
    const result = await this.request({
      path: '/voice',
      method: 'POST',
      body,
      ...(signal ? { signal } : {}),
    });
    return result.kind === 'json' ? result.value : result.bytes;
  }

  async tts(input: RestTtsOptions, signal?: AbortSignal): Promise<TtsResult> {
    const options = parseOptions(RestTtsOptionsSchema, input, 'tts request');
    const voiceReference = options.voiceReference
      ? (await resolveAudioInput(options.voiceReference)).base64
      : null;
    const body = {
      targetText: options.text,
      model: options.model,
      voicePromptId: options.voicePromptId ?? null,
      locale: options.locale,
      voiceReference,
      temperature: options.temperature ?? null,
      variance: options.variance ?? null,
      duration: options.duration ?? null,
      seed: options.seed ?? null,
      tempo: options.tempo ?? null,
      promptBoost: options.promptBoost ?? null,
      accentControl: toAccentControl(options),
      sampleRate: options.sampleRate ?? null,
      format: options.format,
      ...(options.extra ?? {}),
    };
    return this.request({ path: '/tts', method: 'POST', body, ...(signal ? { signal } : {}) });
  }

  async ttsRetro(input: RetroTtsOptions, signal?: AbortSignal): Promise<TtsResult> {
    const options = parseOptions(RetroTtsOptionsSchema, input, 'retroactive tts request');
    return this.request({
      path: '/tts/retroactive',
      method: 'POST',
      body: {
        targetText: options.text,
        model: options.model,
        voicePromptId: options.voicePromptId,
        locale: options.locale,
      },
      ...(signal ? { signal } : {}),
    });
  }

  /**
   * Creates a text-to-speech session once a session slot is free. The slot is
   * returned when the session finishes, fails or is cancelled, so callers
   * must `start()` or `cancel()` it.
   */
  async createTtsSession(
    input: StreamingTtsOptions,
    options: SessionCreateOptions = {},
  ): Promise<SynthesisSession> {
    const resolved = parseOptions(StreamingTtsOptionsSchema, input, 'streaming tts request');
    return this.createSession(
      {
        kind: 'tts',
        generationId: resolved.generationId ?? randomUUID(),
        options: resolved,
      },
      this.config.websocketUrl,
      options,
    );
  }

  /**
   * Creates a text-streaming session: feed it with `sendText()` and finish
   * with `endInput()`.
   */
  async createStreamSession(
    input: TextStreamOptions,
    options: SessionCreateOptions = {},
  ): Promise<SynthesisSession> {
    const resolved = parseOptions(TextStreamOptionsSchema, input, 'stream config');
    return this.createSession(
      { kind: 'text-stream', options: resolved },
      this.config.streamingWebsocketUrl,
      options,
    );
  }

  /**
   * Streams one request's audio. Breaking out of the loop or aborting the
   * signal cancels the session.
   */
  async *synthesize(
    input: StreamingTtsOptions,
    options: SessionCreateOptions = {},
  ): AsyncGenerator<Uint8Array, void, undefined> {
    const session = await this.createTtsSession(input, options);
    const onAbort = (): void => session.cancel();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    try {
      await session.start();
      yield* session.audio();
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      session.cancel();
    }
  }

  /**
   * Classifies the speaker's gender from the first second of a WAV sample,
   * resampled to 16 kHz mono, over a dedicated connection.
   */
  async classifyGender(
    audio: AudioInput,
    input: GenderClassifyOptions = {},
  ): Promise<GenderClassification> {
    const options = parseOptions(GenderClassifyOptionsSchema, input, 'gender classification');
    const resolved = await resolveAudioInput(audio);
    if (!isWav(resolved.bytes)) {
      throw new ValidationError('Gender classification requires WAV audio', [
        { path: 'audio', message: 'not a RIFF/WAVE file' },
      ]);
    }
    const mono = downmixToMono(decodeWav(resolved.bytes));
    const sample = trimSeconds(
      resampleMono(mono, GENDER_CLASSIFY_SAMPLE_RATE),
      0,
      GENDER_CLASSIFY_MAX_SECONDS,
    );
    const wav = encodeWav(sample);
    const generationId = options.generationId ?? randomUUID();

    const codec = new MessageCodec();
    const frame = codec.encodeRequest({
      kind: 'gender-classify',
      generationId,
      audioBase64: Buffer.from(wav.buffer, wav.byteOffset, wav.byteLength).toString('base64'),
      sampleRate: options.sampleRate,
    });

    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(), options.timeoutMs);
    try {
      const connection = await this.transport.open(
        this.config.websocketUrl,
        { apiKey: this.config.apiKey },
        timeout.signal,
      );
      try {
        return await this.awaitClassification(
          connection,
          codec,
          frame.payload,
          generationId,
          options.timeoutMs,
          timeout.signal,
        );
      } finally {
        this.transport.close(connection);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private async awaitClassification(
    connection: Connection,
    codec: MessageCodec,
    payload: string,
    generationId: string,
    timeoutMs: number,
    signal: AbortSignal,
  ): Promise<GenderClassification> {
    await this.transport.send(connection, payload);
    while (true) {
      const result = await this.transport.receive(connection, signal);
      if (result.kind === 'cancelled') {
        throw new ConnectionError(`Gender classification timed out after ${timeoutMs}ms`);
      }
      if (result.kind === 'end') {
        throw new ConnectionError('Connection closed before the classification arrived');
      }
      const inbound = codec.decode(result.data);
      if (inbound.generationId !== undefined && inbound.generationId !== generationId) {
        continue;
      }
      if (inbound.tag === 'error') {
        throw errorFromServerFrame(inbound);
      }
      if (inbound.tag === 'control-event' && inbound.event === 'classification') {
        const parsed = GenderClassificationSchema.safeParse(inbound.body);
        if (!parsed.success) {
          throw new ProtocolError('Malformed gender classification reply');
        }
        this.logger.debug?.('gender classified', {
          generationId,
          gender: parsed.data.predicted_gender,
        });
        return parsed.data;
      }
    }
  }

  private async createSession(
    request: SessionRequest,
    endpoint: string,
    options: SessionCreateOptions,
  ): Promise<SynthesisSession> {
    const release = await this.slots.acquire(options.signal);
    const session = new SynthesisSession({
      request,
      transport: this.transport,
      endpoint,
      credentials: { apiKey: this.config.apiKey },
      retry: this.config.retry,
      highWaterMarkBytes: this.config.highWaterMarkBytes,
      logger: this.logger,
      ...(this.sleep ? { sleep: this.sleep } : {}),
    });
    session.addStateListener((state) => {
      if (state === 'draining' || state === 'closed' || state === 'errored') {
        release();
      }
    });
    this.logger.debug?.('session created', { sessionId: session.id, kind: request.kind });
    return session;
  }

  private request(init: HttpRequestOptions): Promise<HttpResult> {
    return httpRequest(
      {
        baseUrl: this.config.baseUrl,
        apiKey: this.config.apiKey,
        logger: this.logger,
        ...(this.fetchImpl ? { fetchImpl: this.fetchImpl } : {}),
      },
      init,
    );
  }
}
