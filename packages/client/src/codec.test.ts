import { describe, expect, it } from 'vitest';

import {
  ProtocolError,
  StreamingTtsOptionsSchema,
  TextStreamOptionsSchema,
  ValidationError,
  parseOptions,
} from '@deepdub/shared';

import { MessageCodec, type AudioChunkFrame, type InboundFrame } from './codec';

const GENERATION_ID = '5f0c8f2a-1b3d-4c5e-8f70-9a1b2c3d4e5f';

function audioOf(frame: InboundFrame): AudioChunkFrame {
  if (frame.tag !== 'audio-chunk') {
    throw new Error(`expected an audio chunk, got ${frame.tag}`);
  }
  return frame;
}

function b64(bytes: number[]): string {
  return Buffer.from(bytes).toString('base64');
}

describe('MessageCodec.encodeRequest', () => {
  it('serializes a text-to-speech request with nulls for unset fields', () => {
    const codec = new MessageCodec();
    const options = parseOptions(
      StreamingTtsOptionsSchema,
      {
        text: 'Hello',
        voicePromptId: 'voice-1',
        format: 'headerless-wav',
        accentBaseLocale: 'en-US',
        accentLocale: 'fr-FR',
        accentRatio: 0.5,
        extra: { style: 'calm' },
      },
      'request',
    );

    const frame = codec.encodeRequest({ kind: 'text-to-speech', generationId: GENERATION_ID, options });

    expect(frame.tag).toBe('request-init');
    expect(frame.seq).toBe(0);
    expect(frame.action).toBe('text-to-speech');
    expect(frame.generationId).toBe(GENERATION_ID);
    expect(JSON.parse(frame.payload)).toEqual({
      action: 'text-to-speech',
      generationId: GENERATION_ID,
      targetText: 'Hello',
      model: 'dd-etts-2.5',
      voicePromptId: 'voice-1',
      locale: 'en-US',
      temperature: null,
      variance: null,
      duration: null,
      seed: null,
      tempo: null,
      promptBoost: null,
      accentControl: { accentBaseLocale: 'en-US', accentLocale: 'fr-FR', accentRatio: 0.5 },
      format: 'wav',
      sampleRate: null,
      targetGender: null,
      style: 'calm',
    });
  });

  it('numbers stream frames and tags text chunks', () => {
    const codec = new MessageCodec();
    const options = parseOptions(TextStreamOptionsSchema, { voicePromptId: 'voice-1' }, 'config');

    const config = codec.encodeRequest({ kind: 'stream-config', options });
    const text = codec.encodeRequest({ kind: 'stream-text', text: 'Hi there' });

    expect([config.tag, config.seq]).toEqual(['request-init', 0]);
    expect([text.tag, text.seq]).toEqual(['text-chunk', 1]);
    expect(config.generationId).toBeUndefined();
    expect(JSON.parse(config.payload)).toEqual({
      action: 'stream-config',
      config: {
        model: 'dd-etts-2.5',
        locale: 'en-US',
        voicePromptId: 'voice-1',
        format: 'wav',
        sampleRate: 16000,
        temperature: null,
        variance: null,
        tempo: null,
        promptBoost: null,
        accentControl: null,
      },
    });
    expect(JSON.parse(text.payload)).toEqual({ action: 'stream-text', data: { text: 'Hi there' } });
  });

  it('serializes a gender classification request', () => {
    const codec = new MessageCodec();

    const frame = codec.encodeRequest({
      kind: 'gender-classify',
      generationId: GENERATION_ID,
      audioBase64: 'AAAA',
      sampleRate: 16000,
    });

    expect(JSON.parse(frame.payload)).toEqual({
      action: 'gender-classify',
      generationId: GENERATION_ID,
      audio: 'AAAA',
      sample_rate: 16000,
    });
  });

  it('rejects requests that do not match the wire schema', () => {
    const codec = new MessageCodec();
    const options = parseOptions(StreamingTtsOptionsSchema, { text: 'Hello' }, 'request');

    expect(() =>
      codec.encodeRequest({ kind: 'text-to-speech', generationId: 'not-a-uuid', options }),
    ).toThrow(ValidationError);
    expect(() =>
      codec.encodeRequest({ kind: 'text-to-speech', generationId: 'not-a-uuid', options }),
    ).toThrow('Invalid text-to-speech request');
  });
});

describe('MessageCodec.decode', () => {
  it('decodes indexed audio chunks', () => {
    const codec = new MessageCodec();

    const frame = audioOf(
      codec.decode(
        JSON.stringify({ generationId: GENERATION_ID, data: b64([1, 2, 3]), index: 4, isFinished: true }),
      ),
    );

    expect(frame.seq).toBe(4);
    expect(frame.indexed).toBe(true);
    expect(frame.final).toBe(true);
    expect(frame.generationId).toBe(GENERATION_ID);
    expect(Array.from(frame.data)).toEqual([1, 2, 3]);
  });

  it('counts unindexed audio chunks', () => {
    const codec = new MessageCodec();

    const first = audioOf(codec.decode(JSON.stringify({ data: b64([1]) })));
    const second = audioOf(codec.decode(JSON.stringify({ data: b64([2]) })));

    expect([first.seq, first.indexed, first.final]).toEqual([0, false, false]);
    expect([second.seq, second.indexed]).toEqual([1, false]);
  });

  it('accepts binary frames', () => {
    const codec = new MessageCodec();
    const raw = new Uint8Array(Buffer.from(JSON.stringify({ data: b64([5]), index: 0 })));

    expect(Array.from(audioOf(codec.decode(raw)).data)).toEqual([5]);
  });

  it('strips the service WAV header when asked', () => {
    const codec = new MessageCodec({ stripWavHeader: true });
    const bytes = [...new Array<number>(68).fill(0), 8, 9];

    expect(Array.from(audioOf(codec.decode(JSON.stringify({ data: b64(bytes) }))).data)).toEqual([8, 9]);
  });

  it('maps error fields to error frames', () => {
    const codec = new MessageCodec();

    expect(codec.decode(JSON.stringify({ error: 'quota exceeded' }))).toEqual({
      tag: 'error',
      seq: 0,
      code: 'server_error',
      message: 'quota exceeded',
    });
    expect(
      codec.decode(JSON.stringify({ generationId: GENERATION_ID, error: { code: 42, message: 'bad' } })),
    ).toEqual({ tag: 'error', seq: 1, generationId: GENERATION_ID, code: '42', message: 'bad' });
    expect(codec.decode(JSON.stringify({ error: { code: 'busy' } }))).toMatchObject({
      tag: 'error',
      code: 'busy',
      message: '{"code":"busy"}',
    });
  });

  it('ignores empty and null error fields', () => {
    const codec = new MessageCodec();

    expect(codec.decode(JSON.stringify({ error: '', isFinished: true }))).toMatchObject({
      tag: 'control-event',
      event: 'finished',
    });
    expect(codec.decode(JSON.stringify({ error: null, data: b64([1]) })).tag).toBe('audio-chunk');
  });

  it('classifies control events', () => {
    const codec = new MessageCodec();

    expect(codec.decode(JSON.stringify({ isFinished: true }))).toMatchObject({ event: 'finished', seq: 0 });
    expect(
      codec.decode(JSON.stringify({ predicted_gender: 'female', confidence: 0.9 })),
    ).toMatchObject({ event: 'classification', seq: 1 });
    expect(codec.decode(JSON.stringify({ action: 'stream-config', status: 'ready' }))).toMatchObject({
      event: 'ack',
      body: { action: 'stream-config', status: 'ready' },
    });
    expect(codec.decode(JSON.stringify({ action: 'heartbeat' }))).toMatchObject({ event: 'unknown' });
  });

  it('treats null fields as absent', () => {
    const codec = new MessageCodec();

    expect(codec.decode('{"generationId":"g","data":null,"isFinished":true}')).toEqual({
      tag: 'control-event',
      seq: 0,
      generationId: 'g',
      event: 'finished',
      body: { generationId: 'g', data: null, isFinished: true },
    });
    const frame = audioOf(
      codec.decode(JSON.stringify({ generationId: null, data: b64([1]), index: null, isFinished: null })),
    );
    expect([frame.seq, frame.indexed, frame.final, frame.generationId]).toEqual([0, false, false, undefined]);
  });

  it('numbers chunks in arrival order when server indexes are ignored', () => {
    const codec = new MessageCodec({ useServerIndex: false });

    const first = audioOf(codec.decode(JSON.stringify({ data: b64([1]), index: 0 })));
    const second = audioOf(codec.decode(JSON.stringify({ data: b64([2]), index: 0 })));

    expect([first.seq, first.indexed]).toEqual([0, false]);
    expect([second.seq, second.indexed]).toEqual([1, false]);
  });

  it('rejects malformed frames', () => {
    const codec = new MessageCodec();

    expect(() => codec.decode('not json')).toThrow('Malformed frame: payload is not JSON');
    expect(() => codec.decode('[1, 2]')).toThrow('Malformed frame: payload is not a JSON object');
    expect(() => codec.decode(JSON.stringify({ data: 5 }))).toThrow(
      'Malformed frame: unexpected field types',
    );
    expect(() => codec.decode(JSON.stringify({ data: '!!!!' }))).toThrow(ProtocolError);
    expect(() => codec.decode(JSON.stringify({ data: '!!!!' }))).toThrow(
      'Malformed frame: audio data is not base64',
    );
  });
});
