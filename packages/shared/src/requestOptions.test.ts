import { describe, expect, it } from 'vitest';

import { ValidationError } from './errors';
import {
  AddVoiceOptionsSchema,
  GenderSchema,
  RestTtsOptionsSchema,
  StreamingTtsOptionsSchema,
  TextStreamOptionsSchema,
  parseOptions,
  toAccentControl,
} from './requestOptions';

describe('request option schemas', () => {
  it('fills streaming defaults', () => {
    const options = parseOptions(StreamingTtsOptionsSchema, { text: 'hi' }, 'request');
    expect(options.model).toBe('dd-etts-2.5');
    expect(options.locale).toBe('en-US');
    expect(options.format).toBe('wav');
  });

  it('rejects tempo together with duration', () => {
    expect(() =>
      parseOptions(StreamingTtsOptionsSchema, { text: 'hi', tempo: 1.1, duration: 2 }, 'request'),
    ).toThrow('Invalid request: tempo: Tempo and duration are mutually exclusive');
  });

  it('requires all accent fields or none', () => {
    try {
      parseOptions(
        StreamingTtsOptionsSchema,
        { text: 'hi', accentBaseLocale: 'en-US', accentLocale: 'fr-FR' },
        'request',
      );
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.issues.map((issue) => issue.path)).toEqual(['accentBaseLocale']);
      }
    }
  });

  it('accepts listed and non dd- models only', () => {
    expect(StreamingTtsOptionsSchema.safeParse({ text: 'hi', model: 'dd-etts-3.0' }).success).toBe(true);
    expect(StreamingTtsOptionsSchema.safeParse({ text: 'hi', model: 'custom-voice' }).success).toBe(true);
    expect(StreamingTtsOptionsSchema.safeParse({ text: 'hi', model: 'dd-etts-9' }).success).toBe(false);
  });

  it('rejects unsupported sample rates', () => {
    expect(StreamingTtsOptionsSchema.safeParse({ text: 'hi', sampleRate: 44100 }).success).toBe(true);
    expect(StreamingTtsOptionsSchema.safeParse({ text: 'hi', sampleRate: 12345 }).success).toBe(false);
  });

  it('rejects generation ids that are not uuids', () => {
    expect(() =>
      parseOptions(StreamingTtsOptionsSchema, { text: 'hi', generationId: 'abc' }, 'request'),
    ).toThrow('Invalid request: generationId: Invalid UUID string for generationId');
  });

  it('requires a voice for REST synthesis', () => {
    expect(() => parseOptions(RestTtsOptionsSchema, { text: 'hi' }, 'tts')).toThrow(
      'Invalid tts: voicePromptId: Either voiceReference or voicePromptId must be provided',
    );
  });

  it('does not accept plain wav over REST', () => {
    expect(
      RestTtsOptionsSchema.safeParse({ text: 'hi', voicePromptId: 'voice-1', format: 'wav' }).success,
    ).toBe(false);
    expect(
      RestTtsOptionsSchema.safeParse({ text: 'hi', voicePromptId: 'voice-1', format: 'headerless-wav' })
        .success,
    ).toBe(true);
  });

  it('accepts s16le only for text streaming', () => {
    expect(
      TextStreamOptionsSchema.safeParse({ voicePromptId: 'voice-1', format: 's16le' }).success,
    ).toBe(true);
    expect(StreamingTtsOptionsSchema.safeParse({ text: 'hi', format: 's16le' }).success).toBe(false);
  });

  it('defaults the text stream sample rate', () => {
    const options = parseOptions(TextStreamOptionsSchema, { voicePromptId: 'voice-1' }, 'config');
    expect(options.sampleRate).toBe(16000);
  });

  it('normalizes voice upload fields', () => {
    expect(GenderSchema.parse('Female')).toBe('female');
    expect(GenderSchema.safeParse('other').success).toBe(false);

    const options = parseOptions(
      AddVoiceOptionsSchema,
      { data: { path: 'voice.wav' }, name: 'Narrator', gender: 'MALE', locale: 'en-US' },
      'voice',
    );
    expect(options).toEqual({
      data: { path: 'voice.wav' },
      name: 'Narrator',
      gender: 'male',
      locale: 'en-US',
      publish: false,
      speakingStyle: 'Neutral',
      age: 0,
    });
  });
});

describe('toAccentControl', () => {
  it('builds the control only from a complete triple', () => {
    expect(
      toAccentControl({ accentBaseLocale: 'en-US', accentLocale: 'en-GB', accentRatio: 0.5 }),
    ).toEqual({ accentBaseLocale: 'en-US', accentLocale: 'en-GB', accentRatio: 0.5 });
    expect(toAccentControl({ accentBaseLocale: 'en-US' })).toBeNull();
  });
});
