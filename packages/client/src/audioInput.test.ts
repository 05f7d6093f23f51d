import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ValidationError } from '@deepdub/shared';

import { isBase64, resolveAudioInput } from './audioInput';

describe('isBase64', () => {
  it('accepts padded base64 and ignores whitespace', () => {
    expect(isBase64('AQID')).toBe(true);
    expect(isBase64('AQ==')).toBe(true);
    expect(isBase64('AQID\nBAU=')).toBe(true);
  });

  it('rejects other text', () => {
    expect(isBase64('')).toBe(false);
    expect(isBase64('abc')).toBe(false);
    expect(isBase64('ab$d')).toBe(false);
  });
});

describe('resolveAudioInput', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'deepdub-audio-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('encodes raw bytes', async () => {
    const resolved = await resolveAudioInput(Uint8Array.from([1, 2, 3]));

    expect(resolved.base64).toBe('AQID');
    expect(Array.from(resolved.bytes)).toEqual([1, 2, 3]);
    expect(resolved.filename).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('reads files and keeps their basename', async () => {
    const file = path.join(dir, 'sample.wav');
    fs.writeFileSync(file, Buffer.from([4, 5]));

    const resolved = await resolveAudioInput({ path: file });

    expect(resolved.filename).toBe('sample.wav');
    expect(resolved.base64).toBe('BAU=');
    expect(Array.from(resolved.bytes)).toEqual([4, 5]);
  });

  it('decodes base64 text', async () => {
    const resolved = await resolveAudioInput({ base64: 'AQID\n' });

    expect(Array.from(resolved.bytes)).toEqual([1, 2, 3]);
    expect(resolved.base64).toBe('AQID');
  });

  it('rejects text that is not base64', async () => {
    await expect(resolveAudioInput({ base64: 'not base64!' })).rejects.toBeInstanceOf(ValidationError);
    await expect(resolveAudioInput({ base64: 'not base64!' })).rejects.toThrow(
      'string data must be base64 encoded',
    );
  });
});
