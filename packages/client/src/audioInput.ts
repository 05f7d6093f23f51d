import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

import { ValidationError, type AudioInput } from '@deepdub/shared';

export interface ResolvedAudioInput {
  bytes: Uint8Array;
  base64: string;
  filename: string;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function isBase64(value: string): boolean {
  const compact = value.replace(/\s+/g, '');
  return compact.length > 0 && compact.length % 4 === 0 && BASE64_PATTERN.test(compact);
}

/**
 * Normalizes raw bytes, base64 text or a file path into bytes plus their
 * base64 form. Files keep their basename; other inputs get a random name.
 */
export async function resolveAudioInput(input: AudioInput): Promise<ResolvedAudioInput> {
  if (input instanceof Uint8Array) {
    return {
      bytes: input,
      base64: Buffer.from(input.buffer, input.byteOffset, input.byteLength).toString('base64'),
      filename: randomUUID(),
    };
  }

  if ('path' in input) {
    const buffer = await fs.readFile(input.path);
    return {
      bytes: new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength),
      base64: buffer.toString('base64'),
      filename: path.basename(input.path),
    };
  }

  if (!isBase64(input.base64)) {
    throw new ValidationError('string data must be base64 encoded', [
      { path: 'base64', message: 'not valid base64' },
    ]);
  }
  const buffer = Buffer.from(input.base64, 'base64');
  return {
    bytes: new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength),
    base64: input.base64.replace(/\s+/g, ''),
    filename: randomUUID(),
  };
}
