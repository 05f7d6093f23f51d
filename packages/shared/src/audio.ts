import { ValidationError } from './errors';

export const WAV_HEADER_SIZE = 44;
export const PCM16_BYTES_PER_SAMPLE = 2;
const WAV_FORMAT_PCM = 1;

export interface Pcm16Audio {
  sampleRate: number;
  channels: number;
  /**
   * Interleaved little-endian signed 16-bit samples.
   */
  samples: Int16Array;
}

function readTag(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3),
  );
}

function writeTag(view: DataView, offset: number, tag: string): void {
  for (let i = 0; i < 4; i += 1) {
    view.setUint8(offset + i, tag.charCodeAt(i));
  }
}

export function isWav(bytes: Uint8Array): boolean {
  if (bytes.byteLength < 12) {
    return false;
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return readTag(view, 0) === 'RIFF' && readTag(view, 8) === 'WAVE';
}

/**
 * Decodes a RIFF/WAVE container holding 16-bit PCM. Chunks other than `fmt `
 * and `data` are skipped.
 */
export function decodeWav(input: ArrayBuffer | Uint8Array): Pcm16Audio {
  const bytes = input instanceof Uint8Array ? input : new Uint8Array(input);
  if (!isWav(bytes)) {
    throw new ValidationError('Not a RIFF/WAVE file');
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  let offset = 12;
  let sampleRate = 0;
  let channels = 0;
  let bitsPerSample = 0;
  let formatTag = 0;
  let data: Uint8Array | undefined;

  while (offset + 8 <= bytes.byteLength) {
    const tag = readTag(view, offset);
    const size = view.getUint32(offset + 4, true);
    const bodyStart = offset + 8;
    const bodyEnd = Math.min(bodyStart + size, bytes.byteLength);

    if (tag === 'fmt ') {
      if (size < 16) {
        throw new ValidationError('WAV fmt chunk too short');
      }
      formatTag = view.getUint16(bodyStart, true);
      channels = view.getUint16(bodyStart + 2, true);
      sampleRate = view.getUint32(bodyStart + 4, true);
      bitsPerSample = view.getUint16(bodyStart + 14, true);
    } else if (tag === 'data') {
      data = bytes.subarray(bodyStart, bodyEnd);
    }

    // Chunks are word aligned.
    offset = bodyStart + size + (size % 2);
  }

  if (formatTag !== WAV_FORMAT_PCM || bitsPerSample !== 16) {
    throw new ValidationError(`Unsupported WAV encoding: format ${formatTag}, ${bitsPerSample} bits`);
  }
  if (channels <= 0) {
    throw new ValidationError(`Invalid channel count: ${channels}`);
  }
  if (sampleRate <= 0) {
    throw new ValidationError(`Invalid sample rate: ${sampleRate}`);
  }
  if (!data) {
    throw new ValidationError('WAV file has no data chunk');
  }

  const sampleCount = Math.floor(data.byteLength / PCM16_BYTES_PER_SAMPLE);
  const samples = new Int16Array(sampleCount);
  const dataView = new DataView(data.buffer, data.byteOffset, data.byteLength);
  for (let i = 0; i < sampleCount; i += 1) {
    samples[i] = dataView.getInt16(i * PCM16_BYTES_PER_SAMPLE, true);
  }

  return { sampleRate, channels, samples };
}

export function encodeWav(audio: Pcm16Audio): Uint8Array {
  const dataSize = audio.samples.length * PCM16_BYTES_PER_SAMPLE;
  const buffer = new ArrayBuffer(WAV_HEADER_SIZE + dataSize);
  const view = new DataView(buffer);
  const blockAlign = audio.channels * PCM16_BYTES_PER_SAMPLE;

  writeTag(view, 0, 'RIFF');
  view.setUint32(4, 36 + dataSize, true);
  writeTag(view, 8, 'WAVE');
  writeTag(view, 12, 'fmt ');
  view.setUint32(16, 16, true);
  view.setUint16(20, WAV_FORMAT_PCM, true);
  view.setUint16(22, audio.channels, true);
  view.setUint32(24, audio.sampleRate, true);
  view.setUint32(28, audio.sampleRate * blockAlign, true);
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, 16, true);
  writeTag(view, 36, 'data');
  view.setUint32(40, dataSize, true);

  for (let i = 0; i < audio.samples.length; i += 1) {
    view.setInt16(WAV_HEADER_SIZE + i * PCM16_BYTES_PER_SAMPLE, audio.samples[i] ?? 0, true);
  }

  return new Uint8Array(buffer);
}

export function downmixToMono(audio: Pcm16Audio): Pcm16Audio {
  if (audio.channels === 1) {
    return audio;
  }
  const frames = Math.floor(audio.samples.length / audio.channels);
  const mono = new Int16Array(frames);
  for (let frame = 0; frame < frames; frame += 1) {
    let sum = 0;
    for (let channel = 0; channel < audio.channels; channel += 1) {
      sum += audio.samples[frame * audio.channels + channel] ?? 0;
    }
    mono[frame] = Math.round(sum / audio.channels);
  }
  return { sampleRate: audio.sampleRate, channels: 1, samples: mono };
}

/**
 * Linear-interpolation resampler for mono PCM16.
 */
export function resampleMono(audio: Pcm16Audio, targetSampleRate: number): Pcm16Audio {
  if (audio.channels !== 1) {
    throw new ValidationError('resampleMono expects mono audio');
  }
  if (audio.sampleRate === targetSampleRate) {
    return audio;
  }
  const ratio = audio.sampleRate / targetSampleRate;
  const outputLength = Math.floor(audio.samples.length / ratio);
  const output = new Int16Array(outputLength);
  for (let i = 0; i < outputLength; i += 1) {
    const position = i * ratio;
    const index = Math.floor(position);
    const fraction = position - index;
    const current = audio.samples[index] ?? 0;
    const next = audio.samples[index + 1] ?? current;
    output[i] = Math.round(current + (next - current) * fraction);
  }
  return { sampleRate: targetSampleRate, channels: 1, samples: output };
}

export function trimSeconds(audio: Pcm16Audio, startSeconds: number, endSeconds: number): Pcm16Audio {
  const startFrame = Math.max(0, Math.floor(startSeconds * audio.sampleRate));
  const endFrame = Math.max(startFrame, Math.floor(endSeconds * audio.sampleRate));
  return {
    sampleRate: audio.sampleRate,
    channels: audio.channels,
    samples: audio.samples.slice(startFrame * audio.channels, endFrame * audio.channels),
  };
}

export function stripHeader(chunk: Uint8Array, headerLength: number): Uint8Array {
  if (chunk.byteLength <= headerLength) {
    return new Uint8Array(0);
  }
  return chunk.subarray(headerLength);
}

export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}
