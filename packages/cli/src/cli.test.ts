import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { AuthError, ConfigError, HttpError, UnrecoverableError, ValidationError } from '@deepdub/shared';

const client = vi.hoisted(() => ({
  listVoices: vi.fn(),
  addVoice: vi.fn(),
  tts: vi.fn(),
  synthesize: vi.fn(),
  classifyGender: vi.fn(),
}));
const createClient = vi.hoisted(() => vi.fn(() => client));

vi.mock('./clientFactory', () => ({ createClient }));

import {
  EXIT_CONFIG,
  EXIT_HTTP_ERROR,
  EXIT_OK,
  EXIT_STREAM_ERROR,
  EXIT_UNKNOWN_ERROR,
  EXIT_USAGE,
  runCli,
} from './cli';
import type { OutputStream } from './output';

class MemoryStream implements OutputStream {
  readonly chunks: Array<string | Uint8Array> = [];

  write(chunk: string | Uint8Array, callback?: (err?: Error | null) => void): boolean {
    this.chunks.push(chunk);
    callback?.();
    return true;
  }

  get text(): string {
    return this.chunks.filter((chunk): chunk is string => typeof chunk === 'string').join('');
  }

  get bytes(): number[] {
    return this.chunks.flatMap((chunk) => (typeof chunk === 'string' ? [] : Array.from(chunk)));
  }
}

async function* audio(...parts: number[][]): AsyncGenerator<Uint8Array, void, undefined> {
  for (const part of parts) {
    yield Uint8Array.from(part);
  }
}

async function* failingAudio(error: Error): AsyncGenerator<Uint8Array, void, undefined> {
  yield Uint8Array.from([1]);
  throw error;
}

describe('runCli', () => {
  let stdout: MemoryStream;
  let stderr: MemoryStream;
  let dir: string;

  const run = (...argv: string[]): Promise<number> =>
    runCli({ argv, env: { DEEPDUB_API_KEY: 'test-secret' }, stdout, stderr });

  beforeEach(() => {
    vi.clearAllMocks();
    stdout = new MemoryStream();
    stderr = new MemoryStream();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'deepdub-cli-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lists voices as tab separated lines', async () => {
    client.listVoices.mockResolvedValue([
      { id: 'v1', name: 'Narrator', locale: 'en-US' },
      { voicePromptId: 'v2', title: 'Host' },
    ]);

    expect(await run('voices')).toBe(EXIT_OK);
    expect(stdout.text).toBe('v1\tNarrator\ten-US\nv2\tHost\t\n');
  });

  it('prints voices as JSON with --json', async () => {
    const voices = [{ id: 'v1', name: 'Narrator' }];
    client.listVoices.mockResolvedValue(voices);

    expect(await run('voices', '--json')).toBe(EXIT_OK);
    expect(stdout.text).toBe(`${JSON.stringify(voices, null, 2)}\n`);
  });

  it('passes global options to the client factory', async () => {
    client.listVoices.mockResolvedValue([]);

    await run('voices', '--api-key', 'test-secret', '--eu');

    expect(createClient).toHaveBeenCalledWith(
      expect.objectContaining({
        env: { DEEPDUB_API_KEY: 'test-secret' },
        overrides: { apiKey: 'test-secret', eu: true },
      }),
    );
  });

  it('streams audio to stdout and reports on stderr', async () => {
    client.synthesize.mockReturnValue(audio([1, 2], [3]));

    expect(await run('stream', '--text', 'Hi', '--voice-prompt-id', 'voice-1')).toBe(EXIT_OK);

    expect(client.synthesize).toHaveBeenCalledWith({ text: 'Hi', format: 'wav', voicePromptId: 'voice-1' });
    expect(stdout.bytes).toEqual([1, 2, 3]);
    expect(stderr.text).toBe('Wrote 3 bytes to stdout\n');
  });

  it('writes REST audio to the output file', async () => {
    const out = path.join(dir, 'hello.mp3');
    client.tts.mockResolvedValue({ kind: 'binary', bytes: Uint8Array.from([7, 8]), contentType: 'audio/mpeg' });

    expect(await run('tts', '--text', 'Hello', '--voice-prompt-id', 'voice-1', '--tempo', '1.5', '--out', out)).toBe(
      EXIT_OK,
    );

    expect(client.tts).toHaveBeenCalledWith({
      text: 'Hello',
      format: 'mp3',
      voicePromptId: 'voice-1',
      tempo: 1.5,
    });
    expect(Array.from(fs.readFileSync(out))).toEqual([7, 8]);
    expect(stdout.text).toBe(`Wrote 2 bytes to ${out}\n`);
  });

  it('prints JSON replies from the REST endpoint', async () => {
    client.tts.mockResolvedValue({ kind: 'json', value: { url: 'https://cdn.test/a.mp3' } });

    expect(await run('tts', '--text', 'Hello', '--voice-prompt-id', 'voice-1', '-o', path.join(dir, 'a.mp3'))).toBe(
      EXIT_OK,
    );
    expect(stdout.text).toBe(`${JSON.stringify({ url: 'https://cdn.test/a.mp3' }, null, 2)}\n`);
  });

  it('uploads a voice from a file', async () => {
    client.addVoice.mockResolvedValue({ id: 'new-voice' });

    expect(
      await run('add-voice', '--file', 'sample.wav', '--name', 'Narrator', '--gender', 'female', '--locale', 'en-US'),
    ).toBe(EXIT_OK);

    expect(client.addVoice).toHaveBeenCalledWith({
      data: { path: 'sample.wav' },
      name: 'Narrator',
      gender: 'female',
      locale: 'en-US',
      publish: false,
      speakingStyle: 'Neutral',
      age: 0,
    });
    expect(stdout.text).toBe(`${JSON.stringify({ id: 'new-voice' }, null, 2)}\n`);
  });

  it('prints the classified gender', async () => {
    client.classifyGender.mockResolvedValue({ predicted_gender: 'female', confidence: 0.93 });

    expect(await run('classify-gender', '--file', 'sample.wav')).toBe(EXIT_OK);

    expect(client.classifyGender).toHaveBeenCalledWith({ path: 'sample.wav' }, { timeoutMs: 5000 });
    expect(stdout.text).toBe('female (confidence 0.93)\n');
  });

  describe('exit codes', () => {
    it('fails with usage errors without a command', async () => {
      expect(await run()).toBe(EXIT_USAGE);
      expect(createClient).not.toHaveBeenCalled();
    });

    it('fails with usage errors on unknown options', async () => {
      expect(await run('voices', '--bogus')).toBe(EXIT_USAGE);
    });

    it('maps invalid options to usage errors', async () => {
      client.tts.mockRejectedValue(new ValidationError('Invalid tts request: tempo: Tempo and duration are mutually exclusive'));

      expect(await run('tts', '--text', 'Hi', '--voice-prompt-id', 'v', '--out', path.join(dir, 'a.mp3'))).toBe(
        EXIT_USAGE,
      );
      expect(stderr.text).toBe('Invalid tts request: tempo: Tempo and duration are mutually exclusive\n');
    });

    it('maps configuration errors', async () => {
      createClient.mockImplementationOnce(() => {
        throw new ConfigError('No API key provided');
      });

      expect(await run('voices')).toBe(EXIT_CONFIG);
      expect(stderr.text).toBe('Configuration error: No API key provided\n');
    });

    it('maps HTTP errors and prints the body', async () => {
      client.listVoices.mockRejectedValue(new HttpError(500, 'Internal Server Error', { detail: 'boom' }));

      expect(await run('voices')).toBe(EXIT_HTTP_ERROR);
      expect(stderr.text).toBe('Request failed: HTTP 500 Internal Server Error\n{\n  "detail": "boom"\n}\n');
    });

    it('maps rejected credentials', async () => {
      client.listVoices.mockRejectedValue(new AuthError('Credentials rejected (HTTP 401)', 401));

      expect(await run('voices')).toBe(EXIT_HTTP_ERROR);
      expect(stderr.text).toBe('Authentication failed: Credentials rejected (HTTP 401)\n');
    });

    it('maps streaming failures after partial audio', async () => {
      client.synthesize.mockReturnValue(failingAudio(new UnrecoverableError('Server error [busy]: try later')));

      expect(await run('stream', '--text', 'Hi')).toBe(EXIT_STREAM_ERROR);
      expect(stdout.bytes).toEqual([1]);
      expect(stderr.text).toBe('Streaming failed (unrecoverable): Server error [busy]: try later\n');
    });

    it('maps anything else to the generic exit code', async () => {
      client.listVoices.mockRejectedValue(new Error('boom'));

      expect(await run('voices')).toBe(EXIT_UNKNOWN_ERROR);
      expect(stderr.text).toBe('Unexpected error: boom\n');
    });
  });
});
