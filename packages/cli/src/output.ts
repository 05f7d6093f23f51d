import fs from 'node:fs/promises';

export const STDOUT_TARGET = '-';

export type OutputStream = {
  write(chunk: string | Uint8Array, callback?: (err?: Error | null) => void): boolean;
};

export interface AudioSink {
  write(chunk: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

function stdoutSink(stdout: OutputStream): AudioSink {
  return {
    write: (chunk) =>
      new Promise<void>((resolve, reject) => {
        stdout.write(chunk, (err?: Error | null) => (err ? reject(err) : resolve()));
      }),
    close: async () => {},
  };
}

/**
 * Opens a file for audio output, or stdout for `-`. The file is truncated.
 */
export async function openAudioSink(
  target: string,
  stdout: OutputStream = process.stdout,
): Promise<AudioSink> {
  if (target === STDOUT_TARGET) {
    return stdoutSink(stdout);
  }
  const handle = await fs.open(target, 'w');
  return {
    write: async (chunk) => {
      await handle.write(chunk);
    },
    close: () => handle.close(),
  };
}

/**
 * Copies chunks into the sink as they arrive and returns the byte count.
 */
export async function pipeAudio(
  chunks: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
  sink: AudioSink,
): Promise<number> {
  let total = 0;
  try {
    for await (const chunk of chunks) {
      await sink.write(chunk);
      total += chunk.byteLength;
    }
  } finally {
    await sink.close();
  }
  return total;
}
