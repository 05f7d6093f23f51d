import yargs from 'yargs';

import {
  AuthError,
  ConfigError,
  HttpError,
  ValidationError,
  consoleLogger,
  isDeepdubError,
  type Logger,
  type RestFormat,
  type StreamingFormat,
} from '@deepdub/shared';

import { createClient, type CliClient } from './clientFactory';
import { STDOUT_TARGET, openAudioSink, pipeAudio, type OutputStream } from './output';

export const EXIT_OK = 0;
export const EXIT_UNKNOWN_ERROR = 1;
export const EXIT_USAGE = 2;
export const EXIT_CONFIG = 3;
export const EXIT_HTTP_ERROR = 4;
export const EXIT_STREAM_ERROR = 5;

const REST_FORMATS: readonly RestFormat[] = ['headerless-wav', 'mp3', 'opus', 'mulaw'];
const STREAMING_FORMATS: readonly StreamingFormat[] = ['headerless-wav', 'wav', 'mp3', 'opus', 'mulaw'];
const GENDERS = ['male', 'female'] as const;

export class CliExitError extends Error {
  readonly exitCode: number;

  constructor(exitCode: number, message: string) {
    super(message);
    this.name = 'CliExitError';
    this.exitCode = exitCode;
  }
}

export interface RunCliOptions {
  argv: string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  stdout?: OutputStream;
  stderr?: OutputStream;
}

function print(stream: OutputStream, value: unknown, json: boolean): void {
  if (json) {
    stream.write(`${JSON.stringify(value, null, 2)}\n`);
    return;
  }
  stream.write(`${String(value)}\n`);
}

function field(record: Record<string, unknown>, ...keys: string[]): string {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' || typeof value === 'number') {
      return String(value);
    }
  }
  return '';
}

function optional<Key extends string, Value>(
  key: Key,
  value: Value | undefined,
): { [K in Key]?: Value } {
  if (value === undefined) {
    return {};
  }
  const result: { [K in Key]?: Value } = {};
  result[key] = value;
  return result;
}

/**
 * Maps a failure to the process exit code and writes its message to stderr.
 */
export function handleCliError(error: unknown, stderr: OutputStream): number {
  if (error instanceof CliExitError) {
    stderr.write(`${error.message}\n`);
    return error.exitCode;
  }
  if (error instanceof ConfigError) {
    stderr.write(`Configuration error: ${error.message}\n`);
    return EXIT_CONFIG;
  }
  if (error instanceof ValidationError) {
    stderr.write(`${error.message}\n`);
    return EXIT_USAGE;
  }
  if (error instanceof HttpError) {
    const bodyText =
      error.body !== undefined && error.body !== '' ? `\n${JSON.stringify(error.body, null, 2)}` : '';
    stderr.write(`Request failed: ${error.message}${bodyText}\n`);
    return EXIT_HTTP_ERROR;
  }
  if (error instanceof AuthError) {
    stderr.write(`Authentication failed: ${error.message}\n`);
    return EXIT_HTTP_ERROR;
  }
  if (isDeepdubError(error)) {
    stderr.write(`Streaming failed (${error.code}): ${error.message}\n`);
    return EXIT_STREAM_ERROR;
  }
  const message = error instanceof Error ? error.message : String(error);
  stderr.write(`Unexpected error: ${message}\n`);
  return EXIT_UNKNOWN_ERROR;
}

export async function runCli(options: RunCliOptions): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  let client: CliClient | null = null;
  let logger: Logger | null = null;

  const getLogger = (verbose: boolean): Logger => {
    logger ??= consoleLogger('deepdub', { verbose, stderr: true });
    return logger;
  };

  const getClient = (argv: {
    verbose: boolean;
    apiKey: string | undefined;
    eu: boolean | undefined;
  }): CliClient => {
    client ??= createClient({
      logger: getLogger(argv.verbose),
      ...(options.env ? { env: options.env } : {}),
      ...(options.cwd ? { cwd: options.cwd } : {}),
      overrides: {
        ...optional('apiKey', argv.apiKey),
        ...optional('eu', argv.eu),
      },
    });
    return client;
  };

  const report = (out: string, bytes: number, json: boolean): void => {
    // Audio owns stdout when streaming to it.
    const target = out === STDOUT_TARGET ? stderr : stdout;
    if (json) {
      print(target, { out, bytes }, true);
      return;
    }
    target.write(`Wrote ${bytes} bytes to ${out === STDOUT_TARGET ? 'stdout' : out}\n`);
  };

  try {
    const parser = yargs(options.argv)
      .scriptName('deepdub')
      .usage('Usage: $0 <command> [options]')
      .option('json', {
        type: 'boolean',
        default: false,
        describe: 'Output JSON',
      })
      .option('verbose', {
        alias: 'v',
        type: 'boolean',
        default: false,
        describe: 'Log debug output to stderr',
      })
      .option('api-key', {
        type: 'string',
        describe: 'API key (defaults to DEEPDUB_API_KEY)',
      })
      .option('eu', {
        type: 'boolean',
        describe: 'Use the EU endpoints',
      })
      .exitProcess(false)
      .fail((msg: string | undefined, err: Error | undefined) => {
        if (err) {
          throw err;
        }
        throw new CliExitError(EXIT_USAGE, msg ?? 'Invalid command usage. Run with --help for usage.');
      })
      .command(
        'voices',
        'List voices',
        (args) => args,
        async (argv) => {
          const voices = await getClient(argv).listVoices();
          if (argv.json) {
            print(stdout, voices, true);
            return;
          }
          for (const voice of voices) {
            stdout.write(
              `${field(voice, 'id', 'voicePromptId', 'voice_prompt_id')}\t${field(voice, 'name', 'title')}\t${field(voice, 'locale')}\n`,
            );
          }
        },
      )
      .command(
        'add-voice',
        'Upload a voice sample',
        (args) =>
          args
            .option('file', { type: 'string', demandOption: true, describe: 'Audio file' })
            .option('name', { type: 'string', demandOption: true })
            .option('gender', { type: 'string', choices: GENDERS, demandOption: true })
            .option('locale', { type: 'string', demandOption: true })
            .option('publish', { type: 'boolean', default: false })
            .option('speaking-style', { type: 'string', default: 'Neutral' })
            .option('age', { type: 'number', default: 0 }),
        async (argv) => {
          const result = await getClient(argv).addVoice({
            data: { path: argv.file },
            name: argv.name,
            gender: argv.gender,
            locale: argv.locale,
            publish: argv.publish,
            speakingStyle: argv.speakingStyle,
            age: argv.age,
          });
          print(stdout, result, true);
        },
      )
      .command(
        'tts',
        'Synthesize text over REST into a file',
        (args) =>
          args
            .option('text', { type: 'string', demandOption: true })
            .option('voice-prompt-id', { type: 'string' })
            .option('voice-reference', { type: 'string', describe: 'Reference audio file' })
            .option('model', { type: 'string' })
            .option('locale', { type: 'string' })
            .option('format', { type: 'string', choices: REST_FORMATS, default: 'mp3' as const })
            .option('sample-rate', { type: 'number' })
            .option('tempo', { type: 'number' })
            .option('duration', { type: 'number' })
            .option('seed', { type: 'number' })
            .option('temperature', { type: 'number' })
            .option('variance', { type: 'number' })
            .option('out', { alias: 'o', type: 'string', demandOption: true }),
        async (argv) => {
          const result = await getClient(argv).tts({
            text: argv.text,
            format: argv.format,
            ...optional('voicePromptId', argv.voicePromptId),
            ...optional(
              'voiceReference',
              argv.voiceReference !== undefined ? { path: argv.voiceReference } : undefined,
            ),
            ...optional('model', argv.model),
            ...optional('locale', argv.locale),
            ...optional('sampleRate', argv.sampleRate),
            ...optional('tempo', argv.tempo),
            ...optional('duration', argv.duration),
            ...optional('seed', argv.seed),
            ...optional('temperature', argv.temperature),
            ...optional('variance', argv.variance),
          });
          if (result.kind === 'json') {
            print(stdout, result.value, true);
            return;
          }
          const bytes = await pipeAudio([result.bytes], await openAudioSink(argv.out, stdout));
          report(argv.out, bytes, argv.json);
        },
      )
      .command(
        'stream',
        'Synthesize text over a streaming session, writing audio as it arrives',
        (args) =>
          args
            .option('text', { type: 'string', demandOption: true })
            .option('voice-prompt-id', { type: 'string' })
            .option('model', { type: 'string' })
            .option('locale', { type: 'string' })
            .option('format', { type: 'string', choices: STREAMING_FORMATS, default: 'wav' as const })
            .option('sample-rate', { type: 'number' })
            .option('tempo', { type: 'number' })
            .option('duration', { type: 'number' })
            .option('seed', { type: 'number' })
            .option('temperature', { type: 'number' })
            .option('variance', { type: 'number' })
            .option('target-gender', { type: 'string' })
            .option('out', { alias: 'o', type: 'string', default: STDOUT_TARGET }),
        async (argv) => {
          const chunks = getClient(argv).synthesize({
            text: argv.text,
            format: argv.format,
            ...optional('voicePromptId', argv.voicePromptId),
            ...optional('model', argv.model),
            ...optional('locale', argv.locale),
            ...optional('sampleRate', argv.sampleRate),
            ...optional('tempo', argv.tempo),
            ...optional('duration', argv.duration),
            ...optional('seed', argv.seed),
            ...optional('temperature', argv.temperature),
            ...optional('variance', argv.variance),
            ...optional('targetGender', argv.targetGender),
          });
          const bytes = await pipeAudio(chunks, await openAudioSink(argv.out, stdout));
          report(argv.out, bytes, argv.json);
        },
      )
      .command(
        'classify-gender',
        'Classify the speaker gender of a WAV sample',
        (args) =>
          args
            .option('file', { type: 'string', demandOption: true })
            .option('timeout-ms', { type: 'number', default: 5000 }),
        async (argv) => {
          const result = await getClient(argv).classifyGender(
            { path: argv.file },
            { timeoutMs: argv.timeoutMs },
          );
          if (argv.json) {
            print(stdout, result, true);
            return;
          }
          stdout.write(`${result.predicted_gender} (confidence ${result.confidence})\n`);
        },
      )
      .demandCommand(1, 'You must specify a command')
      .strict()
      .help();

    await parser.parseAsync();
    return EXIT_OK;
  } catch (error: unknown) {
    return handleCliError(error, stderr);
  }
}
