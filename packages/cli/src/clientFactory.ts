import { DeepdubClient, loadClientConfig, type ClientConfigOverrides } from '@deepdub/client';
import type { Logger } from '@deepdub/shared';

export type CliClient = Pick<
  DeepdubClient,
  'listVoices' | 'addVoice' | 'tts' | 'synthesize' | 'classifyGender'
>;

export function createClient(options: {
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  overrides?: ClientConfigOverrides;
}): CliClient {
  const config = loadClientConfig({
    ...(options.env ? { env: options.env } : {}),
    ...(options.cwd ? { cwd: options.cwd } : {}),
    ...(options.overrides ? { overrides: options.overrides } : {}),
  });
  return new DeepdubClient({ config, logger: options.logger });
}
