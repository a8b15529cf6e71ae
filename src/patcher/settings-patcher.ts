import { parseDeployEnv, isSecureEnvAvailable } from '../schemas/index.js';
import { readServerCredentials, OSSRH_SERVER_ID } from '../security/index.js';
import { SettingsDocument, resolveMavenPaths } from '../settings/index.js';

export const SKIP_MESSAGE = 'no secure env vars available, skipping deployment';

export interface SettingsPatcherOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  settingsPath?: string;
  outputPath?: string;
  serverId?: string;
}

export type PatchResult =
  | { status: 'skipped' }
  | { status: 'written'; outputPath: string; serverId: string };

export class SettingsPatcher {
  private env: NodeJS.ProcessEnv;
  private settingsPath: string;
  private outputPath: string;
  private serverId: string;

  constructor(options: SettingsPatcherOptions = {}) {
    const defaults = resolveMavenPaths(options.homeDir);
    this.env = options.env ?? process.env;
    this.settingsPath = options.settingsPath ?? defaults.settingsPath;
    this.outputPath = options.outputPath ?? defaults.outputPath;
    this.serverId = options.serverId ?? OSSRH_SERVER_ID;
  }

  run(): PatchResult {
    const env = parseDeployEnv(this.env);
    if (!isSecureEnvAvailable(env)) {
      console.log(SKIP_MESSAGE);
      return { status: 'skipped' };
    }

    const document = SettingsDocument.load(this.settingsPath);
    const credential = readServerCredentials(env, this.serverId);
    document.appendServer(credential);

    // The source file is left untouched; CI points Maven at the copy
    document.save(this.outputPath);

    const total = document.listServers().length;
    console.log(`  [SettingsPatcher] Added server '${credential.id}' (${total} in <servers>)`);
    console.log(`  [SettingsPatcher] Saved: ${this.outputPath}`);

    return { status: 'written', outputPath: this.outputPath, serverId: credential.id };
  }
}
