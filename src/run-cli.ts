import { SettingsPatcher } from './patcher/index.js';

/**
 * Usage: mvn-settings-patcher [settingsPath] [outputPath]
 *
 * Returns the process exit code.
 */
export function runCli(args: string[], env: NodeJS.ProcessEnv = process.env): number {
  try {
    const patcher = new SettingsPatcher({
      env,
      settingsPath: args[0],
      outputPath: args[1],
    });
    patcher.run();
    return 0;
  } catch (error) {
    console.error('[SettingsPatcher] Error:', error instanceof Error ? error.message : error);
    return 1;
  }
}
