import { homedir } from 'os';
import { join } from 'path';

export interface MavenPaths {
  settingsPath: string;
  outputPath: string;
}

export function resolveMavenPaths(homeDir: string = homedir()): MavenPaths {
  const m2Dir = join(homeDir, '.m2');
  return {
    settingsPath: join(m2Dir, 'settings.xml'),
    outputPath: join(m2Dir, 'snapshot-settings.xml'),
  };
}
