export { SettingsDocument } from './settings-document.js';
export { resolveMavenPaths } from './maven-paths.js';
export type { MavenPaths } from './maven-paths.js';
