export { SettingsPatcher, SKIP_MESSAGE } from './settings-patcher.js';
export type { SettingsPatcherOptions, PatchResult } from './settings-patcher.js';
