import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, readFileSync, existsSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { runCli } from '../run-cli.js';

const secureEnv = {
  TRAVIS_SECURE_ENV_VARS: 'true',
  SONATYPE_USERNAME: 'u',
  SONATYPE_PASSWORD: 'p',
};

describe('runCli', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'settings-cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should exit 0 with a single line on the skip path', () => {
    const code = runCli([], { TRAVIS_SECURE_ENV_VARS: 'false' });

    expect(code).toBe(0);
    expect(console.log).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith('no secure env vars available, skipping deployment');
    expect(console.error).not.toHaveBeenCalled();
  });

  it('should write to the paths given as arguments', () => {
    const input = join(dir, 'in.xml');
    const output = join(dir, 'out.xml');
    writeFileSync(input, '<settings></settings>');

    const code = runCli([input, output], secureEnv);

    expect(code).toBe(0);
    expect(readFileSync(output, 'utf-8')).toBe(
      '<settings><servers><server><id>ossrh</id><username>u</username><password>p</password></server></servers></settings>'
    );
    expect(readFileSync(input, 'utf-8')).toBe('<settings></settings>');
  });

  it('should exit 1 and report a missing settings file', () => {
    const output = join(dir, 'out.xml');

    const code = runCli([join(dir, 'missing.xml'), output], secureEnv);

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith('[SettingsPatcher] Error:', expect.stringContaining('ENOENT'));
    expect(existsSync(output)).toBe(false);
  });

  it('should exit 1 and report a missing credential', () => {
    const input = join(dir, 'in.xml');
    writeFileSync(input, '<settings></settings>');

    const code = runCli([input, join(dir, 'out.xml')], { TRAVIS_SECURE_ENV_VARS: 'true' });

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      '[SettingsPatcher] Error:',
      'Missing environment variable: SONATYPE_USERNAME'
    );
  });
});
