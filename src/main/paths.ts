import * as os from 'os';
import * as path from 'path';

/**
 * Per-user data directory: `CLIPTRAIL_HOME` when set, `%APPDATA%\ClipTrail`
 * on Windows, `~/.cliptrail` elsewhere.
 */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  if (env.CLIPTRAIL_HOME) return env.CLIPTRAIL_HOME;

  if (platform === 'win32') {
    const appData = env.APPDATA ?? path.join(os.homedir(), 'AppData', 'Roaming');
    return path.join(appData, 'ClipTrail');
  }

  return path.join(os.homedir(), '.cliptrail');
}

export function configFilePath(dataDir: string): string {
  return path.join(dataDir, 'cliptrail-config.json');
}

export function defaultDatabasePath(dataDir: string): string {
  return path.join(dataDir, 'cliptrail.db');
}
