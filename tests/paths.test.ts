import { describe, it, expect } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { configFilePath, defaultDatabasePath, resolveDataDir } from '../src/main/paths';

describe('resolveDataDir', () => {
  it('prefers CLIPTRAIL_HOME', () => {
    expect(resolveDataDir({ CLIPTRAIL_HOME: '/srv/cliptrail' }, 'win32')).toBe('/srv/cliptrail');
  });

  it('uses APPDATA on Windows', () => {
    expect(resolveDataDir({ APPDATA: 'C:\\Users\\test\\AppData\\Roaming' }, 'win32')).toBe(
      path.join('C:\\Users\\test\\AppData\\Roaming', 'ClipTrail'),
    );
  });

  it('falls back to the roaming profile when APPDATA is missing', () => {
    expect(resolveDataDir({}, 'win32')).toBe(path.join(os.homedir(), 'AppData', 'Roaming', 'ClipTrail'));
  });

  it('uses a dot directory elsewhere', () => {
    expect(resolveDataDir({}, 'linux')).toBe(path.join(os.homedir(), '.cliptrail'));
  });
});

describe('data file names', () => {
  it('places config and database inside the data directory', () => {
    expect(configFilePath('/data')).toBe(path.join('/data', 'cliptrail-config.json'));
    expect(defaultDatabasePath('/data')).toBe(path.join('/data', 'cliptrail.db'));
  });
});
