/**
 * Tests for environment-driven settings.
 *
 * Port: N/A (unit tests, no server)
 */

import { describe, it, expect } from 'vitest';
import { INSTALL_DIR_NAME, loadSettings, resolveBaseInstallDir } from '../../src/config/settings.js';
import { createPathUtils } from '../../src/utils/path-utils.js';
import { MemoryFilesystem } from '../mocks/index.js';

const posix = createPathUtils({ platform: 'posix', fs: new MemoryFilesystem() });
const win32 = createPathUtils({ platform: 'win32', fs: new MemoryFilesystem() });

describe('resolveBaseInstallDir', () => {
  it('should fall back to ~/.cache', () => {
    expect(resolveBaseInstallDir({}, { home: '/home/dev', paths: posix })).toBe('/home/dev/.cache/rootbound');
  });

  it('should place installs under INSTALL_DIR_NAME', () => {
    expect(resolveBaseInstallDir({ XDG_CACHE_HOME: '/xdg' }, { paths: posix })).toBe(`/xdg/${INSTALL_DIR_NAME}`);
  });

  it('should honor XDG_CACHE_HOME', () => {
    expect(resolveBaseInstallDir({ XDG_CACHE_HOME: '/xdg' }, { home: '/home/dev', paths: posix })).toBe(
      '/xdg/rootbound',
    );
  });

  it('should ignore an empty XDG_CACHE_HOME', () => {
    expect(resolveBaseInstallDir({ XDG_CACHE_HOME: '  ' }, { home: '/home/dev', paths: posix })).toBe(
      '/home/dev/.cache/rootbound',
    );
  });

  it('should use the explicit override as is', () => {
    expect(
      resolveBaseInstallDir({ ROOTBOUND_INSTALL_DIR: '/opt/rb', XDG_CACHE_HOME: '/xdg' }, { paths: posix }),
    ).toBe('/opt/rb');
  });

  it('should use LOCALAPPDATA on Windows only', () => {
    const env = { LOCALAPPDATA: 'C:\\Users\\dev\\AppData\\Local' };

    expect(resolveBaseInstallDir(env, { home: 'C:\\Users\\dev', paths: win32 })).toBe(
      'C:\\Users\\dev\\AppData\\Local\\rootbound',
    );
    expect(resolveBaseInstallDir(env, { home: '/home/dev', paths: posix })).toBe('/home/dev/.cache/rootbound');
  });
});

describe('loadSettings', () => {
  it('should default debug to false', () => {
    expect(loadSettings({}, { home: '/home/dev', paths: posix })).toEqual({
      debug: false,
      baseInstallDir: '/home/dev/.cache/rootbound',
    });
  });

  it.each([
    ['1', true],
    ['TRUE', true],
    ['yes', true],
    ['0', false],
    ['off', false],
  ])('should parse ROOTBOUND_DEBUG=%s', (value, expected) => {
    expect(loadSettings({ ROOTBOUND_DEBUG: value }, { home: '/home/dev', paths: posix }).debug).toBe(expected);
  });

  it('should return a frozen value', () => {
    expect(Object.isFrozen(loadSettings({}, { home: '/home/dev', paths: posix }))).toBe(true);
  });
});
