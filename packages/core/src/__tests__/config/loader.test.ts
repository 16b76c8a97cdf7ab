/**
 * Config Loader Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import {
  findUpward,
  findConfigFile,
  loadConfigFile,
  loadConfig,
  getConfigDir,
} from '../../config/loader.js';

// Mock node:fs
vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
}));

// Mock the resolver module
vi.mock('../../config/resolver.js', () => ({
  resolveConfig: vi.fn((config) => ({ ...config, resolved: true })),
  validateConfig: vi.fn(),
}));

// =============================================================================
// findConfigFile Tests
// =============================================================================

describe('findConfigFile', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should find spanstore.config.ts in current directory', () => {
    vi.mocked(existsSync).mockImplementation((path) => String(path).endsWith('spanstore.config.ts'));

    expect(findConfigFile('/project')).toBe('/project/spanstore.config.ts');
  });

  it('should find spanstore.config.js when ts not present', () => {
    vi.mocked(existsSync).mockImplementation((path) => String(path).endsWith('spanstore.config.js'));

    expect(findConfigFile('/project')).toBe('/project/spanstore.config.js');
  });

  it('should find spanstore.config.mjs', () => {
    vi.mocked(existsSync).mockImplementation((path) => String(path).endsWith('spanstore.config.mjs'));

    expect(findConfigFile('/project')).toBe('/project/spanstore.config.mjs');
  });

  it('should search parent directories', () => {
    vi.mocked(existsSync).mockImplementation((path) => path === '/project/spanstore.config.ts');

    expect(findConfigFile('/project/src/test')).toBe('/project/spanstore.config.ts');
  });

  it('should return null when config not found', () => {
    vi.mocked(existsSync).mockReturnValue(false);

    expect(findConfigFile('/project')).toBeNull();
  });

  it('should use process.cwd() when no startDir provided', () => {
    const cwd = process.cwd();
    vi.mocked(existsSync).mockImplementation((path) => path === join(cwd, 'spanstore.config.ts'));

    expect(findConfigFile()).toBe(join(cwd, 'spanstore.config.ts'));
  });

  it('should check .ts before .js', () => {
    const checkedPaths: string[] = [];
    vi.mocked(existsSync).mockImplementation((path) => {
      checkedPaths.push(String(path));
      return String(path).endsWith('spanstore.config.js');
    });

    findConfigFile('/project');

    expect(checkedPaths).toEqual(['/project/spanstore.config.ts', '/project/spanstore.config.js']);
  });
});

// =============================================================================
// loadConfigFile Tests
// =============================================================================

describe('loadConfigFile', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should throw when file does not exist', async () => {
    vi.mocked(existsSync).mockReturnValue(false);

    await expect(loadConfigFile('/not/exists.ts')).rejects.toThrow(
      'Config file not found: /not/exists.ts'
    );
  });

  it('should wrap import failures with the file path', async () => {
    vi.mocked(existsSync).mockReturnValue(true);

    await expect(loadConfigFile('/not/real/spanstore.config.ts')).rejects.toThrow(
      'Failed to load config file /not/real/spanstore.config.ts:'
    );
  });
});

// =============================================================================
// loadConfig Tests
// =============================================================================

describe('loadConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should throw when no config file found', async () => {
    vi.mocked(existsSync).mockReturnValue(false);

    await expect(loadConfig()).rejects.toThrow(
      'No spanstore.config.ts found. Create one in your project root or specify --config path.'
    );
  });

  it('should report a missing explicit path', async () => {
    vi.mocked(existsSync).mockReturnValue(false);

    await expect(loadConfig('/elsewhere/spanstore.config.ts')).rejects.toThrow(
      'Config file not found: /elsewhere/spanstore.config.ts'
    );
  });
});

// =============================================================================
// findUpward / getConfigDir Tests
// =============================================================================

describe('findUpward', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should prefer the nearest directory over name order', () => {
    vi.mocked(existsSync).mockImplementation(
      (path) => path === '/project/app/.env.local' || path === '/project/.env'
    );

    expect(findUpward(['.env', '.env.local'], '/project/app')).toBe('/project/app/.env.local');
  });

  it('should stop at the filesystem root', () => {
    const checkedPaths: string[] = [];
    vi.mocked(existsSync).mockImplementation((path) => {
      checkedPaths.push(String(path));
      return false;
    });

    expect(findUpward(['.env'], '/a/b')).toBeNull();
    expect(checkedPaths).toEqual(['/a/b/.env', '/a/.env', '/.env']);
  });
});

describe('getConfigDir', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should return directory containing config', () => {
    vi.mocked(existsSync).mockImplementation((path) => path === '/project/spanstore.config.ts');

    expect(getConfigDir('/project/src/deep/nested')).toBe('/project');
  });

  it('should return null when no config found', () => {
    vi.mocked(existsSync).mockReturnValue(false);

    expect(getConfigDir('/project')).toBeNull();
  });
});
