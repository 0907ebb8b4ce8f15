/**
 * Environment loader Unit Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { findProjectRoot, getEnv, getEnvFlag, loadEnv } from '../env-loader';

describe('env-loader', () => {
  describe('getEnv', () => {
    it('should trim values and strip carriage returns', () => {
      expect(getEnv('TOKEN', '', { TOKEN: '  test-token\r\n' })).toBe('test-token');
    });

    it('should return the default for unset or empty values', () => {
      expect(getEnv('MISSING', 'fallback', {})).toBe('fallback');
      expect(getEnv('EMPTY', 'fallback', { EMPTY: '' })).toBe('fallback');
    });
  });

  describe('getEnvFlag', () => {
    it.each([
      ['1', true],
      ['true', true],
      ['TRUE', true],
      ['0', false],
      ['no', false],
    ])('should read %p as %p', (value, expected) => {
      expect(getEnvFlag('FLAG', false, { FLAG: value })).toBe(expected);
    });

    it('should use the default when unset', () => {
      expect(getEnvFlag('FLAG', true, {})).toBe(true);
      expect(getEnvFlag('FLAG', false, {})).toBe(false);
    });
  });

  describe('files', () => {
    let tempRoot: string;

    beforeEach(() => {
      tempRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'env-loader-'));
    });

    afterEach(() => {
      fs.rmSync(tempRoot, { recursive: true, force: true });
      delete process.env.ENV_LOADER_TEST_VALUE;
      delete process.env.ENV_LOADER_OVERRIDE;
    });

    it('should find the nearest directory holding a .env file', () => {
      const nested = path.join(tempRoot, 'packages', 'cancelbot');
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(tempRoot, '.env'), 'ENV_LOADER_TEST_VALUE=1\n');

      expect(findProjectRoot(nested)).toBe(path.resolve(tempRoot));
    });

    it('should stop at a workspace manifest', () => {
      const nested = path.join(tempRoot, 'src');
      fs.mkdirSync(nested);
      fs.writeFileSync(path.join(tempRoot, 'package.json'), JSON.stringify({ workspaces: ['packages/*'] }));

      expect(findProjectRoot(nested)).toBe(path.resolve(tempRoot));
    });

    it('should load variables and apply overrides', () => {
      const envPath = path.join(tempRoot, '.env');
      fs.writeFileSync(envPath, 'ENV_LOADER_TEST_VALUE=from-file\n');

      const loaded = loadEnv({ envPath, overrides: { ENV_LOADER_OVERRIDE: 'forced' } });

      expect(loaded).toBe(envPath);
      expect(process.env.ENV_LOADER_TEST_VALUE).toBe('from-file');
      expect(process.env.ENV_LOADER_OVERRIDE).toBe('forced');
    });

    it('should return null for a missing optional file', () => {
      expect(loadEnv({ envPath: path.join(tempRoot, 'absent.env') })).toBeNull();
    });

    it('should throw for a missing required file', () => {
      const envPath = path.join(tempRoot, 'absent.env');
      expect(() => loadEnv({ envPath, required: true })).toThrow(`Required .env file not found at: ${envPath}`);
    });
  });
});
