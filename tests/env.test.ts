import { describe, it, expect, beforeAll } from 'vitest';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import {
  DEFAULT_CATALOG_PATH,
  DEFAULT_PORT,
  loadServerConfig,
} from '../src/server/utils/env.config';

const PATHS = {
  envExample: join(process.cwd(), '.env.example'),
  gitignore: join(process.cwd(), '.gitignore'),
} as const;

const REQUIRED_ENV_VARS = [
  'NODE_ENV',
  'PORT',
  'ROTOR_CATALOG_PATH',
  'ROTOR_TRACE',
] as const;

describe('Environment configuration', () => {
  let envExampleContent: string;
  let gitignoreContent: string;

  beforeAll(() => {
    if (existsSync(PATHS.envExample)) {
      envExampleContent = readFileSync(PATHS.envExample, 'utf-8');
    }
    if (existsSync(PATHS.gitignore)) {
      gitignoreContent = readFileSync(PATHS.gitignore, 'utf-8');
    }
  });

  describe('.env.example file', () => {
    it('should exist and be readable', () => {
      expect(existsSync(PATHS.envExample), '.env.example file not found').toBe(true);
      expect(envExampleContent.length, '.env.example is empty').toBeGreaterThan(0);
    });

    it('should contain all required environment variables', () => {
      const missing = REQUIRED_ENV_VARS.filter(varName => !envExampleContent.includes(varName));
      expect(missing, `Missing required variables: ${missing.join(', ')}`).toHaveLength(0);
    });

    it('should point at a catalog that exists', () => {
      const match = /^ROTOR_CATALOG_PATH=(.+)$/m.exec(envExampleContent);
      expect(match?.[1]).toBe(DEFAULT_CATALOG_PATH);
      expect(existsSync(join(process.cwd(), DEFAULT_CATALOG_PATH))).toBe(true);
    });
  });

  describe('.gitignore configuration', () => {
    it('should exclude .env files from version control', () => {
      expect(existsSync(PATHS.gitignore), '.gitignore file not found').toBe(true);
      expect(gitignoreContent, '.env not in .gitignore').toContain('.env');
      expect(gitignoreContent, '.env.local not in .gitignore').toContain('.env.local');
    });
  });

  describe('loadServerConfig', () => {
    it('should apply defaults to an empty environment', () => {
      expect(loadServerConfig({})).toEqual({
        port: DEFAULT_PORT,
        catalogPath: DEFAULT_CATALOG_PATH,
        traceEnabled: false,
        nodeEnv: 'development',
      });
    });

    it('should read every variable', () => {
      expect(
        loadServerConfig({
          PORT: ' 8080 ',
          ROTOR_CATALOG_PATH: 'config/default.conf',
          ROTOR_TRACE: 'true',
          NODE_ENV: 'production',
        })
      ).toEqual({
        port: 8080,
        catalogPath: 'config/default.conf',
        traceEnabled: true,
        nodeEnv: 'production',
      });
    });

    it('should only enable tracing for the exact value true', () => {
      expect(loadServerConfig({ ROTOR_TRACE: '1' }).traceEnabled).toBe(false);
      expect(loadServerConfig({ ROTOR_TRACE: 'TRUE' }).traceEnabled).toBe(false);
    });

    it('should fall back to the default catalog for a blank path', () => {
      expect(loadServerConfig({ ROTOR_CATALOG_PATH: '   ' }).catalogPath).toBe(
        DEFAULT_CATALOG_PATH
      );
    });

    it('should reject non-integer ports', () => {
      expect(() => loadServerConfig({ PORT: 'http' })).toThrow(
        "PORT must be an integer, got 'http'"
      );
      expect(() => loadServerConfig({ PORT: '80.5' })).toThrow(
        "PORT must be an integer, got '80.5'"
      );
    });

    it('should reject ports outside 1-65535', () => {
      expect(() => loadServerConfig({ PORT: '0' })).toThrow(
        'PORT must be between 1 and 65535, got 0'
      );
      expect(() => loadServerConfig({ PORT: '70000' })).toThrow(
        'PORT must be between 1 and 65535, got 70000'
      );
    });
  });
});
