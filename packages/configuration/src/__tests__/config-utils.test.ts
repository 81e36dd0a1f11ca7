import { describe, it, expect } from 'vitest';

import { ConfigUtils, TIME, z } from '../index.js';

describe('ConfigUtils', () => {
  describe('parseDuration', () => {
    it('should pass numbers through as milliseconds', () => {
      expect(ConfigUtils.parseDuration(1500)).toBe(1500);
      expect(ConfigUtils.parseDuration('250')).toBe(250);
    });

    it('should parse single units', () => {
      expect(ConfigUtils.parseDuration('500ms')).toBe(500);
      expect(ConfigUtils.parseDuration('30s')).toBe(30 * TIME.SECOND);
      expect(ConfigUtils.parseDuration('5m')).toBe(5 * TIME.MINUTE);
      expect(ConfigUtils.parseDuration('2h')).toBe(2 * TIME.HOUR);
    });

    it('should parse fractional and compound durations', () => {
      expect(ConfigUtils.parseDuration('1.5s')).toBe(1500);
      expect(ConfigUtils.parseDuration('1m30s')).toBe(90_000);
      expect(ConfigUtils.parseDuration('1h 15m')).toBe(75 * TIME.MINUTE);
    });

    it('should accept zero durations', () => {
      expect(ConfigUtils.parseDuration('0s')).toBe(0);
    });

    it('should reject malformed durations', () => {
      expect(() => ConfigUtils.parseDuration('soon')).toThrow('Invalid duration format: soon');
      expect(() => ConfigUtils.parseDuration('10 parsecs')).toThrow('Invalid duration format');
    });
  });

  describe('substituteEnvVars', () => {
    const env = { API_HOST: 'api.example.test' };

    it('should substitute variables', () => {
      expect(ConfigUtils.substituteEnvVars('https://${API_HOST}/graphql', env)).toBe(
        'https://api.example.test/graphql'
      );
    });

    it('should fall back to defaults', () => {
      expect(ConfigUtils.substituteEnvVars('${RETRY_DELAY:-2s}', env)).toBe('2s');
    });

    it('should fail on missing required variables', () => {
      expect(() => ConfigUtils.substituteEnvVars('${MISSING}', env)).toThrow(
        'Required environment variable not set: MISSING'
      );
    });
  });

  describe('processEnvVars', () => {
    it('should walk nested documents', () => {
      const result = ConfigUtils.processEnvVars(
        { retry: { delay: '${DELAY}', kinds: ['${KIND}'] }, attempts: 3 },
        { DELAY: '1s', KIND: 'timeout' }
      );

      expect(result).toEqual({ retry: { delay: '1s', kinds: ['timeout'] }, attempts: 3 });
    });
  });

  describe('mergeConfigs', () => {
    it('should deep merge objects and replace arrays', () => {
      const merged = ConfigUtils.mergeConfigs(
        { logging: { level: 'WARN', format: 'text' }, kinds: ['timeout'] },
        { logging: { level: 'DEBUG' }, kinds: ['server_error'], extra: undefined }
      );

      expect(merged).toEqual({
        logging: { level: 'DEBUG', format: 'text' },
        kinds: ['server_error'],
      });
    });
  });

  describe('durationTransformer', () => {
    it('should transform duration strings inside schemas', () => {
      const schema = z.object({ timeout: ConfigUtils.durationTransformer() });

      expect(schema.parse({ timeout: '1m' })).toEqual({ timeout: 60_000 });
    });

    it('should report invalid durations as validation issues', () => {
      const schema = z.object({ timeout: ConfigUtils.durationTransformer() });
      const result = schema.safeParse({ timeout: 'later' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.path).toEqual(['timeout']);
      }
    });
  });
});
