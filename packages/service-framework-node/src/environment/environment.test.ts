import { Type } from '@sinclair/typebox';
import { describe, expect, it } from 'vitest';
import { createEnvContext, createEnvParser } from './environment.js';

describe('createEnvParser', () => {
  describe('parse', () => {
    it('should parse valid env configuration', () => {
      const schema = Type.Object({
        ROOT_DIR: Type.String(),
        MAX_DEPTH: Type.Number(),
      });

      const config = createEnvParser().parse(schema, {
        source: {
          ROOT_DIR: '/var',
          MAX_DEPTH: '12',
        },
      });

      expect(config).toEqual({
        ROOT_DIR: '/var',
        MAX_DEPTH: 12,
      });
    });

    it('should apply default values', () => {
      const schema = Type.Object({
        ROOT_DIR: Type.String({ default: '/' }),
        SIZE_THRESHOLD: Type.String({ default: '100MB' }),
      });

      const config = createEnvParser().parse(schema, { source: {} });

      expect(config.ROOT_DIR).toBe('/');
      expect(config.SIZE_THRESHOLD).toBe('100MB');
    });

    it('should treat empty strings as unset', () => {
      const schema = Type.Object({
        SIZE_THRESHOLD: Type.String({ default: '100MB' }),
      });

      const config = createEnvParser().parse(schema, { source: { SIZE_THRESHOLD: '' } });

      expect(config.SIZE_THRESHOLD).toBe('100MB');
    });

    it('should coerce strings to integers and booleans', () => {
      const schema = Type.Object({
        MAX_DEPTH: Type.Integer(),
        VERBOSE: Type.Boolean(),
        QUIET: Type.Boolean(),
      });

      const config = createEnvParser().parse(schema, {
        source: {
          MAX_DEPTH: '100',
          VERBOSE: 'yes',
          QUIET: 'off',
        },
      });

      expect(config.MAX_DEPTH).toBe(100);
      expect(config.VERBOSE).toBe(true);
      expect(config.QUIET).toBe(false);
    });

    it('should handle optional values', () => {
      const schema = Type.Object({
        REQUIRED: Type.String(),
        OPTIONAL: Type.Optional(Type.String()),
      });

      const config = createEnvParser().parse(schema, {
        source: {
          REQUIRED: 'value',
        },
      });

      expect(config.REQUIRED).toBe('value');
      expect(config.OPTIONAL).toBeUndefined();
    });

    it('should accept a literal union value', () => {
      const schema = Type.Object({
        SIZE_UNITS: Type.Union([Type.Literal('si'), Type.Literal('iec')], { default: 'si' }),
      });

      const config = createEnvParser().parse(schema, { source: { SIZE_UNITS: 'iec' } });

      expect(config.SIZE_UNITS).toBe('iec');
    });

    it('should throw error for missing required variable', () => {
      const schema = Type.Object({
        REQUIRED_VAR: Type.String(),
      });

      expect(() => {
        createEnvParser().parse(schema, { source: {} });
      }).toThrow('Configuration validation failed');
    });

    it('should list each failing variable with the received value', () => {
      const schema = Type.Object({
        MAX_DEPTH: Type.Integer(),
      });

      expect(() => {
        createEnvParser().parse(schema, { source: { MAX_DEPTH: 'deep' } });
      }).toThrow('  - MAX_DEPTH: Expected integer, received "deep"');
    });

    it('should reject invalid literal union value', () => {
      const schema = Type.Object({
        SIZE_UNITS: Type.Union([Type.Literal('si'), Type.Literal('iec')]),
      });

      expect(() => {
        createEnvParser().parse(schema, { source: { SIZE_UNITS: 'metric' } });
      }).toThrow('Configuration validation failed');
    });

    it('should redact sensitive values in error messages', () => {
      const schema = Type.Object({
        API_TOKEN: Type.String({ minLength: 20 }),
      });

      expect(() => {
        createEnvParser().parse(schema, { source: { API_TOKEN: 'test-secret' } });
      }).toThrow('  - API_TOKEN: Expected string length greater or equal to 20, received "[REDACTED]"');
    });

    it('should parse JSON strings for object types', () => {
      const schema = Type.Object({
        CONFIG: Type.Object({
          key: Type.String(),
        }),
      });

      const config = createEnvParser().parse(schema, {
        source: {
          CONFIG: '{"key":"value"}',
        },
      });

      expect(config.CONFIG).toEqual({ key: 'value' });
    });

    it('should handle string patterns', () => {
      const schema = Type.Object({
        ROOT_DIR: Type.String({ pattern: '^/' }),
      });

      expect(() => {
        createEnvParser().parse(schema, { source: { ROOT_DIR: 'relative/path' } });
      }).toThrow('Configuration validation failed');
    });

    it('should report every failing variable', () => {
      const schema = Type.Object({
        MAX_DEPTH: Type.Number(),
        ROOT_DIR: Type.String(),
      });
      const parse = () => createEnvParser().parse(schema, { source: { MAX_DEPTH: 'invalid' } });

      expect(parse).toThrow(/\n {2}- MAX_DEPTH: /);
      expect(parse).toThrow(/\n {2}- ROOT_DIR: /);
    });
  });
});

describe('createEnvContext', () => {
  it('should create env context with parsed config', () => {
    const schema = Type.Object({
      PROCESS_NAME: Type.String({ minLength: 1 }),
      NODE_ENV: Type.Union([Type.Literal('development'), Type.Literal('production')]),
      MAX_DEPTH: Type.Number(),
    });

    const context = createEnvContext(schema, {
      source: {
        PROCESS_NAME: 'test-service',
        NODE_ENV: 'production',
        MAX_DEPTH: '3000',
      },
    });

    expect(context.config.PROCESS_NAME).toBe('test-service');
    expect(context.config.MAX_DEPTH).toBe(3000);
    expect(context.nodeEnv).toBe('production');
  });

  it('should default env to development', () => {
    const schema = Type.Object({
      PROCESS_NAME: Type.String({ minLength: 1 }),
    });

    const context = createEnvContext(schema, {
      source: {
        PROCESS_NAME: 'test-service',
      },
    });

    expect(context.nodeEnv).toBe('development');
  });
});
