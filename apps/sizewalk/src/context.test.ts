import { SF } from '@sizewalk/service-framework-node';
import { createMockProcessContext } from '@sizewalk/service-framework-node/test';
import { describe, it, expect, vi } from 'vitest';
import { createSizewalkContext } from './context.js';

function createCapturingWriter() {
  return {
    stdout: vi.fn<(line: string) => void>(),
    stderr: vi.fn<(line: string) => void>(),
  } satisfies SF.LogWriter;
}

describe('createSizewalkContext', () => {
  it('should apply environment defaults', () => {
    const context = createSizewalkContext(createMockProcessContext(), { env: {} });

    expect(context.envContext.config).toEqual({
      PROCESS_NAME: 'sizewalk',
      NODE_ENV: 'production',
      LOG_LEVEL: 'warn',
      LOG_FORMAT: 'cli',
      ROOT_DIR: '/',
      SIZE_THRESHOLD: '100MB',
      IGNORE_DIR_REGEXP: '',
      SIZE_UNITS: 'si',
    });
    expect(context.envContext.nodeEnv).toBe('production');
  });

  it('should read scan defaults from the environment', () => {
    const context = createSizewalkContext(createMockProcessContext(), {
      env: { ROOT_DIR: '/data', SIZE_THRESHOLD: '1GB', IGNORE_DIR_REGEXP: '^/data/tmp' },
    });

    expect(context.envContext.config).toMatchObject({
      ROOT_DIR: '/data',
      SIZE_THRESHOLD: '1GB',
      IGNORE_DIR_REGEXP: '^/data/tmp',
    });
  });

  it('should send every log line to stderr in cli format', () => {
    const writer = createCapturingWriter();
    const context = createSizewalkContext(createMockProcessContext(), {
      env: { LOG_LEVEL: 'info' },
      logWriter: writer,
    });

    context.diagnosticContext.logger.info('starting');
    context.diagnosticContext.logger.warn('will skip directory /x in calculations');

    expect(writer.stdout).not.toHaveBeenCalled();
    expect(writer.stderr.mock.calls).toEqual([
      ['info: starting'],
      ['warning: will skip directory /x in calculations'],
    ]);
  });

  it('should drop messages below the configured level', () => {
    const writer = createCapturingWriter();
    const context = createSizewalkContext(createMockProcessContext(), { env: {}, logWriter: writer });

    context.diagnosticContext.logger.info('hidden');
    context.diagnosticContext.logger.debug('hidden too');

    expect(writer.stderr).not.toHaveBeenCalled();
  });

  it('should reject an unknown log level', () => {
    expect(() =>
      createSizewalkContext(createMockProcessContext(), { env: { LOG_LEVEL: 'loud' } }),
    ).toThrow(/^Configuration validation failed:\n {2}- LOG_LEVEL: /);
  });
});
