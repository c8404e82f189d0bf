import { TB } from '@sizewalk/service-framework-node/typebox';

export const sizewalkEnvSchema = TB.Object({
  PROCESS_NAME: TB.String({ default: 'sizewalk' }),
  NODE_ENV: TB.String({ default: 'production' }),
  LOG_LEVEL: TB.Union(
    [
      TB.Literal('debug'),
      TB.Literal('info'),
      TB.Literal('warn'),
      TB.Literal('error'),
      TB.Literal('fatal'),
    ],
    { default: 'warn' },
  ),
  LOG_FORMAT: TB.Union(
    [TB.Literal('cli'), TB.Literal('human'), TB.Literal('json'), TB.Literal('structured-text')],
    { default: 'cli' },
  ),

  // Scan defaults, overridden by command line flags
  ROOT_DIR: TB.String({ default: '/' }),
  SIZE_THRESHOLD: TB.String({ default: '100MB' }),
  IGNORE_DIR_REGEXP: TB.String({ default: '' }),
  SIZE_UNITS: TB.String({ default: 'si' }),
});

export type SizewalkEnv = TB.Static<typeof sizewalkEnvSchema>;
