import { SF } from '@sizewalk/service-framework-node';
import { sizewalkEnvSchema } from './environment.js';

export interface SizewalkContextOptions {
  env?: SF.EnvSource;
  logWriter?: SF.LogWriter;
}

export function createSizewalkContext(
  processContext: SF.ProcessLifecycleContext,
  options: SizewalkContextOptions = {},
) {
  const envContext = SF.createEnvContext(sizewalkEnvSchema, { source: options.env });

  // stdout carries the report only
  const diagnosticContext = SF.createDiagnosticContext(envContext, {
    minimumSeverity: envContext.config.LOG_LEVEL,
    outputFormat: envContext.config.LOG_FORMAT,
    stream: 'stderr',
    writer: options.logWriter,
  });

  return {
    envContext,
    diagnosticContext,
    processContext,
  };
}

export type SizewalkContext = ReturnType<typeof createSizewalkContext>;
