export * from './diagnostics/diagnostics.js';
export type * from './diagnostics/types.js';
export { createEnvContext } from './environment/environment.js';
export { DefaultEnvSchemaType } from './environment/types.js';
export type {
  DefaultEnv,
  DefaultEnvContext,
  DefaultEnvSchema,
  EnvContext,
  EnvParserConfig,
  EnvSource,
} from './environment/types.js';
export { startProcessLifecycle } from './processLifecycle/processLifecycle.js';
export type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ProcessStartFn,
  ProcessStartResult,
  ShutdownCallback,
  ShutdownConfiguration,
} from './processLifecycle/types.js';
