import type { DiagnosticContext } from '../diagnostics/types.js';
import type { EnvContext } from '../environment/types.js';

export type ShutdownCallback = () => Promise<void> | void;

export interface ShutdownConfiguration {
  callbackTimeout: number;
  totalTimeout: number;
}

export interface ProcessLifecycleConfig {
  shutdownConfiguration?: ShutdownConfiguration;
  /**
   * Used as PROCESS_NAME until the start function provides its own diagnostics.
   */
  processName?: string;
  /**
   * Shut down as soon as the start function resolves, exiting with its `exitCode`.
   * Long-running services leave this off and wait for a signal.
   */
  runToCompletion?: boolean;
}

export interface ProcessStartResult {
  diagnosticContext: DiagnosticContext;
  envContext: EnvContext;
  exitCode?: number;
}

export type ProcessStartFn = (context: ProcessLifecycleContext) => Promise<ProcessStartResult>;

export interface ProcessLifecycleContext {
  onShutdown(callback: ShutdownCallback): void;
  shutdown(exitCode?: number): Promise<void>;
  isShuttingDown(): boolean;
}
