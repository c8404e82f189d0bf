import { stringifyJSONSafe } from '@sizewalk/utils';
import { createDiagnosticContext } from '../diagnostics/diagnostics.js';
import type { Logger } from '../diagnostics/types.js';
import { createEnvContext } from '../environment/environment.js';
import { DefaultEnvSchemaType } from '../environment/types.js';
import type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ProcessStartFn,
  ShutdownCallback,
  ShutdownConfiguration,
} from './types.js';

const defaultShutdownConfiguration: ShutdownConfiguration = {
  callbackTimeout: 10000,
  totalTimeout: 30000,
};

export async function startProcessLifecycle(
  startFn: ProcessStartFn,
  config: ProcessLifecycleConfig = {},
): Promise<void> {
  const processName = config.processName ?? 'process';

  // Replaced once PROCESS_NAME is validated, so a failed parse can still be logged.
  let diagnosticContext = createDiagnosticContext({
    config: { PROCESS_NAME: processName },
    nodeEnv: process.env.NODE_ENV ?? 'development',
  });

  const context = createProcessLifecycleContext(() => diagnosticContext.logger, config);
  context.registerSignalHandlers();

  const processContext: ProcessLifecycleContext = {
    onShutdown: context.onShutdown,
    shutdown: context.shutdown,
    isShuttingDown: context.isShuttingDown,
  };

  let exitCode: number;

  try {
    const baseEnv = createEnvContext(DefaultEnvSchemaType, {
      source: { PROCESS_NAME: processName, ...process.env },
    });
    diagnosticContext = createDiagnosticContext(baseEnv);

    const result = await startFn(processContext);
    diagnosticContext = result.diagnosticContext;
    exitCode = result.exitCode ?? 0;
  } catch (error) {
    diagnosticContext.logger.fatal(error, 'Process failed to start');
    await context.shutdown(1);
    return;
  }

  diagnosticContext.logger.debug('Process lifecycle signal handlers registered');

  if (config.runToCompletion) {
    await context.shutdown(exitCode);
  }
}

function createProcessLifecycleContext(
  getLogger: () => Logger,
  { shutdownConfiguration }: ProcessLifecycleConfig,
): ProcessLifecycleContext & {
  registerSignalHandlers(): void;
} {
  const shutdownConfig = shutdownConfiguration ?? defaultShutdownConfiguration;

  const callbacks: ShutdownCallback[] = [];
  let shuttingDown = false;
  let unregisterSignalHandlers: (() => void) | undefined;

  const executeCallbackWithTimeout = async (
    callback: ShutdownCallback,
    timeout: number,
    logger: Logger,
  ): Promise<void> => {
    let timer: NodeJS.Timeout | undefined;

    try {
      await Promise.race([
        callback(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Callback timeout')), timeout);
        }),
      ]);
    } catch (error) {
      logger.error(error, 'Shutdown callback failed or timed out', {
        timeout,
      });
    } finally {
      clearTimeout(timer);
    }
  };

  const stopProcess = async (signal: string): Promise<void> => {
    const logger = getLogger();

    logger.debug('Graceful shutdown initiated', { signal });

    const forceExitTimeout = setTimeout(() => {
      logger.fatal(new Error('Shutdown timeout exceeded, forcing exit'), {
        totalTimeout: shutdownConfig.totalTimeout,
      });
      process.exit(1);
    }, shutdownConfig.totalTimeout);

    for (const callback of callbacks) {
      await executeCallbackWithTimeout(callback, shutdownConfig.callbackTimeout, logger);
    }

    clearTimeout(forceExitTimeout);
    unregisterSignalHandlers?.();

    logger.debug('Graceful shutdown completed');
  };

  const initiateShutdown = async (signal: string, exitCode: number): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;

    await stopProcess(signal);
    process.exit(exitCode);
  };

  const handleSignal = (signal: string): void => {
    void initiateShutdown(signal, 0);
  };

  const handleUnhandledRejection = (reason: unknown, promise: Promise<unknown>): void => {
    getLogger().fatal(new Error('Unhandled promise rejection detected'), {
      reason: stringifyJSONSafe(reason),
      reasonString: String(reason),
      promise: String(promise),
    });

    void initiateShutdown('unhandledRejection', 1);
  };

  const handleUncaughtException = (error: Error): void => {
    getLogger().fatal(error, 'Uncaught exception detected');

    void initiateShutdown('uncaughtException', 1);
  };

  const handleWarning = (warning: Error): void => {
    getLogger().warn('Process warning emitted', {
      name: warning.name,
      message: warning.message,
      stack: warning.stack,
    });
  };

  const registerSignalHandlers = (): void => {
    const sigTermHandler = () => handleSignal('SIGTERM');
    const sigIntHandler = () => handleSignal('SIGINT');
    const sigUsr2Handler = () => handleSignal('SIGUSR2');

    process.on('SIGTERM', sigTermHandler);
    process.on('SIGINT', sigIntHandler);
    process.on('SIGUSR2', sigUsr2Handler);
    process.on('unhandledRejection', handleUnhandledRejection);
    process.on('uncaughtException', handleUncaughtException);
    process.on('warning', handleWarning);

    unregisterSignalHandlers = () => {
      process.removeListener('SIGTERM', sigTermHandler);
      process.removeListener('SIGINT', sigIntHandler);
      process.removeListener('SIGUSR2', sigUsr2Handler);
      process.removeListener('unhandledRejection', handleUnhandledRejection);
      process.removeListener('uncaughtException', handleUncaughtException);
      process.removeListener('warning', handleWarning);
    };
  };

  return {
    onShutdown: (callback: ShutdownCallback): void => {
      callbacks.push(callback);
    },
    shutdown: (exitCode = 0): Promise<void> => initiateShutdown('manual', exitCode),
    isShuttingDown: (): boolean => shuttingDown,
    registerSignalHandlers,
  };
}
