#!/usr/bin/env node
import { SF } from '@sizewalk/service-framework-node';
import { createSizewalkContext } from './context.js';
import { runSizewalk } from './sizewalkService.js';

async function bootstrap(): Promise<void> {
  await SF.startProcessLifecycle(
    async (processContext) => {
      const context = createSizewalkContext(processContext);

      const exitCode = await runSizewalk(context, process.argv.slice(2));

      return {
        diagnosticContext: context.diagnosticContext,
        envContext: context.envContext,
        exitCode,
      };
    },
    { processName: 'sizewalk', runToCompletion: true },
  );
}

void bootstrap();
