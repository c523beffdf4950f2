import type { Command } from 'commander';
import { loadRuntime } from '../../runtime.js';
import { createApiServer } from '../../api/server.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Load the model and start the HTTP API')
    .option('--port <n>', 'Port to listen on (default: config or PORT)')
    .option('--host <h>', 'Host to bind to (default: config or HOST)')
    .option('--model <id>', 'Model id to load (default: config or MODEL_NAME)')
    .action(async (opts: { port?: string; host?: string; model?: string }) => {
      const { config, logger, inference } = await loadRuntime({
        modelId: opts.model,
        port: opts.port !== undefined ? Number(opts.port) : undefined,
        host: opts.host,
      });
      const app = createApiServer({ inference, logger });

      const { port, host } = config.api;
      await app.listen({ port, host });
      logger.info({ host, port, modelId: inference.modelId }, 'LLM API listening');
    });
}
