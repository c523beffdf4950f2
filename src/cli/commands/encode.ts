import type { Command } from 'commander';
import pino from 'pino';
import { loadRuntime } from '../../runtime.js';
import { EncodeRequestSchema, parseBody } from '../../api/schemas.js';

export function registerEncodeCommand(program: Command): void {
  program
    .command('encode <text>')
    .description('Print the token ids of <text> as a JSON array')
    .option('--model <id>', 'Model id to load')
    .action(async (text: string, opts: { model?: string }) => {
      const request = parseBody(EncodeRequestSchema, { text });
      const { inference } = await loadRuntime({
        modelId: opts.model,
        destination: pino.destination(2),
      });
      const tokens = await inference.encode(request.text);
      process.stdout.write(`${JSON.stringify(tokens)}\n`);
    });
}
