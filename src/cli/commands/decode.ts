import type { Command } from 'commander';
import pino from 'pino';
import { loadRuntime } from '../../runtime.js';
import { DecodeRequestSchema, parseBody } from '../../api/schemas.js';

export function registerDecodeCommand(program: Command): void {
  program
    .command('decode <tokens...>')
    .description('Decode space-separated token ids back into text')
    .option('--model <id>', 'Model id to load')
    .action(async (tokens: string[], opts: { model?: string }) => {
      const request = parseBody(DecodeRequestSchema, { tokens: tokens.map(Number) });
      const { inference } = await loadRuntime({
        modelId: opts.model,
        destination: pino.destination(2),
      });
      const text = await inference.decode(request.tokens);
      process.stdout.write(`${text}\n`);
    });
}
