import type { Command } from 'commander';
import pino from 'pino';
import { loadRuntime } from '../../runtime.js';
import { DEFAULT_MAX_TOKENS, GenerateRequestSchema, parseBody } from '../../api/schemas.js';

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate <prompt>')
    .description('Generate a continuation of <prompt> with the configured model')
    .option('--max-tokens <n>', 'Maximum number of new tokens', String(DEFAULT_MAX_TOKENS))
    .option('--model <id>', 'Model id to load')
    .action(async (prompt: string, opts: { maxTokens: string; model?: string }) => {
      const request = parseBody(GenerateRequestSchema, {
        prompt,
        max_tokens: parseInt(opts.maxTokens, 10),
      });
      const { inference } = await loadRuntime({
        modelId: opts.model,
        destination: pino.destination(2),
      });
      const text = await inference.generate(request.prompt, request.max_tokens);
      process.stdout.write(`${text}\n`);
    });
}
