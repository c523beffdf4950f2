#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { LLMError } from '../errors/base.js';
import { RequestValidationError } from '../errors/validation.js';
import { registerServeCommand } from './commands/serve.js';
import { registerGenerateCommand } from './commands/generate.js';
import { registerEncodeCommand } from './commands/encode.js';
import { registerDecodeCommand } from './commands/decode.js';

const require = createRequire(import.meta.url);

const pkg = require('../../package.json') as { version: string; description: string };

function describeError(err: unknown): string {
  if (err instanceof RequestValidationError) {
    return err.details.map((d) => `${d.loc.slice(1).join('.')}: ${d.msg}`).join('; ');
  }
  if (err instanceof LLMError) {
    return `${err.code}: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('llm-api')
    .description(pkg.description)
    .version(pkg.version);

  registerServeCommand(program);
  registerGenerateCommand(program);
  registerEncodeCommand(program);
  registerDecodeCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  process.stderr.write(`[llm-api] Error: ${describeError(err)}\n`);
  process.exit(1);
});
