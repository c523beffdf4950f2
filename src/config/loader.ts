import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS, type AppConfig } from '../types/config.types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigValidationError, isLogLevel } from './validator.js';

export const CONFIG_FILE_NAMES = ['.llm-api.json', 'llm-api.config.json'] as const;

const FileConfigSchema = z
  .object({
    model: z.object({ id: z.string() }).partial(),
    api: z.object({ port: z.number().int(), host: z.string() }).partial(),
    logLevel: z.enum(LOG_LEVELS),
  })
  .partial();

type FileConfig = z.infer<typeof FileConfigSchema>;

function loadFileConfig(cwd: string): FileConfig {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name);
    if (!existsSync(candidate)) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(candidate, 'utf-8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigValidationError(`Could not parse ${candidate}: ${reason}`);
    }

    const parsed = FileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'root';
      throw new ConfigValidationError(`Invalid ${candidate} at "${field}": ${issue?.message ?? 'unknown error'}`);
    }
    return parsed.data;
  }
  return {};
}

function loadEnvOverrides(env: NodeJS.ProcessEnv): FileConfig {
  const overrides: FileConfig = {};

  const modelName = env['MODEL_NAME'];
  if (modelName) {
    overrides.model = { id: modelName };
  }

  const port = env['PORT'];
  const host = env['HOST'];
  if (port || host) {
    overrides.api = {
      ...(port ? { port: Number(port) } : {}),
      ...(host ? { host } : {}),
    };
  }

  const logLevel = env['LOG_LEVEL'];
  if (logLevel) {
    const normalized = logLevel.toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new ConfigValidationError(
        `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}".`,
      );
    }
    overrides.logLevel = normalized;
  }

  return overrides;
}

function merge(base: AppConfig, override: FileConfig): AppConfig {
  return {
    model: { id: override.model?.id ?? base.model.id },
    api: {
      port: override.api?.port ?? base.api.port,
      host: override.api?.host ?? base.api.host,
    },
    logLevel: override.logLevel ?? base.logLevel,
  };
}

/**
 * Resolve configuration from defaults, then the first config file found in
 * `cwd`, then the environment. Later layers win.
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): AppConfig {
  return merge(merge(DEFAULT_CONFIG, loadFileConfig(cwd)), loadEnvOverrides(env));
}
