import path from 'path';
import { EngineConfig } from './types';
import { readJSONFile } from './utils';
import { validateEngineConfig } from './schema';

export const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'src/config/default.json');

const numberFromEnv = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

// Environment wins over the JSON file for deployment-specific values only.
export const applyEnvOverrides = (config: EngineConfig, env: NodeJS.ProcessEnv): EngineConfig => ({
  ...config,
  advisor: {
    ...config.advisor,
    model: env.OPENAI_MODEL || config.advisor.model,
    baseUrl: env.OPENAI_BASE_URL || config.advisor.baseUrl
  },
  api: {
    port: numberFromEnv(env.API_PORT) ?? config.api.port,
    bind: env.API_BIND || config.api.bind
  }
});

export const loadConfig = (configPath: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): EngineConfig => {
  const raw = readJSONFile(configPath);
  const validation = validateEngineConfig(raw);
  if (!validation.success) {
    throw new Error(`Invalid config ${configPath}:\n  ${validation.errors.join('\n  ')}`);
  }
  const merged = applyEnvOverrides(validation.value, env);
  const revalidated = validateEngineConfig(merged);
  if (!revalidated.success) {
    throw new Error(`Invalid environment overrides:\n  ${revalidated.errors.join('\n  ')}`);
  }
  return revalidated.value;
};
