import { readJsonFile } from './json-file.js';
import { validateConfig } from './validators.js';
import type { GleanerConfig } from './config.schema.js';

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

function applyEnvOverrides(config: GleanerConfig, env: ConfigEnv): GleanerConfig {
  const dbPath = env['GLEANER_DB_PATH'];
  const model = env['GLEANER_LLM_MODEL'];

  return {
    ...config,
    llm: model ? { ...config.llm, model } : config.llm,
    store: dbPath ? { ...config.store, dbPath } : config.store,
  };
}

export async function loadConfig(
  configPath: string,
  env: ConfigEnv = process.env,
): Promise<GleanerConfig> {
  const raw = await readJsonFile(configPath, 'Configuration file');
  return applyEnvOverrides(validateConfig(raw), env);
}
