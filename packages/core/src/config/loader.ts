import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigError,
  ConfigSchema,
  isJsonObject,
  type Config,
  type JsonObject,
  type JudgeSettings,
  type ProviderConfig,
  type TargetSettings,
} from '@evalkit/shared';

/** Settings given on the command line; `undefined` entries leave the file value alone. */
export type ConfigFlags = {
  providers?: Record<string, ProviderConfig>;
  judge?: Partial<JudgeSettings>;
  target?: Partial<TargetSettings>;
  logging?: { jsonlPath?: string; verbose?: boolean };
};

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: ConfigFlags;
  cwd?: string; // where .evalkit.yaml is looked up
  env?: NodeJS.ProcessEnv;
}

export const USER_CONFIG_DIR = '.evalkit';
export const PROJECT_CONFIG_FILE = '.evalkit.yaml';

export class ConfigLoader {
  static loadYaml(filePath: string): JsonObject {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isJsonObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  /** Deep-merges plain objects; arrays and primitives in `source` replace. */
  static mergeConfigs(target: JsonObject, source: JsonObject): JsonObject {
    const output: JsonObject = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      output[key] =
        isJsonObject(sourceValue) && isJsonObject(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.evalkit/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), USER_CONFIG_DIR, 'config.yaml'));

    // 2. Project config: <cwd>/.evalkit.yaml
    const projectConfig = this.loadYaml(path.join(cwd, PROJECT_CONFIG_FILE));

    // 3. Explicit --config file
    let explicitConfig: JsonObject = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // Precedence: flags > explicit > project > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, projectConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, options.flags ?? {});

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const config = result.data;

    for (const providerConfig of Object.values(config.providers)) {
      if (providerConfig.api_key_env && !providerConfig.api_key) {
        const fromEnv = env[providerConfig.api_key_env];
        if (fromEnv) {
          providerConfig.api_key = fromEnv;
        }
      }
    }

    return config;
  }
}
