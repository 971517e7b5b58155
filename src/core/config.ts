import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { CargoCiConfigSchema, type CargoCiConfig, type ConfigOverrides } from './types.js';
import { ConfigError } from './errors.js';

export class ConfigManager {
  private configPath?: string;
  private env: NodeJS.ProcessEnv;

  /**
   * @param configPath optional YAML file; nothing is read from disk without it
   * @param env environment to read `PROFILE` and `CARGO` from
   */
  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- config file <- env vars <- overrides
   */
  load(overrides?: ConfigOverrides): CargoCiConfig {
    let raw: Record<string, unknown> = {};

    if (this.configPath) {
      raw = { ...raw, ...this.readFile(this.configPath) };
    }

    raw = this.applyEnvVars(raw);

    if (overrides) {
      for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) {
          raw[key] = value;
        }
      }
    }

    const parsed = CargoCiConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${detail}`, parsed.error);
    }

    return parsed.data;
  }

  private readFile(path: string): Record<string, unknown> {
    const fullPath = resolve(path);
    if (!existsSync(fullPath)) {
      throw new ConfigError(`Config file not found: ${fullPath}`);
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(fullPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(
        `Failed to parse config at ${fullPath}`,
        err instanceof Error ? err : undefined,
      );
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigError(`Config at ${fullPath} must be a mapping`);
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const result = { ...raw };

    // PROFILE may be set to an empty string on purpose (debug build)
    if (this.env.PROFILE !== undefined) {
      result.profile = this.env.PROFILE;
    }
    if (this.env.CARGO) {
      result.cargo = this.env.CARGO;
    }

    return result;
  }
}
