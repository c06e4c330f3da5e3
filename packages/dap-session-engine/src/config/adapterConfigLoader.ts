import * as fs from 'fs';
import * as path from 'path';
import type { AdapterConfig } from '../adapterProcess';
import { LoggerInterface, childLogger } from '../logging';
import { JsonObject, JsonValue, isJsonArray, isJsonObject, toJsonValue } from '../protocol/json';

function stringArray(value: JsonValue | undefined, where: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isJsonArray(value) || !value.every((item) => typeof item === 'string')) {
    throw new Error(`${where} must be an array of strings`);
  }
  return value.filter((item): item is string => typeof item === 'string');
}

function stringRecord(
  value: JsonValue | undefined,
  where: string,
): Record<string, string> | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isJsonObject(value)) throw new Error(`${where} must be an object`);
  const record: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== 'string') {
      throw new Error(`${where}.${key} must be a string`);
    }
    record[key] = item;
  }
  return record;
}

function parseAdapter(type: string, entry: JsonObject): AdapterConfig {
  const where = `adapters.${type}`;
  const command = entry.command;
  if (typeof command !== 'string' || command.length === 0) {
    throw new Error(`${where}.command must be a non-empty string`);
  }
  const config: AdapterConfig = { type, command };

  const args = stringArray(entry.args, `${where}.args`);
  if (args) config.args = args;
  const env = stringRecord(entry.env, `${where}.env`);
  if (env) config.env = env;
  const cwd = entry.cwd;
  if (cwd !== undefined && cwd !== null) {
    if (typeof cwd !== 'string') throw new Error(`${where}.cwd must be a string`);
    config.cwd = cwd;
  }
  return config;
}

/**
 * Loads debug adapter configurations from a JSON file
 */
export class AdapterConfigLoader {
  private readonly logger: LoggerInterface;

  constructor(logger: LoggerInterface) {
    this.logger = childLogger(logger, { className: 'AdapterConfigLoader' });
  }

  /**
   * Loads adapter configurations from a JSON file. Relative paths resolve
   * against the working directory.
   */
  public loadFromFile(configPath: string): AdapterConfig[] {
    try {
      this.logger.info(`Loading adapter configurations from ${configPath}`);

      const resolvedPath = path.isAbsolute(configPath)
        ? configPath
        : path.resolve(process.cwd(), configPath);

      if (!fs.existsSync(resolvedPath)) {
        throw new Error(
          `Adapter configuration file not found: ${resolvedPath}`,
        );
      }

      const fileContent = fs.readFileSync(resolvedPath, 'utf8');
      const parsed: unknown = JSON.parse(fileContent);
      const config = toJsonValue(parsed);
      const adapters = isJsonObject(config) ? config.adapters : undefined;

      if (!isJsonObject(adapters)) {
        throw new Error(
          'Invalid adapter configuration file format: missing or invalid "adapters" property',
        );
      }

      const adapterConfigs: AdapterConfig[] = [];
      for (const [type, entry] of Object.entries(adapters)) {
        if (!isJsonObject(entry)) {
          throw new Error(`adapters.${type} must be an object`);
        }
        adapterConfigs.push(parseAdapter(type, entry));
      }

      this.logger.info(
        `Loaded ${adapterConfigs.length} adapter configurations`,
      );
      return adapterConfigs;
    } catch (error) {
      this.logger.error('Error loading adapter configurations', error);
      throw new Error(
        `Failed to load adapter configurations: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Loads the file and returns the adapter registered under `type`.
   */
  public loadAdapter(configPath: string, type: string): AdapterConfig {
    const found = this.loadFromFile(configPath).find(
      (config) => config.type === type,
    );
    if (!found) {
      throw new Error(`No adapter of type '${type}' in ${configPath}`);
    }
    return found;
  }
}
