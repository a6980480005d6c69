import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import yaml from 'js-yaml';
import { parse as parseToml } from 'toml';
import { ConfigurationError, errorMessage } from '../common/errors';
import { mergeConfigs, parseConfigFile, resolveConfig } from './resolve';
import { MaskerConfig, MaskerConfigFile } from './types';

function parseContents(contents: string, ext: string, absolute: string): unknown {
  try {
    switch (ext) {
      case '.yaml':
      case '.yml':
        return yaml.load(contents);
      case '.toml':
        return parseToml(contents);
      case '.json':
        return JSON.parse(contents);
      default:
        break;
    }
  } catch (error) {
    throw new ConfigurationError(`Failed to parse ${absolute}: ${errorMessage(error)}`);
  }
  throw new ConfigurationError(`Unsupported config format for ${absolute}`);
}

export async function readConfigFile(path: string): Promise<MaskerConfigFile> {
  const absolute = resolve(path);
  const contents = await readFile(absolute, 'utf8');
  const parsed = parseContents(contents, extname(absolute).toLowerCase(), absolute);
  // An empty YAML document loads as undefined.
  return parseConfigFile(parsed ?? {}, absolute);
}

export async function loadConfig(path: string, profile?: string): Promise<MaskerConfig> {
  const file = await readConfigFile(path);
  const { profiles, ...base } = file;

  if (profile) {
    const profileConfig = profiles?.[profile];
    if (!profileConfig) {
      throw new ConfigurationError(`Profile ${profile} not found in config`);
    }
    return resolveConfig(mergeConfigs(base, profileConfig));
  }

  return resolveConfig(base);
}
