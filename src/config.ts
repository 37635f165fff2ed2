import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import type { Features } from './engine/index.js';
import { ConfigError, errorCode, errorMessage, expandHome, logger } from './utils/index.js';

export const settingsSchema = z.object({
  vcard_dir: z.string().min(1).optional(),
  contact_list_file: z.string().min(1).optional(),
  enable_completion: z.boolean().optional(),
  enable_hover: z.boolean().optional(),
  enable_code_actions: z.boolean().optional(),
  enable_goto_definition: z.boolean().optional(),
});

export type Settings = z.infer<typeof settingsSchema>;

export interface AppConfig {
  vcardDir?: string;
  contactListFile?: string;
  features: Features;
  /** Config file that was consulted, whether or not it existed. */
  configPath: string;
}

export const ENV_VCARD_DIR = 'ADDRESSBOOK_LS_VCARD_DIR';
export const ENV_CONTACT_LIST = 'ADDRESSBOOK_LS_CONTACT_LIST';
export const ENV_CONFIG = 'ADDRESSBOOK_LS_CONFIG';

export function defaultConfigPath(home: string = os.homedir()): string {
  return path.join(home, '.config', 'addressbook-ls', 'config.json');
}

/**
 * Resolve the server configuration. Initialization options win over the environment,
 * which wins over the JSON config file. Paths from the config file are relative to it.
 */
export async function resolveConfig(
  initializationOptions: unknown,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): Promise<AppConfig> {
  const fromClient = parseSettings(initializationOptions ?? {}, 'initialization options');
  const configPath = path.resolve(expandHome(env[ENV_CONFIG] ?? defaultConfigPath(home), home));
  const fromFile = await readConfigFile(configPath);
  const fileBase = path.dirname(configPath);

  const cwd = process.cwd();
  const vcardDir = firstPath(home, [
    [fromClient.vcard_dir, cwd],
    [env[ENV_VCARD_DIR], cwd],
    [fromFile.vcard_dir, fileBase],
  ]);
  const contactListFile = firstPath(home, [
    [fromClient.contact_list_file, cwd],
    [env[ENV_CONTACT_LIST], cwd],
    [fromFile.contact_list_file, fileBase],
  ]);

  const features: Features = {
    completion: fromClient.enable_completion ?? fromFile.enable_completion ?? true,
    hover: fromClient.enable_hover ?? fromFile.enable_hover ?? true,
    codeActions: fromClient.enable_code_actions ?? fromFile.enable_code_actions ?? true,
    gotoDefinition: fromClient.enable_goto_definition ?? fromFile.enable_goto_definition ?? true,
  };

  logger.debug('Config file:', configPath);
  return { vcardDir, contactListFile, features, configPath };
}

/** First configured path, resolved against the base it was given with. */
function firstPath(home: string, candidates: Array<[string | undefined, string]>): string | undefined {
  for (const [value, base] of candidates) {
    if (value) return path.resolve(base, expandHome(value, home));
  }
  return undefined;
}

export function parseSettings(raw: unknown, origin: string): Settings {
  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${origin}: ${issues}`);
  }
  return result.data;
}

async function readConfigFile(configPath: string): Promise<Settings> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    // No config file is the common case.
    if (errorCode(err) === 'ENOENT') return {};
    throw new ConfigError(`Cannot read config file ${configPath}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${errorMessage(err)}`);
  }
  return parseSettings(parsed, `config file ${configPath}`);
}
