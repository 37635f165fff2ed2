import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import { resolveConfig } from '../src/config.js';
import { ConfigError } from '../src/utils/errors.js';
import { createTempDir, writeFiles } from './helpers.js';

describe('resolveConfig', () => {
  let home: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir: home, cleanup } = await createTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should enable everything and configure no sources by default', async () => {
    const config = await resolveConfig(undefined, {}, home);

    expect(config).toEqual({
      vcardDir: undefined,
      contactListFile: undefined,
      features: { completion: true, hover: true, codeActions: true, gotoDefinition: true },
      configPath: path.join(home, '.config', 'addressbook-ls', 'config.json'),
    });
  });

  it('should take initialization options and expand the home directory', async () => {
    const config = await resolveConfig({ vcard_dir: '~/cards', enable_hover: false }, {}, home);

    expect(config.vcardDir).toBe(path.join(home, 'cards'));
    expect(config.features.hover).toBe(false);
    expect(config.features.completion).toBe(true);
  });

  it('should prefer initialization options over the environment over the config file', async () => {
    await writeFiles(home, {
      'custom.json': JSON.stringify({ vcard_dir: 'file-cards', contact_list_file: 'list.txt', enable_completion: false }),
    });
    const env = { ADDRESSBOOK_LS_CONFIG: '~/custom.json', ADDRESSBOOK_LS_VCARD_DIR: '/env/cards' };

    const fromEnv = await resolveConfig({}, env, home);
    expect(fromEnv.configPath).toBe(path.join(home, 'custom.json'));
    expect(fromEnv.vcardDir).toBe(path.resolve('/env/cards'));
    expect(fromEnv.contactListFile).toBe(path.join(home, 'list.txt'));
    expect(fromEnv.features.completion).toBe(false);

    const fromClient = await resolveConfig({ vcard_dir: '/init/cards', enable_completion: true }, env, home);
    expect(fromClient.vcardDir).toBe(path.resolve('/init/cards'));
    expect(fromClient.features.completion).toBe(true);
  });

  it('should resolve config file paths relative to the file', async () => {
    await writeFiles(home, { '.config/addressbook-ls/config.json': '{"vcard_dir": "cards"}' });

    const config = await resolveConfig(null, {}, home);

    expect(config.vcardDir).toBe(path.join(home, '.config', 'addressbook-ls', 'cards'));
  });

  it('should ignore empty environment values', async () => {
    const config = await resolveConfig({}, { ADDRESSBOOK_LS_VCARD_DIR: '' }, home);

    expect(config.vcardDir).toBeUndefined();
  });

  it('should reject options of the wrong type', async () => {
    await expect(resolveConfig({ enable_hover: 'yes' }, {}, home)).rejects.toThrow(
      'Invalid initialization options: enable_hover: Expected boolean, received string',
    );
  });

  it('should reject a config file that is not JSON', async () => {
    await writeFiles(home, { '.config/addressbook-ls/config.json': '{ nope' });

    await expect(resolveConfig({}, {}, home)).rejects.toBeInstanceOf(ConfigError);
  });
});
