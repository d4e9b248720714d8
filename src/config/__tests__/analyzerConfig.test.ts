import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { ConfigError } from '../../util/errors';
import { thrownBy } from '../../__tests__/fixtures/odxBuilder';
import { loadAnalyzerConfig, validateAnalyzerConfig } from '../analyzerConfig';

describe('validateAnalyzerConfig', () => {
  test('accepts a complete configuration', () => {
    const cfg = {
      include: ['**/*.odx'],
      exclude: ['archive/**'],
      maxFiles: 50,
      exampleLimit: 5,
      extraSupportedShapes: ['Widget'],
      extraPartialShapes: ['Gizmo'],
    };
    expect(validateAnalyzerConfig(cfg)).toEqual(cfg);
  });

  test('accepts an empty object', () => {
    expect(validateAnalyzerConfig({})).toEqual({});
  });

  test('lists every violation', () => {
    const caught = thrownBy(() => validateAnalyzerConfig({ maxFiles: 0, include: 'x' }, 'odx.json'));
    if (!(caught instanceof ConfigError)) throw new Error('expected a ConfigError');
    expect(caught.code).toBe('CONFIG_ERROR');
    expect(caught.message).toContain("Invalid configuration 'odx.json': ");
    expect(caught.message).toContain('/maxFiles must be >= 1');
    expect(caught.message).toContain('/include must be array');
  });

  test('rejects unknown settings', () => {
    expect(() => validateAnalyzerConfig({ verbose: true })).toThrow(
      "Invalid configuration '<config>': / must NOT have additional properties",
    );
  });
});

describe('loadAnalyzerConfig', () => {
  async function write(content: string): Promise<string> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'odx-config-'));
    const file = path.join(dir, 'odx.json');
    await fs.writeFile(file, content, 'utf8');
    return file;
  }

  test('reads and validates a file', async () => {
    const file = await write(JSON.stringify({ exampleLimit: 2 }));
    await expect(loadAnalyzerConfig(file)).resolves.toEqual({ exampleLimit: 2 });
  });

  test('rejects malformed JSON', async () => {
    const file = await write('{ "maxFiles": ');
    await expect(loadAnalyzerConfig(file)).rejects.toThrow("Configuration 'odx.json' is not valid JSON: ");
  });

  test('rejects a missing file', async () => {
    const missing = path.join(os.tmpdir(), 'odx-config-missing', 'none.json');
    await expect(loadAnalyzerConfig(missing)).rejects.toBeInstanceOf(ConfigError);
  });
});
