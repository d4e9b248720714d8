import Ajv from 'ajv/dist/2020';
import fs from 'node:fs/promises';
import path from 'node:path';
import { ConfigError, errorMessage } from '../util/errors';
import configSchema from './schema/analyzer-config.schema.json';

/** Contents of an `--config` file. Every field is optional. */
export type AnalyzerConfig = {
  include?: string[];
  exclude?: string[];
  maxFiles?: number;
  exampleLimit?: number;
  extraSupportedShapes?: string[];
  extraPartialShapes?: string[];
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validate = ajv.compile<AnalyzerConfig>(configSchema);

export function validateAnalyzerConfig(value: unknown, label = '<config>'): AnalyzerConfig {
  if (validate(value)) return value;
  const details = (validate.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
  throw new ConfigError(`Invalid configuration '${label}': ${details.join('; ')}`);
}

export async function loadAnalyzerConfig(filePath: string): Promise<AnalyzerConfig> {
  const label = path.basename(filePath);
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (e) {
    throw new ConfigError(`Failed to read configuration '${filePath}': ${errorMessage(e)}`, { cause: e });
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Configuration '${label}' is not valid JSON: ${errorMessage(e)}`, { cause: e });
  }
  return validateAnalyzerConfig(data, label);
}
