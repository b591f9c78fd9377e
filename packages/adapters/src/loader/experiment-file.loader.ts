import { promises as fs } from 'fs';
import path from 'path';
import yaml from 'js-yaml';

export class ExperimentFileError extends Error {
  readonly status = 400;

  constructor(
    readonly filePath: string,
    message: string,
  ) {
    super(`${filePath}: ${message}`);
    this.name = 'ExperimentFileError';
  }
}

/**
 * Reads an experiment definition document from a `.yaml`, `.yml` or `.json`
 * file. The document is returned unvalidated.
 */
export async function readExperimentDocument(filePath: string): Promise<unknown> {
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== '.yaml' && ext !== '.yml' && ext !== '.json') {
    throw new ExperimentFileError(filePath, `unsupported file extension "${ext}"`);
  }

  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw new ExperimentFileError(filePath, err instanceof Error ? err.message : String(err));
  }

  try {
    return ext === '.json' ? JSON.parse(raw) : yaml.load(raw);
  } catch (err) {
    throw new ExperimentFileError(filePath, err instanceof Error ? err.message : String(err));
  }
}
