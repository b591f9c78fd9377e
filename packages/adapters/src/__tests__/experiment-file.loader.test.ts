import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ExperimentFileError, readExperimentDocument } from '../loader/experiment-file.loader.js';

let dir: string;

beforeAll(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'faultline-loader-'));
});

afterAll(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

async function writeFixture(name: string, content: string): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, content, 'utf8');
  return filePath;
}

describe('readExperimentDocument', () => {
  it('reads YAML definitions', async () => {
    const filePath = await writeFixture(
      'latency.yaml',
      [
        'id: exp-yaml',
        'name: YAML latency',
        'durationSeconds: 2',
        'faultSpecs:',
        '  - kind: latency',
        '    durationMs: 50',
        '    affectedTargets: [search]',
        '',
      ].join('\n'),
    );

    await expect(readExperimentDocument(filePath)).resolves.toEqual({
      id: 'exp-yaml',
      name: 'YAML latency',
      durationSeconds: 2,
      faultSpecs: [{ kind: 'latency', durationMs: 50, affectedTargets: ['search'] }],
    });
  });

  it('reads .yml the same way', async () => {
    const filePath = await writeFixture('short.yml', 'name: short\n');
    await expect(readExperimentDocument(filePath)).resolves.toEqual({ name: 'short' });
  });

  it('reads JSON definitions', async () => {
    const filePath = await writeFixture(
      'errors.json',
      JSON.stringify({ name: 'JSON errors', faultSpecs: [{ kind: 'error', errorCode: 503 }] }),
    );

    await expect(readExperimentDocument(filePath)).resolves.toEqual({
      name: 'JSON errors',
      faultSpecs: [{ kind: 'error', errorCode: 503 }],
    });
  });

  it('rejects unsupported extensions', async () => {
    const filePath = await writeFixture('experiment.toml', 'name = "x"');
    await expect(readExperimentDocument(filePath)).rejects.toThrow(
      `${filePath}: unsupported file extension ".toml"`,
    );
  });

  it('wraps missing files', async () => {
    await expect(readExperimentDocument(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(
      ExperimentFileError,
    );
  });

  it('wraps malformed JSON', async () => {
    const filePath = await writeFixture('broken.json', '{ "name": ');
    await expect(readExperimentDocument(filePath)).rejects.toBeInstanceOf(ExperimentFileError);
  });
});
