import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { isRecord } from '@dpcheck/schema';
import type { Descriptor } from '@dpcheck/schema';

export const DESCRIPTOR_FILE_NAME = 'datapackage.json';

export class DescriptorLoadError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'DescriptorLoadError';
  }
}

/** A directory stands for the `datapackage.json` inside it. */
export async function resolveDescriptorPath(path: string): Promise<string> {
  try {
    const stats = await stat(path);
    return stats.isDirectory() ? join(path, DESCRIPTOR_FILE_NAME) : path;
  } catch (err) {
    throw new DescriptorLoadError(`Cannot find descriptor: ${path}`, err);
  }
}

export async function loadDescriptor(path: string): Promise<Descriptor> {
  const descriptorPath = await resolveDescriptorPath(path);

  let raw: string;
  try {
    raw = await readFile(descriptorPath, 'utf-8');
  } catch (err) {
    throw new DescriptorLoadError(`Cannot read descriptor: ${descriptorPath}`, err);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new DescriptorLoadError(`Invalid JSON in descriptor: ${descriptorPath}`, err);
  }

  if (!isRecord(parsed)) {
    throw new DescriptorLoadError(`Descriptor is not a JSON object: ${descriptorPath}`);
  }
  return parsed;
}
