/**
 * Worker configuration - the log-analysis worker's filter document
 *
 * Seeded from a template on first run and owned by the operator afterwards:
 * an existing file is never overwritten.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { errnoCode } from './file-lock.js';

const OriginFilterSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('build') }).strict(),
  z.object({
    type: z.literal('test'),
    include: z.array(z.string().min(1)).optional(),
  }).strict(),
]);

export const WorkerConfigSchema = z.record(z.string().min(1), OriginFilterSchema);

export type OriginFilter = z.infer<typeof OriginFilterSchema>;

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

export type SeedOutcome = 'seeded-from-project' | 'seeded-from-bundle' | 'kept';

/** Template shipped with this tool, used when the project has none */
export function bundledTemplatePath(): string {
  const dirname = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(dirname, '..', '..', 'templates', 'logspec_worker.yaml.example');
}

/**
 * Copy the template to target unless target already exists.
 */
export async function seedWorkerConfig(
  target: string,
  projectTemplate: string,
  fallbackTemplate: string = bundledTemplatePath()
): Promise<SeedOutcome> {
  if (fs.existsSync(target)) {
    return 'kept';
  }

  const fromProject = fs.existsSync(projectTemplate);
  const source = fromProject ? projectTemplate : fallbackTemplate;

  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  try {
    await fs.promises.copyFile(source, target, fs.constants.COPYFILE_EXCL);
  } catch (error) {
    // Another invocation created it first
    if (errnoCode(error) === 'EEXIST') {
      return 'kept';
    }
    throw new ConfigError(`Cannot seed worker configuration from ${source}: ${errorMessage(error)}`, target);
  }
  return fromProject ? 'seeded-from-project' : 'seeded-from-bundle';
}

export function parseWorkerConfig(content: string, file?: string): WorkerConfig {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Worker configuration is not valid YAML: ${errorMessage(error)}`, file);
  }

  // An empty document means no filters
  const parsed = WorkerConfigSchema.safeParse(document ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(
      `Invalid worker configuration: ${issues}`,
      file,
      'Each origin needs "type: build" or "type: test" with an optional "include" list of globs'
    );
  }
  return parsed.data;
}

export async function loadWorkerConfig(file: string): Promise<WorkerConfig> {
  let content: string;
  try {
    content = await fs.promises.readFile(file, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read worker configuration: ${errorMessage(error)}`, file);
  }
  return parseWorkerConfig(content, file);
}
