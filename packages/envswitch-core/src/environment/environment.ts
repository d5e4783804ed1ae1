import { promises as fsp } from 'node:fs';
import { dirname, join } from 'node:path';
import { logger } from '@envswitch/adapters/logging';
import { describeError, environmentSchema, type Environment, type Hook } from '@envswitch/contracts';
import { parse, stringify } from 'yaml';
import { EnvironmentConfigError, formatIssues } from '../errors';

export const ENVIRONMENT_FILE_EXTENSIONS = ['.yaml', '.yml'] as const;

/** Validate a parsed document against the environment schema. */
export function parseEnvironment(input: unknown, source?: string): Environment {
  const parsed = environmentSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    const where = source ? ` in ${source}` : '';
    throw new EnvironmentConfigError(`invalid environment${where}: ${issues.join('; ')}`, issues, source);
  }
  return parsed.data;
}

export function loadEnvironment(text: string, source?: string): Environment {
  let document: unknown;
  try {
    document = parse(text);
  } catch (err) {
    throw new EnvironmentConfigError(
      `failed to parse environment configuration: ${describeError(err)}`,
      [],
      source,
      err,
    );
  }
  return parseEnvironment(document, source);
}

export async function loadEnvironmentFromFile(path: string): Promise<Environment> {
  let text: string;
  try {
    text = await fsp.readFile(path, 'utf8');
  } catch (err) {
    throw new EnvironmentConfigError(`failed to read environment file: ${describeError(err)}`, [], path, err);
  }
  const env = loadEnvironment(text, path);
  logger.debug('environment loaded', { path, name: env.name, services: Object.keys(env.services).length });
  return env;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await fsp.stat(path)).isFile();
  } catch (err) {
    logger.debug('environment candidate not readable', { path, error: describeError(err) });
    return false;
  }
}

/**
 * First `<dir>/<name>.yaml` or `<dir>/<name>.yml` over the search paths,
 * or undefined.
 */
export async function findEnvironmentFile(
  name: string,
  searchPaths: readonly string[],
): Promise<string | undefined> {
  for (const dir of searchPaths) {
    for (const ext of ENVIRONMENT_FILE_EXTENSIONS) {
      const candidate = join(dir, `${name}${ext}`);
      if (await isFile(candidate)) {
        return candidate;
      }
    }
  }
  return undefined;
}

/** Find and load the environment called `name`. */
export async function loadNamedEnvironment(
  name: string,
  searchPaths: readonly string[],
): Promise<Environment> {
  const path = await findEnvironmentFile(name, searchPaths);
  if (path === undefined) {
    throw new EnvironmentConfigError(
      `environment file not found for "${name}" (searched: ${searchPaths.join(', ')})`,
    );
  }
  return loadEnvironmentFromFile(path);
}

function hookToDocument(hook: Hook): Record<string, unknown> {
  const doc: Record<string, unknown> = { command: hook.command };
  if (hook.timeoutMs !== undefined) {
    doc.timeout = hook.timeoutMs;
  }
  if (hook.onError !== undefined) {
    doc.onError = hook.onError;
  }
  return doc;
}

/** Serialize in the same layout `loadEnvironment` reads; empty sections are left out. */
export function environmentToYaml(env: Environment): string {
  const doc: Record<string, unknown> = { name: env.name };
  if (env.description) {
    doc.description = env.description;
  }
  doc.services = env.services;
  if (env.dependencies.length > 0) {
    doc.dependencies = env.dependencies;
  }
  if (env.preHooks.length > 0) {
    doc.preHooks = env.preHooks.map(hookToDocument);
  }
  if (env.postHooks.length > 0) {
    doc.postHooks = env.postHooks.map(hookToDocument);
  }
  return stringify(doc);
}

export async function saveEnvironment(env: Environment, path: string): Promise<void> {
  await fsp.mkdir(dirname(path), { recursive: true });
  await fsp.writeFile(path, environmentToYaml(env), 'utf8');
  logger.info('environment saved', { path, name: env.name });
}

/** Service names, sorted. */
export function getServiceNames(env: Environment): string[] {
  return Object.keys(env.services).sort();
}

export function hasService(env: Environment, service: string): boolean {
  return Object.prototype.hasOwnProperty.call(env.services, service);
}

/**
 * Checks run before any switch: a name, at least one service and no empty
 * dependency entry. Returns the problem, or undefined.
 */
export function validateEnvironment(env: Environment): string | undefined {
  if (!env.name) {
    return 'environment name is required';
  }
  if (Object.keys(env.services).length === 0) {
    return 'at least one service must be configured';
  }
  if (env.dependencies.some((dep) => dep.trim() === '')) {
    return 'empty dependency string found';
  }
  return undefined;
}
