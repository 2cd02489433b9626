import type { Stats } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { load as parseYaml } from 'js-yaml';
import { RivetError, describeError } from './errors.js';
import { SuiteSchema, type NamedSuite, type Suite } from './suite.js';

/**
 * Loads one suite from a file, or every `*.rivet.yaml` / `*.rivet.yml` file
 * below a directory, sorted by file name. Each suite is named after its file.
 */
export async function loadTestSuites(target: string): Promise<NamedSuite[]> {
  let info: Stats;
  try {
    info = await stat(target);
  } catch {
    throw new RivetError('SUITE_LOAD', `Path does not exist: ${target}`);
  }

  if (info.isFile()) {
    return [{ name: path.basename(target), suite: await loadSuiteFile(target) }];
  }

  const files = await findSuiteFiles(target);
  if (files.length === 0) {
    throw new RivetError('SUITE_LOAD', `No .rivet.yaml files found in directory: ${target}`);
  }

  const suites: NamedSuite[] = [];
  for (const file of files) {
    suites.push({ name: path.basename(file), suite: await loadSuiteFile(file) });
  }
  return suites.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

export async function loadSuiteFile(filePath: string): Promise<Suite> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new RivetError('SUITE_LOAD', `Failed to read file: ${filePath} (${describeError(error)})`, { cause: error });
  }

  let data: unknown;
  try {
    data = parseYaml(raw);
  } catch (error) {
    throw new RivetError('SUITE_LOAD', `Failed to parse YAML in file: ${filePath} (${describeError(error)})`, { cause: error });
  }

  return parseSuite(data, filePath);
}

export function parseSuite(data: unknown, source = '<inline>'): Suite {
  const parsed = SuiteSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new RivetError('SUITE_LOAD', `Invalid suite in file ${source}: ${issues}`);
  }
  return parsed.data;
}

export function isSuiteFile(fileName: string): boolean {
  const extension = path.extname(fileName);
  return (extension === '.yaml' || extension === '.yml') && fileName.includes('.rivet.');
}

async function findSuiteFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await findSuiteFiles(fullPath)));
    } else if (entry.isFile() && isSuiteFile(entry.name)) {
      files.push(fullPath);
    }
  }

  return files;
}
