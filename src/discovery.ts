import { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError } from './errors';
import { DdlFile } from './types';

const SQL_FILE_REGEX = /^([^.]+)\.(.+)\.sql$/;

// Code-unit comparison so ordering does not depend on the host locale
function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function parseDdlFileName(fileName: string): { prefix: string; objectName: string } | undefined {
  const match = fileName.match(SQL_FILE_REGEX);
  if (!match) {
    return undefined;
  }
  return { prefix: match[1], objectName: match[2] };
}

// Symlinks are followed; a dangling link counts as neither a file nor a folder
async function entryKind(dir: string, entry: Dirent): Promise<'file' | 'directory' | undefined> {
  if (entry.isSymbolicLink()) {
    try {
      const stats = await fs.stat(path.join(dir, entry.name));
      return stats.isDirectory() ? 'directory' : stats.isFile() ? 'file' : undefined;
    } catch (e: unknown) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
        return undefined;
      }
      throw e;
    }
  }
  return entry.isDirectory() ? 'directory' : entry.isFile() ? 'file' : undefined;
}

async function namesOfKind(dir: string, entries: Dirent[], kind: 'file' | 'directory'): Promise<string[]> {
  const names: string[] = [];
  for (const entry of entries) {
    if ((await entryKind(dir, entry)) === kind) {
      names.push(entry.name);
    }
  }
  return names;
}

/**
 * Immediate subdirectories of `ddlRoot`, each treated as a table folder, sorted by name.
 */
export async function listTableFolders(ddlRoot: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(ddlRoot, { withFileTypes: true });
  } catch (e: unknown) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      throw new ConfigError(`DDL root directory ${ddlRoot} not found`);
    }
    throw e;
  }
  return (await namesOfKind(ddlRoot, entries, 'directory')).sort(byName);
}

/**
 * Yields the `<prefix>.*.sql` files of every table folder in (folder, file name) order.
 * Each call starts a fresh walk of the directory tree. Files that are empty after trimming are skipped.
 */
export async function* discoverDdlFiles(ddlRoot: string, prefix: string): AsyncGenerator<DdlFile> {
  const folders = await listTableFolders(ddlRoot);
  for (const folder of folders) {
    const folderPath = path.join(ddlRoot, folder);
    const entries = await fs.readdir(folderPath, { withFileTypes: true });
    const matching = entries.filter(entry => parseDdlFileName(entry.name)?.prefix === prefix);
    const fileNames = (await namesOfKind(folderPath, matching, 'file')).sort(byName);

    for (const fileName of fileNames) {
      const filePath = path.join(folderPath, fileName);
      const sql = (await fs.readFile(filePath, 'utf-8')).trim();
      if (!sql) {
        continue;
      }
      yield { path: filePath, fileName, folder, prefix, sql };
    }
  }
}

export async function collectDdlFiles(ddlRoot: string, prefix: string): Promise<DdlFile[]> {
  const files: DdlFile[] = [];
  for await (const file of discoverDdlFiles(ddlRoot, prefix)) {
    files.push(file);
  }
  return files;
}
