import { access, mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import { dirname } from 'node:path';

export async function ensureDir(path: string) {
  await mkdir(path, { recursive: true });
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  const info = await stat(path);
  return info.isDirectory();
}

// Invalid UTF-8 sequences decode to U+FFFD instead of throwing.
export async function readTextLenient(file: string): Promise<string> {
  const buf = await readFile(file);
  return new TextDecoder('utf-8', { fatal: false }).decode(buf);
}

export async function writeJson(file: string, data: unknown) {
  await ensureDir(dirname(file));
  await writeFile(file, JSON.stringify(data, null, 2), 'utf8');
}
