import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import path from 'node:path';
import { DependencyError } from './errors.js';

export type ExecutableLookup = (name: string) => Promise<string | null>;

const INSTALL_HINTS: Record<string, string> = {
  ffmpeg: 'ffmpeg: install via your package manager (apt install ffmpeg, brew install ffmpeg)',
  mediamtx: 'mediamtx: download a release from https://github.com/bluenviron/mediamtx/releases',
  openssl: 'openssl: install via your package manager (apt install openssl, brew install openssl)',
};

/** Absolute path of `name` in the first PATH entry that has it executable. */
export async function findExecutable(
  name: string,
  searchPath: string = process.env.PATH ?? '',
): Promise<string | null> {
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    try {
      await access(candidate, constants.X_OK);
      return candidate;
    } catch {
      // Not in this entry.
    }
  }
  return null;
}

export async function requireExecutables(
  names: string[],
  lookup: ExecutableLookup = (name) => findExecutable(name),
): Promise<void> {
  const found = await Promise.all(names.map(lookup));
  const missing = names.filter((_name, index) => found[index] === null);
  if (missing.length > 0) {
    throw new DependencyError(
      missing,
      missing.map((name) => `  - ${INSTALL_HINTS[name] ?? name}`),
    );
  }
}
