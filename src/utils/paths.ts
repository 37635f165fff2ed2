import * as os from 'node:os';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';

/** Expand a leading `~/` (or a bare `~`) to the home directory. */
export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === '~') return home;
  if (p.startsWith('~/')) return path.join(home, p.slice(2));
  return p;
}

export function resolvePath(p: string, base: string = process.cwd()): string {
  return path.resolve(base, expandHome(p));
}

export function toFileUri(filePath: string): string {
  return pathToFileURL(filePath).href;
}
