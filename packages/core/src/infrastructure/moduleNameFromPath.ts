import { basename } from 'node:path';

/** Derive the module (table) name from an export path: `exports/ecatalogue.export.gz` → `ecatalogue`. */
export function moduleNameFromPath(filePath: string): string {
  const name = basename(filePath);
  const dot = name.indexOf('.');
  return dot === -1 ? name : name.slice(0, dot);
}
