import { readdirSync } from 'fs';
import { join } from 'path';

/** CSV files directly inside `dir`, sorted by name so runs are reproducible. */
export function discoverSources(dir: string): string[] {
  return readdirSync(dir)
    .filter(f => f.toLowerCase().endsWith('.csv'))
    .sort()
    .map(f => join(dir, f));
}
