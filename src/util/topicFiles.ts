import { readdirSync, statSync } from 'node:fs';
import { basename, extname, join } from 'node:path';

const NUMBERED_TOPIC = /^[1-8]_.*\.txt$/;

function listFiles(dir: string, accept: (name: string) => boolean): string[] {
  return readdirSync(dir)
    .filter(accept)
    .sort()
    .map(name => join(dir, name))
    .filter(file => statSync(file).isFile());
}

/** Every `.txt` file in the data directory, sorted by name. */
export function listTopicFiles(dataDir: string): string[] {
  return listFiles(dataDir, name => name.endsWith('.txt'));
}

/** The numbered source files (`1_...txt` to `8_...txt`), leaving generated test files out. */
export function listSourceTopicFiles(dataDir: string): string[] {
  return listFiles(dataDir, name => NUMBERED_TOPIC.test(name) && !name.toLowerCase().includes('test'));
}

/** `data/1_energy.txt` -> `1_energy_1718000000.csv` */
export function outputFileName(inputPath: string, at: Date = new Date()): string {
  const stem = basename(inputPath, extname(inputPath));
  return `${stem}_${Math.floor(at.getTime() / 1000)}.csv`;
}
