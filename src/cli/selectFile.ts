import { mkdirSync } from 'node:fs';
import { basename, join } from 'node:path';
import { createInterface, type Interface } from 'node:readline/promises';
import { loadConfig, type AppConfig } from '../config';
import { listTopicFiles, outputFileName } from '../util/topicFiles';
import { exitOnInterrupt } from './interrupt';
import { runBatchCommand } from './runBatch';

export function formatMenu(files: readonly string[]): string {
  const lines = ['TOPIC FILE SELECTOR', '', 'Available topic files:', ''];
  files.forEach((file, i) => lines.push(`  [${i + 1}] ${basename(file)}`));
  lines.push('', '  [0] Exit', '');
  return lines.join('\n');
}

/** Parses a menu answer; null when it is not a number within 0..max. */
export function parseChoice(answer: string, max: number): number | null {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const choice = parseInt(trimmed, 10);
  return choice <= max ? choice : null;
}

/**
 * Asks until the answer is a valid menu number. In a terminal readline takes
 * Ctrl-C itself, so the interrupt handler is attached to the interface.
 */
export async function promptChoice(rl: Interface, max: number, onInterrupt: () => void = exitOnInterrupt): Promise<number> {
  rl.on('SIGINT', onInterrupt);
  for (;;) {
    const choice = parseChoice(await rl.question(`Select a file (0-${max}): `), max);
    if (choice !== null) return choice;
    console.log(`Please enter a number between 0 and ${max}`);
  }
}

/**
 * Interactive flavour of `run`: pick a file from the data directory, write
 * to a timestamped CSV in the output directory.
 */
export async function selectAndRun(config: AppConfig = loadConfig()): Promise<void> {
  const files = listTopicFiles(config.DATA_DIR);
  if (files.length === 0) {
    throw new Error(`No topic files found in ${config.DATA_DIR}/`);
  }

  console.log(formatMenu(files));

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const choice = await promptChoice(rl, files.length).finally(() => rl.close());

  if (choice === 0) {
    console.log('Exiting...');
    return;
  }

  const inputPath = files[choice - 1];
  mkdirSync(config.OUTPUT_DIR, { recursive: true });
  const outputPath = join(config.OUTPUT_DIR, outputFileName(inputPath));

  await runBatchCommand(inputPath, outputPath, config);
}
