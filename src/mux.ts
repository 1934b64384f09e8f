#!/usr/bin/env node
import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { errorMessage } from './errors';
import { logger } from './logger';
import { multiplexDirectory } from './multiplexer';
import { INDEX_FILE } from './segmentTree';

export type MuxRootReport = {
  multiplexed: string[];
  failed: { identity: string; reason: string }[];
};

// <inputRoot> is either one identity directory or a folder of them
export async function multiplexRoot(inputRoot: string, outputRoot: string): Promise<MuxRootReport> {
  const report: MuxRootReport = { multiplexed: [], failed: [] };

  let inputs: string[];
  if (await fs.stat(path.join(inputRoot, INDEX_FILE)).then(() => true, () => false)) {
    inputs = [inputRoot];
  } else {
    const entries = await fs.readdir(inputRoot, { withFileTypes: true });
    inputs = entries
      .filter((e) => e.isDirectory() && !e.name.includes('.staging-'))
      .map((e) => path.join(inputRoot, e.name))
      .sort();
  }

  for (const input of inputs) {
    const identity = path.basename(input);
    try {
      await multiplexDirectory(input, path.join(outputRoot, identity));
      report.multiplexed.push(identity);
    } catch (err) {
      logger.error({ identity, reason: errorMessage(err) }, 'Multiplexing failed');
      report.failed.push({ identity, reason: errorMessage(err) });
    }
  }
  return report;
}

async function main(): Promise<number> {
  const [inputRoot, outputRoot] = process.argv.slice(2);
  if (!inputRoot || !outputRoot) {
    logger.error('usage: v3c-mux <inputRoot> <outputRoot>');
    return 1;
  }
  const report = await multiplexRoot(inputRoot, outputRoot);
  logger.info({ multiplexed: report.multiplexed.length, failed: report.failed.length }, 'Multiplexing finished');
  return report.failed.length > 0 ? 2 : 0;
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (err) => {
      logger.fatal({ err }, 'Multiplexing aborted');
      process.exit(1);
    },
  );
}
