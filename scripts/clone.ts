#!/usr/bin/env node
/**
 * clone.ts - Clones a metadata object inside a configuration dump and
 * registers the copy in Configuration.xml and ConfigDumpInfo.xml.
 *
 * Re-running with the same names replaces the previous clone.
 *
 * Usage: npx tsx scripts/clone.ts <Type> <DonorName> <CloneName> [--root=<dir>]
 * Names missing from the command line are taken from config/config.*.json.
 */

import { loadConfig, requestFromConfig } from '../src/config.js';
import { describeError } from '../src/errors.js';
import { createConsoleLogger } from '../src/logger.js';
import { runClone } from '../src/runner.js';
import { CloneRequest } from '../src/types.js';

const USAGE = 'Usage: npx tsx scripts/clone.ts <Type> <DonorName> <CloneName> [--root=<dir>]';

function main() {
  const logger = createConsoleLogger();
  const args = process.argv.slice(2);
  const rootArg = args.find(a => a.startsWith('--root='));
  const positional = args.filter(a => !a.startsWith('--'));

  if (positional.length !== 0 && positional.length !== 3) {
    console.error(USAGE);
    process.exit(1);
  }

  try {
    const config = loadConfig({ logger });
    if (rootArg) {
      config.repositoryRoot = rootArg.slice('--root='.length);
    }

    let request: CloneRequest | null;
    if (positional.length === 3) {
      const [type, donorName, cloneName] = positional;
      request = { type, donorName, cloneName };
    } else {
      request = requestFromConfig(config);
    }
    if (!request) {
      console.error(USAGE);
      process.exit(1);
    }

    const report = runClone(request, config, { logger });

    console.log(`\nCloned ${report.donor} -> ${report.clone}`);
    console.log(`Definition: ${report.cloneFile}`);
    console.log(`Identifiers regenerated: ${report.regeneratedIdentifiers}`);
    for (const { index, outcome } of report.insertions) {
      const where = outcome.position === 'after' ? `after ${outcome.anchor}` : 'at the end';
      console.log(`Registered in ${index} index ${where}`);
    }
  } catch (err) {
    logger.error(describeError(err));
    process.exit(1);
  }
}

main();
