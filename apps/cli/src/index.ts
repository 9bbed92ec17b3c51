#!/usr/bin/env node
/**
 * paperhub entry point. See ./cli.ts for the commands.
 * Usage: tsx apps/cli/src/index.ts search "graph neural networks" --max=5
 */

import { runCli } from './cli';
import { getConfig } from './services/config';
import { createArxivClient } from './services/paper-search/arxiv-client';
import { createSemanticScholarClient } from './services/paper-search/semantic-scholar-client';

async function main(): Promise<number> {
  const config = getConfig();
  return runCli(process.argv.slice(2), {
    arxiv: createArxivClient(config),
    semanticScholar: createSemanticScholarClient(config),
    downloadsDir: config.downloads.dir,
    write: (text) => console.log(text),
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('paperhub failed:', error);
    process.exit(1);
  });
