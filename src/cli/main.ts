#!/usr/bin/env node

import * as fs from 'fs';
import { loadConfig } from './config.js';
import { flushLogging } from '../lib/logger.js';
import { createEngine } from './engine-factory.js';
import { runCli } from './index.js';
import { confirm } from './prompt.js';

function packageVersion(): string {
  const pkgUrl = new URL('../../package.json', import.meta.url);
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgUrl, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

async function main(): Promise<void> {
  const code = await runCli(process.argv.slice(2), {
    version: packageVersion(),
    out: line => console.log(line),
    err: line => console.error(line),
    progress: chunk => {
      process.stdout.write(chunk);
    },
    confirm,
    loadConfig,
    loadEngine: createEngine,
  });
  await flushLogging();
  process.exit(code);
}

main().catch((err) => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
