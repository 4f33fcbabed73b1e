#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import fs from 'node:fs';
import {
  configToYaml,
  getDefaultConfigPath,
  loadConfig,
  writeDefaultConfig,
} from '../shared/config.js';
import { resolvePath } from '../shared/utils.js';
import { openDb, closeDb, type Db } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { assignMissingPositions } from '../store/positions.js';
import { startServer } from '../api/server.js';

const program = new Command();

program
  .name('lowdown')
  .description('Content backend for The Lowdown newsletter')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create the config file and database, then apply migrations')
  .action(async () => {
    const configPath = getDefaultConfigPath();
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    await withDb((db, dbPath) => {
      const { applied } = runMigrations(db);
      if (applied.length > 0) {
        log(`✓ ${dbPath} ready (${applied.length} migrations applied)`);
      } else {
        log(`✓ ${dbPath} already up to date`);
      }
    });
  });

// === serve ===
program
  .command('serve')
  .description('Start the HTTP API')
  .option('-p, --port <port>', 'port to listen on', parsePort)
  .action(async (opts: { port?: number }) => {
    await startServer({ port: opts.port });
  });

// === positions ===
program
  .command('positions')
  .description('Number articles and snapshots that have no position, oldest first')
  .action(async () => {
    await withDb((db) => {
      runMigrations(db);
      const articles = assignMissingPositions(db, 'articles');
      const snapshots = assignMissingPositions(db, 'snapshots');
      log(`✓ ${articles} articles and ${snapshots} snapshots numbered`);
    });
  });

// === config ===
program
  .command('config')
  .description('Print the effective configuration as YAML')
  .action(async () => {
    const config = await loadConfig();
    log(configToYaml(config).trimEnd());
  });

async function withDb(fn: (db: Db, dbPath: string) => void): Promise<void> {
  const config = await loadConfig();
  const dbPath = resolvePath(config.db.path);
  const db = openDb(dbPath);
  try {
    fn(db, dbPath);
  } finally {
    closeDb(db);
  }
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError(`Invalid port: ${value}`);
  }
  return port;
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`✗ ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
