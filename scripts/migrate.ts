#!/usr/bin/env tsx
// scripts/migrate.ts
// CLI for database migrations
//
// Usage:
//   npm run migrate              # Apply all pending migrations
//   npm run migrate -- status    # Show migration status
//   npm run migrate -- down      # Roll back the last applied migration

import { config } from "../src/config.js";
import { createAdapter, withAdapter } from "../src/db/index.js";
import { AsyncMigrationRunner } from "../src/migrations/runner.js";

/* ---------- Setup ---------- */
const db = createAdapter();
const runner = new AsyncMigrationRunner(db, config.migrations.dir);

/* ---------- CLI Commands ---------- */
async function showStatus(): Promise<void> {
  const statuses = await runner.getStatus();

  if (statuses.length === 0) {
    console.log("No migrations found.");
    return;
  }

  console.log("\nMigration Status:");
  console.log("─".repeat(60));

  for (const s of statuses) {
    const status = s.applied ? "✓ Applied" : "○ Pending";
    console.log(`  ${s.version}_${s.name}`);
    console.log(`    Status: ${status}`);
    if (s.appliedAt !== null) {
      console.log(`    Applied: ${new Date(s.appliedAt).toISOString()}`);
    }
    console.log();
  }

  const pending = statuses.filter(s => !s.applied).length;
  console.log(`Total: ${statuses.length} migrations, ${pending} pending`);
}

async function runAll(): Promise<void> {
  const result = await runner.runAll();

  if (result.applied.length === 0 && result.skipped.length === 0) {
    console.log("No pending migrations.");
    return;
  }

  for (const name of result.applied) {
    console.log(`  ✓ Applied: ${name}`);
  }
  for (const name of result.skipped) {
    console.log(`  ✗ Skipped: ${name}`);
  }

  console.log(`\nApplied: ${result.applied.length}, Skipped: ${result.skipped.length}`);
  if (result.skipped.length > 0) process.exitCode = 1;
}

async function rollbackLast(): Promise<void> {
  const rolled = await runner.rollbackLast();
  if (rolled) {
    console.log(`✓ Rolled back: ${rolled}`);
  } else {
    console.log("No migrations to rollback.");
  }
}

/* ---------- Main ---------- */
async function main(): Promise<void> {
  const command = process.argv[2] || "run";

  switch (command) {
    case "run":
    case "up":
      await runAll();
      break;

    case "status":
      await showStatus();
      break;

    case "down":
    case "rollback":
      await rollbackLast();
      break;

    case "help":
    case "--help":
    case "-h":
      console.log(`
Database Migration CLI

Usage:
  npm run migrate              Apply all pending migrations
  npm run migrate -- status    Show migration status
  npm run migrate -- down      Roll back the last applied migration
`);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.log("Run 'npm run migrate -- help' for usage.");
      process.exitCode = 1;
  }
}

withAdapter(db, main)
  .catch((err: unknown) => {
    console.error("Migration failed:", err);
    process.exitCode = 1;
  });
