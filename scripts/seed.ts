#!/usr/bin/env tsx
// scripts/seed.ts
// Apply pending migrations, then load fixtures into the database.
//
// Usage:
//   npm run seed -- demo-data.yml sequence-data.yml
//
// All named fixtures load in one transaction: if any of them cannot be
// found, parsed or built, nothing is written.

import { config } from "../src/config.js";
import { createAdapter, withAdapter } from "../src/db/index.js";
import { loadFixtures } from "../src/fixtures/index.js";
import { AsyncMigrationRunner } from "../src/migrations/runner.js";
import { getModuleRegistry } from "../src/modules/registry.js";

const db = createAdapter();

async function main(): Promise<void> {
  const names = process.argv.slice(2);
  if (names.length === 0) {
    console.error("Usage: npm run seed -- <fixture.yml> [more.yml ...]");
    process.exitCode = 1;
    return;
  }

  const migrations = await new AsyncMigrationRunner(db, config.migrations.dir).runAll();
  if (migrations.skipped.length > 0) {
    console.error(`Migration failed: ${migrations.skipped.join(", ")}`);
    process.exitCode = 1;
    return;
  }

  console.log("\nModules:");
  for (const module of getModuleRegistry().enabledModules) {
    process.stdout.write(`  ${module.pprint(2)}`);
  }

  const reports = await loadFixtures(db, names);

  console.log("\nFixtures:");
  console.log("─".repeat(60));
  for (const r of reports) {
    console.log(`  ${r.fixture}`);
    console.log(`    Constructed: ${r.constructed}, Managed: ${r.managed}, Failed: ${r.failures.length}`);
    for (const f of r.failures) {
      console.log(`      ✗ ${f.message}`);
    }
  }
}

withAdapter(db, main)
  .catch((err: unknown) => {
    console.error("Seeding failed:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
