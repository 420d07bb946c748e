#!/usr/bin/env tsx
/**
 * Seeds user profiles for local exploration. Runs migrations first, then
 * upserts one profile per role so each part of the workflow can be driven
 * through the API (dev mode: send the id as x-actor-id / actor.id).
 *
 * Usage:
 *   npm run seed
 *
 * Idempotent: running twice updates roles in place.
 */

import { fileURLToPath } from 'node:url';
import { createPool, runMigrations } from '@requisition/core';
import type { Role } from '@requisition/core';
import { loadConfig } from '@requisition/api';

const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';
const GREEN = '\x1b[32m';
const CYAN = '\x1b[36m';

function green(s: string): string { return `${GREEN}${s}${RESET}`; }

function section(title: string): void {
  console.log(`\n${BOLD}${CYAN}▸ ${title}${RESET}`);
}

const PROFILES: Array<{ user_id: string; role: Role; display_name: string }> = [
  { user_id: 'staff-ana', role: 'staff', display_name: 'Ana Staff' },
  { user_id: 'staff-ben', role: 'staff', display_name: 'Ben Staff' },
  { user_id: 'approver1-chen', role: 'approver_level_1', display_name: 'Chen Approver L1' },
  { user_id: 'approver2-dara', role: 'approver_level_2', display_name: 'Dara Approver L2' },
  { user_id: 'finance-eli', role: 'finance', display_name: 'Eli Finance' },
];

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.database);

  try {
    section('Migrations');
    await runMigrations(pool, fileURLToPath(new URL('../migrations', import.meta.url)));
    console.log(green('  schema up to date'));

    section('User profiles');
    for (const profile of PROFILES) {
      await pool.query(
        `INSERT INTO user_profiles (user_id, role, display_name)
         VALUES ($1, $2, $3)
         ON CONFLICT (user_id) DO UPDATE SET role = EXCLUDED.role, display_name = EXCLUDED.display_name`,
        [profile.user_id, profile.role, profile.display_name],
      );
      console.log(`  ${green('✓')} ${profile.user_id} ${profile.role}`);
    }
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error('Seed failed:', err);
  process.exit(1);
});
