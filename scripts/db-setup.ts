#!/usr/bin/env tsx
/**
 * scripts/db-setup.ts
 *
 * Creates the progress table from sql/schema.sql.
 *
 * Usage:
 *   npm run db:setup              ← create if missing
 *   npm run db:setup -- --reset   ← drop all stored progress first (asks for confirmation)
 *   npm run db:setup -- --reset --yes
 */
import fs from 'fs';
import path from 'path';
import readline from 'readline';
import { closePool, executeRawQuery } from '../src/lib/db';
import { verifyDatabaseSchema } from '../src/startup/verifySchema';

function confirm(question: string): Promise<boolean> {
    return new Promise((resolve) => {
        const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
        rl.question(question, (answer) => {
            rl.close();
            resolve(answer.trim().toLowerCase() === 'y');
        });
    });
}

async function main() {
    const reset = process.argv.includes('--reset');
    const skipConfirm = process.argv.includes('--yes');

    if (reset) {
        console.log('\nThis will permanently delete ALL stored progress.\n');
        if (!skipConfirm && !(await confirm('Are you sure? Type "y" to continue: '))) {
            console.log('Aborted.\n');
            return;
        }
        await executeRawQuery('DROP TABLE IF EXISTS progress_kv CASCADE');
        console.log('   ✓ progress_kv dropped');
    }

    const schemaPath = path.resolve(process.cwd(), 'sql/schema.sql');
    // No bind parameters, so pg sends the file as one simple query
    await executeRawQuery(fs.readFileSync(schemaPath, 'utf-8'));
    await verifyDatabaseSchema();

    console.log('✅  Database ready');
}

main()
    .catch(err => {
        console.error('\n❌  Setup failed:', err);
        process.exitCode = 1;
    })
    .finally(() => closePool());
