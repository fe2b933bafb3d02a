#!/usr/bin/env node

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { getSupabaseClient } from '../database/client.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Split a SQL script into statements on top-level semicolons.
 * Dollar-quoted bodies, quoted strings and line comments are kept intact.
 */
export function splitSqlStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let dollarTag: string | null = null;
  let inString = false;
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];

    if (dollarTag !== null) {
      if (sql.startsWith(dollarTag, i)) {
        current += dollarTag;
        i += dollarTag.length;
        dollarTag = null;
      } else {
        current += ch;
        i++;
      }
      continue;
    }

    if (inString) {
      current += ch;
      if (ch === "'") inString = false;
      i++;
      continue;
    }

    if (ch === '-' && sql[i + 1] === '-') {
      const end = sql.indexOf('\n', i);
      i = end === -1 ? sql.length : end + 1;
      current += '\n';
      continue;
    }

    if (ch === "'") {
      inString = true;
      current += ch;
      i++;
      continue;
    }

    if (ch === '$') {
      const tag = /^\$[A-Za-z_]*\$/.exec(sql.slice(i));
      if (tag) {
        dollarTag = tag[0];
        current += dollarTag;
        i += dollarTag.length;
        continue;
      }
    }

    if (ch === ';') {
      const statement = current.trim();
      if (statement.length > 0) statements.push(statement);
      current = '';
      i++;
      continue;
    }

    current += ch;
    i++;
  }

  const tail = current.trim();
  if (tail.length > 0) statements.push(tail);
  return statements;
}

/**
 * Run database migrations
 */
async function runMigrations(): Promise<void> {
  logger.info('Running database migrations');
  const supabase = getSupabaseClient();

  const schemaPath = join(__dirname, '../../src/database/schema.sql');
  const statements = splitSqlStatements(readFileSync(schemaPath, 'utf-8'));

  logger.info(`Executing ${statements.length} SQL statements`);

  let failed = 0;
  for (let i = 0; i < statements.length; i++) {
    const statement = statements[i];
    const { error } = await supabase.rpc('exec_sql', { sql: statement });

    if (error) {
      failed++;
      logger.warn(`Statement ${i + 1} failed via RPC`, {
        error: error.message,
        statement: statement.substring(0, 100),
      });
    } else {
      logger.debug(`Statement ${i + 1} executed successfully`);
    }
  }

  logger.info('Database migrations completed', { failed });

  // Verify tables exist
  const { error: tablesError } = await supabase.from('vehicles').select('url').limit(1);

  if (tablesError) {
    logger.error('Table verification failed', { error: tablesError.message });
    logger.warn('You may need to run the SQL schema manually in Supabase SQL Editor');
    logger.info('Schema file location: src/database/schema.sql');
    throw new Error(`Table verification failed: ${tablesError.message}`);
  }

  logger.info('✅ Database tables verified successfully');
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  runMigrations()
    .then(() => {
      logger.info('Migrations completed successfully');
      process.exit(0);
    })
    .catch(error => {
      logger.error('Migrations failed', { error: errorMessage(error) });
      logger.info('\n📝 Manual Migration Instructions:');
      logger.info('1. Go to your Supabase project dashboard');
      logger.info('2. Navigate to SQL Editor');
      logger.info('3. Copy and paste the contents of src/database/schema.sql');
      logger.info('4. Execute the SQL');
      process.exit(1);
    });
}

export { runMigrations };
