import fs from 'fs-extra';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Database from 'better-sqlite3';
import { PersistenceError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';

export type StoryDatabase = Database.Database;

const SCHEMA_CANDIDATES = [
  // beside this module (sources, or a build that copied it)
  new URL('./schema.sql', import.meta.url),
  // dist/persistence -> src/persistence
  new URL('../../src/persistence/schema.sql', import.meta.url),
];

function loadSchema(): string {
  for (const candidate of SCHEMA_CANDIDATES) {
    const filePath = fileURLToPath(candidate);
    if (fs.pathExistsSync(filePath)) {
      return fs.readFileSync(filePath, 'utf8');
    }
  }
  throw new PersistenceError('schema.sql not found', 'loadSchema', {
    candidates: SCHEMA_CANDIDATES.map((candidate) => candidate.href),
  });
}

export function openDatabase(dbPath: string): StoryDatabase {
  try {
    if (dbPath !== ':memory:') {
      fs.ensureDirSync(path.dirname(dbPath));
    }
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    db.exec(loadSchema());
    logger.debug('Story database ready', { dbPath });
    return db;
  } catch (error) {
    if (error instanceof PersistenceError) throw error;
    throw new PersistenceError('Could not open the story database', 'open', { dbPath }, error);
  }
}
