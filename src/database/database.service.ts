import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import type { AppConfig } from '../config/app.config';

export type Db = Database.Database;

export const SQL_DIR = join(__dirname, '..', '..', 'sql');

/**
 * Buka koneksi SQLite dan jalankan file schema.
 * Dipakai oleh database operasional dan database audit.
 */
export function openDatabase(path: string, schemaFile: string): Db {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
  db.exec(readFileSync(join(SQL_DIR, schemaFile), 'utf8'));
  return db;
}

/**
 * DatabaseService
 *
 * Satu koneksi better-sqlite3 ke database operasional
 * (users, products, stok, orders, wallet journal).
 *
 * better-sqlite3 mengeksekusi transaksi secara sinkron, jadi di dalam
 * `transaction()` tidak ada statement lain yang bisa menyelip. Semua
 * transisi status ditulis sebagai compare-and-set di dalam transaksi ini.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private db: Db | null = null;

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    void this.connection;
  }

  onModuleDestroy() {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.logger.log('Operational database closed');
    }
  }

  get connection(): Db {
    if (!this.db) {
      const { database } = this.configService.getOrThrow<AppConfig>('app');
      this.db = openDatabase(database.path, 'schema.sql');
      this.logger.log(`Operational database ready at ${database.path}`);
    }
    return this.db;
  }

  /**
   * Jalankan `fn` di dalam transaksi BEGIN IMMEDIATE.
   * Kalau dipanggil dari dalam transaksi lain, better-sqlite3 otomatis
   * memakai SAVEPOINT. Exception apapun akan me-rollback seluruh isi `fn`.
   */
  transaction<T>(fn: (tx: Db) => T): T {
    const db = this.connection;
    return db.transaction(() => fn(db)).immediate();
  }
}
