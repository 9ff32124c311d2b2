import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'crypto';
import type { AppConfig } from '../config/app.config';
import { openDatabase } from '../database/database.service';
import type { Db } from '../database/database.service';
import { AuditWriteFailureException } from '../common/exceptions/domain.exceptions';
import { NotificationsService } from '../notifications/notifications.service';
import { GENESIS_HASH } from './type/audit.type';
import type {
  AuditEntry,
  AuditEntryInput,
  AuditLogRow,
  AuditSearchFilter,
  ChainVerification,
  PaymentAuditEntry,
  PaymentAuditInput,
  PaymentAuditRow,
} from './type/audit.type';

function toJson(value: unknown): string | null {
  return value === undefined || value === null ? null : JSON.stringify(value);
}

function fromJson(value: string | null): unknown {
  return value === null ? null : JSON.parse(value);
}

function chainHash(prevHash: string, fields: unknown[]): string {
  return createHash('sha256')
    .update(prevHash)
    .update(JSON.stringify(fields))
    .digest('hex');
}

function auditFields(row: Omit<AuditLogRow, 'id' | 'prev_hash' | 'hash'>): unknown[] {
  return [
    row.timestamp,
    row.actor_id,
    row.actor_type,
    row.entity_type,
    row.entity_id,
    row.action,
    row.before_state,
    row.after_state,
    row.context,
    row.ip_address,
  ];
}

function paymentFields(row: Omit<PaymentAuditRow, 'id' | 'prev_hash' | 'hash'>): unknown[] {
  return [
    row.timestamp,
    row.order_id,
    row.user_id,
    row.amount,
    row.payment_method,
    row.status,
    row.gateway_response,
    row.payment_metadata,
  ];
}

function toAuditEntry(row: AuditLogRow): AuditEntry {
  return {
    id: row.id,
    timestamp: new Date(row.timestamp),
    actorId: row.actor_id,
    actorType: row.actor_type,
    entityType: row.entity_type,
    entityId: row.entity_id,
    action: row.action,
    beforeState: fromJson(row.before_state),
    afterState: fromJson(row.after_state),
    context: fromJson(row.context),
    ipAddress: row.ip_address,
    hash: row.hash,
  };
}

function toPaymentAuditEntry(row: PaymentAuditRow): PaymentAuditEntry {
  return {
    id: row.id,
    timestamp: new Date(row.timestamp),
    invoiceId: row.order_id,
    userId: row.user_id,
    amount: Number(row.amount),
    paymentMethod: row.payment_method,
    status: row.status,
    gatewayResponse: fromJson(row.gateway_response),
    metadata: fromJson(row.payment_metadata),
    hash: row.hash,
  };
}

/**
 * AuditService
 *
 * Jejak audit append-only di database terpisah dari database operasional.
 * Setiap baris menyimpan hash baris sebelumnya, sehingga perubahan
 * di tengah rantai terdeteksi oleh `verifyChain()`.
 *
 * Kebijakan kegagalan tulis:
 * - entry biasa: dicatat di log + alert admin, operasi pemanggil tetap jalan
 * - entry regulated (pembayaran, saldo): alert admin + AuditWriteFailureException
 */
@Injectable()
export class AuditService implements OnModuleDestroy {
  private readonly logger = new Logger(AuditService.name);
  private db: Db | null = null;

  constructor(
    private configService: ConfigService,
    private notificationsService: NotificationsService,
  ) {}

  onModuleDestroy() {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  get connection(): Db {
    if (!this.db) {
      const { database } = this.configService.getOrThrow<AppConfig>('app');
      this.db = openDatabase(database.auditPath, 'audit-schema.sql');
      this.logger.log(`Audit database ready at ${database.auditPath}`);
    }
    return this.db;
  }

  async record(entry: AuditEntryInput, options: { regulated?: boolean } = {}): Promise<void> {
    try {
      this.appendAuditLog(entry);
    } catch (error) {
      await this.handleWriteFailure(entry.action, entry.entityId, error, options.regulated ?? false);
    }
  }

  /** Entry pembayaran selalu regulated */
  async recordPayment(entry: PaymentAuditInput): Promise<void> {
    try {
      this.appendPaymentLog(entry);
    } catch (error) {
      await this.handleWriteFailure(`payment_${entry.status}`, entry.invoiceId, error, true);
    }
  }

  findByActor(actorId: number, limit = 100): AuditEntry[] {
    return this.connection
      .prepare<[number, number], AuditLogRow>(
        'SELECT * FROM audit_logs WHERE actor_id = ? ORDER BY id DESC LIMIT ?',
      )
      .all(actorId, limit)
      .map(toAuditEntry);
  }

  /** Riwayat lengkap satu entity, urut kronologis */
  findByEntity(entityType: string, entityId: string): AuditEntry[] {
    return this.connection
      .prepare<[string, string], AuditLogRow>(
        'SELECT * FROM audit_logs WHERE entity_type = ? AND entity_id = ? ORDER BY id ASC',
      )
      .all(entityType, entityId)
      .map(toAuditEntry);
  }

  search(filter: AuditSearchFilter): AuditEntry[] {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (filter.from) {
      conditions.push('timestamp >= ?');
      params.push(filter.from.toISOString());
    }
    if (filter.to) {
      conditions.push('timestamp <= ?');
      params.push(filter.to.toISOString());
    }
    if (filter.actorId !== undefined) {
      conditions.push('actor_id = ?');
      params.push(filter.actorId);
    }
    if (filter.entityType) {
      conditions.push('entity_type = ?');
      params.push(filter.entityType);
    }
    if (filter.action) {
      conditions.push('action = ?');
      params.push(filter.action);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filter.limit ?? 100);

    return this.connection
      .prepare<Array<string | number>, AuditLogRow>(
        `SELECT * FROM audit_logs ${where} ORDER BY id DESC LIMIT ?`,
      )
      .all(...params)
      .map(toAuditEntry);
  }

  /** Dipakai untuk rate limiting dan deteksi penyalahgunaan */
  countActorActions(actorId: number, action: string, since: Date): number {
    const row = this.connection
      .prepare<[number, string, string], { count: number }>(
        'SELECT COUNT(*) AS count FROM audit_logs WHERE actor_id = ? AND action = ? AND timestamp >= ?',
      )
      .get(actorId, action, since.toISOString());
    return row?.count ?? 0;
  }

  paymentHistory(userId?: number, limit = 100): PaymentAuditEntry[] {
    if (userId === undefined) {
      return this.connection
        .prepare<[number], PaymentAuditRow>(
          'SELECT * FROM payment_audit_logs ORDER BY id DESC LIMIT ?',
        )
        .all(limit)
        .map(toPaymentAuditEntry);
    }
    return this.connection
      .prepare<[number, number], PaymentAuditRow>(
        'SELECT * FROM payment_audit_logs WHERE user_id = ? ORDER BY id DESC LIMIT ?',
      )
      .all(userId, limit)
      .map(toPaymentAuditEntry);
  }

  /**
   * Hitung ulang rantai hash kedua tabel dari awal.
   * Berhenti di baris pertama yang tidak cocok.
   */
  verifyChain(): ChainVerification {
    let checked = 0;

    let prev = GENESIS_HASH;
    const auditRows = this.connection
      .prepare<[], AuditLogRow>('SELECT * FROM audit_logs ORDER BY id ASC')
      .iterate();
    for (const row of auditRows) {
      checked++;
      if (row.prev_hash !== prev || chainHash(prev, auditFields(row)) !== row.hash) {
        return { valid: false, checked, brokenAt: { table: 'audit_logs', id: row.id } };
      }
      prev = row.hash;
    }

    prev = GENESIS_HASH;
    const paymentRows = this.connection
      .prepare<[], PaymentAuditRow>('SELECT * FROM payment_audit_logs ORDER BY id ASC')
      .iterate();
    for (const row of paymentRows) {
      checked++;
      if (row.prev_hash !== prev || chainHash(prev, paymentFields(row)) !== row.hash) {
        return { valid: false, checked, brokenAt: { table: 'payment_audit_logs', id: row.id } };
      }
      prev = row.hash;
    }

    return { valid: true, checked, brokenAt: null };
  }

  private appendAuditLog(entry: AuditEntryInput) {
    const db = this.connection;
    db.transaction(() => {
      const last = db
        .prepare<[], { hash: string }>('SELECT hash FROM audit_logs ORDER BY id DESC LIMIT 1')
        .get();
      const prevHash = last?.hash ?? GENESIS_HASH;

      const row = {
        timestamp: new Date().toISOString(),
        actor_id: entry.actorId,
        actor_type: entry.actorType,
        entity_type: entry.entityType,
        entity_id: entry.entityId,
        action: entry.action,
        before_state: toJson(entry.beforeState),
        after_state: toJson(entry.afterState),
        context: toJson(entry.context),
        ip_address: entry.ipAddress ?? null,
      };

      db.prepare(
        `INSERT INTO audit_logs
          (timestamp, actor_id, actor_type, entity_type, entity_id, action,
           before_state, after_state, context, ip_address, prev_hash, hash)
         VALUES
          (@timestamp, @actor_id, @actor_type, @entity_type, @entity_id, @action,
           @before_state, @after_state, @context, @ip_address, @prev_hash, @hash)`,
      ).run({ ...row, prev_hash: prevHash, hash: chainHash(prevHash, auditFields(row)) });
    }).immediate();
  }

  private appendPaymentLog(entry: PaymentAuditInput) {
    const db = this.connection;
    db.transaction(() => {
      const last = db
        .prepare<[], { hash: string }>(
          'SELECT hash FROM payment_audit_logs ORDER BY id DESC LIMIT 1',
        )
        .get();
      const prevHash = last?.hash ?? GENESIS_HASH;

      const row = {
        timestamp: new Date().toISOString(),
        order_id: entry.invoiceId,
        user_id: entry.userId,
        amount: String(entry.amount),
        payment_method: entry.paymentMethod,
        status: entry.status,
        gateway_response: toJson(entry.gatewayResponse),
        payment_metadata: toJson(entry.metadata),
      };

      db.prepare(
        `INSERT INTO payment_audit_logs
          (timestamp, order_id, user_id, amount, payment_method, status,
           gateway_response, payment_metadata, prev_hash, hash)
         VALUES
          (@timestamp, @order_id, @user_id, @amount, @payment_method, @status,
           @gateway_response, @payment_metadata, @prev_hash, @hash)`,
      ).run({ ...row, prev_hash: prevHash, hash: chainHash(prevHash, paymentFields(row)) });
    }).immediate();
  }

  private async handleWriteFailure(
    action: string,
    entityId: string,
    error: unknown,
    regulated: boolean,
  ) {
    const reason = error instanceof Error ? error.message : String(error);
    this.logger.error(
      `Failed to write audit entry ${action} for ${entityId}`,
      error instanceof Error ? error.stack : reason,
    );

    await this.notificationsService.notifyAdmins(
      regulated ? 'Regulated audit write failed' : 'Audit write failed',
      `Action: ${action}\nEntity: ${entityId}\nError: ${reason}`,
    );

    if (regulated) {
      throw new AuditWriteFailureException(action, entityId, { cause: error });
    }
  }
}
