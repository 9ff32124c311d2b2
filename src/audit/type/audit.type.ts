export type AuditActorType = 'user' | 'admin' | 'system' | 'gateway';

export const GENESIS_HASH = '0'.repeat(64);

export interface AuditEntryInput {
  actorId: number | null;
  actorType: AuditActorType;
  entityType: string;
  entityId: string;
  action: string;
  beforeState?: unknown;
  afterState?: unknown;
  context?: unknown;
  ipAddress?: string | null;
}

export interface AuditEntry {
  id: number;
  timestamp: Date;
  actorId: number | null;
  actorType: AuditActorType;
  entityType: string;
  entityId: string;
  action: string;
  beforeState: unknown;
  afterState: unknown;
  context: unknown;
  ipAddress: string | null;
  hash: string;
}

export interface PaymentAuditInput {
  invoiceId: string;
  userId: number;
  amount: number;
  paymentMethod: string;
  status: string;
  gatewayResponse?: unknown;
  metadata?: unknown;
}

export interface PaymentAuditEntry {
  id: number;
  timestamp: Date;
  invoiceId: string;
  userId: number;
  amount: number;
  paymentMethod: string;
  status: string;
  gatewayResponse: unknown;
  metadata: unknown;
  hash: string;
}

export interface AuditSearchFilter {
  from?: Date;
  to?: Date;
  actorId?: number;
  entityType?: string;
  action?: string;
  limit?: number;
}

export interface ChainVerification {
  valid: boolean;
  checked: number;
  brokenAt: { table: 'audit_logs' | 'payment_audit_logs'; id: number } | null;
}

export interface AuditLogRow {
  id: number;
  timestamp: string;
  actor_id: number | null;
  actor_type: AuditActorType;
  entity_type: string;
  entity_id: string;
  action: string;
  before_state: string | null;
  after_state: string | null;
  context: string | null;
  ip_address: string | null;
  prev_hash: string;
  hash: string;
}

export interface PaymentAuditRow {
  id: number;
  timestamp: string;
  order_id: string;
  user_id: number;
  amount: string;
  payment_method: string;
  status: string;
  gateway_response: string | null;
  payment_metadata: string | null;
  prev_hash: string;
  hash: string;
}
