import type { INestApplication } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { Test } from '@nestjs/testing';
import type { TestingModule } from '@nestjs/testing';
import { ZodValidationPipe } from 'nestjs-zod';
import { z } from 'zod';
import { buildAppConfig } from '../config/app.config';
import { DatabaseModule } from '../database/database.module';
import { DatabaseService } from '../database/database.service';
import type { Db } from '../database/database.service';
import { AuditModule } from '../audit/audit.module';
import { AuditService } from '../audit/audit.service';
import { NotificationsModule } from '../notifications/notifications.module';
import { CHAT_GATEWAY } from '../notifications/chat-gateway';
import type { ChatGateway } from '../notifications/chat-gateway';
import { InventoryModule } from '../inventory/inventory.module';
import { InventoryService } from '../inventory/inventory.service';
import { WalletModule } from '../wallet/wallet.module';
import { WalletService } from '../wallet/wallet.service';
import { OrdersModule } from '../orders/orders.module';
import { OrdersService } from '../orders/orders.service';
import { CheckoutService } from '../orders/checkout.service';
import { OrderExpiryJob } from '../orders/order-expiry.job';
import { PaymentsModule } from '../payments/payments.module';
import { PaymentsService } from '../payments/payments.service';
import { WebhookService } from '../payments/webhook.service';
import { AdminModule } from '../admin/admin.module';
import { AdminAuthorizer } from '../admin/admin-capability';
import { AdminService } from '../admin/admin.service';
import { ApiKeyGuard } from '../common/guards/api-key.guard';

export const TEST_ENV: Record<string, string> = {
  NODE_ENV: 'test',
  DATABASE_PATH: ':memory:',
  AUDIT_DATABASE_PATH: ':memory:',
  INTERNAL_API_KEY: 'test-internal-api-key',
  ADMIN_USER_IDS: '9000',
  PAKASIR_BASE_URL: 'https://gateway.test',
  PAKASIR_API_KEY: 'test-api-key',
  PAKASIR_PROJECT_SLUG: 'test-store',
  PAKASIR_PAYMENT_DOMAIN: 'https://pay.test',
};

export const ADMIN_ID = 9000;

/** ChatGateway palsu yang menyimpan semua pesan terkirim */
export class RecordingChatGateway implements ChatGateway {
  readonly messages: Array<{ userId: number; text: string }> = [];
  readonly unreachable = new Set<number>();

  async sendMessage(userId: number, text: string): Promise<void> {
    if (this.unreachable.has(userId)) {
      throw new Error(`user ${userId} blocked the bot`);
    }
    this.messages.push({ userId, text });
  }

  messagesFor(userId: number): string[] {
    return this.messages.filter((m) => m.userId === userId).map((m) => m.text);
  }
}

export interface TestApp {
  moduleRef: TestingModule;
  /** Hanya ada kalau dibuat dengan `{ http: true }` */
  http: INestApplication | null;
  db: Db;
  chat: RecordingChatGateway;
  audit: AuditService;
  inventory: InventoryService;
  wallet: WalletService;
  orders: OrdersService;
  checkout: CheckoutService;
  expiryJob: OrderExpiryJob;
  payments: PaymentsService;
  webhooks: WebhookService;
  admin: AdminService;
  authorizer: AdminAuthorizer;
  close(): Promise<void>;
}

export interface TestAppOptions {
  /** Jalankan aplikasi HTTP lengkap (prefix, pipe, raw body) untuk test controller */
  http?: boolean;
}

export async function createTestApp(
  env: Record<string, string> = {},
  options: TestAppOptions = {},
): Promise<TestApp> {
  const chat = new RecordingChatGateway();
  const config = buildAppConfig({ ...TEST_ENV, ...env });

  const moduleRef = await Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, load: [() => ({ app: config })] }),
      EventEmitterModule.forRoot(),
      DatabaseModule,
      AuditModule,
      NotificationsModule,
      InventoryModule,
      WalletModule,
      OrdersModule,
      PaymentsModule,
      AdminModule,
    ],
    providers: [{ provide: APP_GUARD, useClass: ApiKeyGuard }],
  })
    .overrideProvider(CHAT_GATEWAY)
    .useValue(chat)
    .compile();

  let http: INestApplication | null = null;
  if (options.http) {
    http = moduleRef.createNestApplication({ rawBody: true, logger: false });
    http.setGlobalPrefix('api');
    http.useGlobalPipes(new ZodValidationPipe());
    await http.init();
  } else {
    moduleRef.useLogger(false);
    await moduleRef.init();
  }

  const expiryJob = moduleRef.get(OrderExpiryJob);
  // Sweep dipanggil manual di test
  expiryJob.stop();

  return {
    moduleRef,
    http,
    db: moduleRef.get(DatabaseService).connection,
    chat,
    audit: moduleRef.get(AuditService),
    inventory: moduleRef.get(InventoryService),
    wallet: moduleRef.get(WalletService),
    orders: moduleRef.get(OrdersService),
    checkout: moduleRef.get(CheckoutService),
    expiryJob,
    payments: moduleRef.get(PaymentsService),
    webhooks: moduleRef.get(WebhookService),
    admin: moduleRef.get(AdminService),
    authorizer: moduleRef.get(AdminAuthorizer),
    close: () => (http ? http.close() : moduleRef.close()),
  };
}

export function seedUser(
  db: Db,
  user: { id: number; memberStatus?: 'customer' | 'reseller' | 'admin'; balance?: number; banned?: boolean },
) {
  const now = new Date().toISOString();
  db.prepare(
    `INSERT INTO users (id, name, member_status, account_balance, is_banned, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    user.id,
    `User ${user.id}`,
    user.memberStatus ?? 'customer',
    user.balance ?? 0,
    user.banned ? 1 : 0,
    now,
    now,
  );
}

export function seedProduct(
  db: Db,
  product: { id: number; name?: string; customerPrice: number; resellerPrice?: number | null; active?: boolean },
) {
  const now = new Date().toISOString();
  db.prepare(
    `INSERT INTO products (id, name, category, customer_price, reseller_price, sold_count, is_active, created_at, updated_at)
     VALUES (?, ?, 'Software', ?, ?, 0, ?, ?, ?)`,
  ).run(
    product.id,
    product.name ?? `Product ${product.id}`,
    product.customerPrice,
    product.resellerPrice ?? null,
    product.active === false ? 0 : 1,
    now,
    now,
  );
}

/** Produk dengan `units` unit stok bernama KEY-1..KEY-n */
export function seedStockedProduct(
  app: Pick<TestApp, 'db' | 'inventory'>,
  product: { id: number; name?: string; customerPrice: number; resellerPrice?: number | null },
  units: number,
): string[] {
  seedProduct(app.db, product);
  return app.inventory.restock(
    product.id,
    Array.from({ length: units }, (_, i) => `KEY-${product.id}-${i + 1}`),
  );
}

/** Order pending kosong langsung di tabel, tanpa item dan tanpa lewat OrdersService */
export function insertBareOrder(db: Db, userId: number, invoiceId: string): number {
  const now = new Date().toISOString();
  const result = db
    .prepare(
      `INSERT INTO orders (invoice_id, user_id, subtotal, discount, payment_fee, total_bill, payment_method, status, created_at, updated_at)
       VALUES (?, ?, 0, 0, 0, 0, 'gateway', 'pending', ?, ?)`,
    )
    .run(invoiceId, userId, now, now);
  return Number(result.lastInsertRowid);
}

export function orderStatus(db: Db, orderId: number): string | undefined {
  return db
    .prepare<[number], { status: string }>('SELECT status FROM orders WHERE id = ?')
    .get(orderId)?.status;
}

export function soldCount(db: Db, productId: number): number | undefined {
  return db
    .prepare<[number], { sold_count: number }>('SELECT sold_count FROM products WHERE id = ?')
    .get(productId)?.sold_count;
}

export function backdateOrder(db: Db, orderId: number, minutesAgo: number) {
  const createdAt = new Date(Date.now() - minutesAgo * 60 * 1000).toISOString();
  db.prepare('UPDATE orders SET created_at = ? WHERE id = ?').run(createdAt, orderId);
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const CreateRequestSchema = z.object({ order_id: z.string(), amount: z.number() });

export interface GatewayStub {
  healthy: boolean;
  create: (request: { order_id: string; amount: number }) => Response | Promise<Response>;
  detail: (url: URL) => Response | Promise<Response>;
  requests: string[];
}

/**
 * Ganti global fetch dengan gateway palsu.
 * Default: sehat, create mengembalikan QR, detail mengembalikan pending.
 */
export function stubGateway(overrides: Partial<Omit<GatewayStub, 'requests'>> = {}) {
  const stub: GatewayStub = {
    healthy: true,
    create: (request) =>
      jsonResponse({
        payment: {
          project: TEST_ENV.PAKASIR_PROJECT_SLUG,
          order_id: request.order_id,
          amount: request.amount,
          fee: 0,
          total_payment: request.amount,
          payment_method: 'qris',
          payment_number: `QRIS-${request.order_id}`,
          expired_at: '2030-01-01T00:10:00.000Z',
        },
      }),
    detail: () => jsonResponse({ transaction: { status: 'pending', completed_at: null } }),
    requests: [],
    ...overrides,
  };

  const spy = jest.spyOn(global, 'fetch').mockImplementation(async (input, init) => {
    const url = new URL(String(input));
    stub.requests.push(`${init?.method ?? 'GET'} ${url.pathname}`);

    if (url.pathname === '/' && url.origin === TEST_ENV.PAKASIR_BASE_URL) {
      if (!stub.healthy) throw new TypeError('fetch failed');
      return new Response('ok', { status: 200 });
    }
    if (url.pathname === '/api/transactioncreate/qris') {
      return stub.create(CreateRequestSchema.parse(JSON.parse(String(init?.body))));
    }
    if (url.pathname === '/api/transactiondetail') {
      return stub.detail(url);
    }
    throw new Error(`Unexpected request to ${url.toString()}`);
  });

  return { stub, spy };
}
