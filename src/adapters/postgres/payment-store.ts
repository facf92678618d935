import type { Pool, PoolClient, QueryResult, QueryResultRow } from "pg";
import type {
  BalanceBucket,
  CancellationKind,
  LedgerSettings,
  PaymentRecord,
  PaymentStatus,
} from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type {
  AccountBucketBalance,
  BalanceChangeResult,
  PaymentListInput,
  PaymentStorePort,
} from "../../ports/payment-store.js";
import type { TransactionalResource } from "../../ports/transaction.js";

// Every ledger transaction takes this lock, so concurrent processes serialise like the executor does.
const LEDGER_LOCK_ID = "7263154091";

const PAYMENT_STATUSES: readonly PaymentStatus[] = [
  "nonexistent",
  "active",
  "cleared",
  "confirmed",
  "reversed",
  "revoked",
  "merged",
];

interface PaymentRow {
  id: string;
  payer: string;
  sponsor: string | null;
  subsidy_limit: unknown;
  base_amount: unknown;
  extra_amount: unknown;
  refund_amount: unknown;
  cashback_amount: unknown;
  confirmed_amount: unknown;
  cashback_rate: unknown;
  cashback_nonce: unknown;
  revocation_counter: unknown;
  status: string;
  created_at: unknown;
  updated_at: unknown;
}

const PAYMENT_COLUMNS = `
  id,
  payer,
  sponsor,
  subsidy_limit,
  base_amount,
  extra_amount,
  refund_amount,
  cashback_amount,
  confirmed_amount,
  cashback_rate,
  cashback_nonce,
  revocation_counter,
  status,
  created_at,
  updated_at
`;

function mapTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

function toNumber(value: unknown, field: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new AppError(500, "persistence_mapping_error", `Unable to map numeric field '${field}'.`);
  }
  return parsed;
}

function toStatus(value: string): PaymentStatus {
  const status = PAYMENT_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new AppError(500, "persistence_mapping_error", `Unknown payment status '${value}'.`);
  }
  return status;
}

function mapPaymentRow(row: PaymentRow): PaymentRecord {
  return {
    id: row.id,
    payer: row.payer,
    sponsor: row.sponsor,
    subsidy_limit: toNumber(row.subsidy_limit, "subsidy_limit"),
    base_amount: toNumber(row.base_amount, "base_amount"),
    extra_amount: toNumber(row.extra_amount, "extra_amount"),
    refund_amount: toNumber(row.refund_amount, "refund_amount"),
    cashback_amount: toNumber(row.cashback_amount, "cashback_amount"),
    confirmed_amount: toNumber(row.confirmed_amount, "confirmed_amount"),
    cashback_rate: toNumber(row.cashback_rate, "cashback_rate"),
    cashback_nonce: toNumber(row.cashback_nonce, "cashback_nonce"),
    revocation_counter: toNumber(row.revocation_counter, "revocation_counter"),
    status: toStatus(row.status),
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

export class PostgresPaymentStore implements PaymentStorePort, TransactionalResource {
  private client: PoolClient | null = null;

  constructor(
    private readonly pool: Pool,
    private readonly defaultSettings: LedgerSettings,
  ) {}

  async begin(): Promise<void> {
    if (this.client) {
      throw new AppError(500, "transaction_already_open", "Payment store transaction is already open.");
    }
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      await client.query("SELECT pg_advisory_xact_lock($1::bigint)", [LEDGER_LOCK_ID]);
    } catch (error) {
      await client.query("ROLLBACK");
      client.release();
      throw error;
    }
    this.client = client;
  }

  async commit(): Promise<void> {
    await this.finish("COMMIT");
  }

  async rollback(): Promise<void> {
    await this.finish("ROLLBACK");
  }

  async getPayment(id: string): Promise<PaymentRecord | null> {
    const result = await this.query<PaymentRow>(
      `SELECT ${PAYMENT_COLUMNS} FROM csl_payments WHERE id = $1`,
      [id],
    );
    const row = result.rows[0];
    return row ? mapPaymentRow(row) : null;
  }

  async savePayment(payment: PaymentRecord): Promise<void> {
    await this.query(
      `
        INSERT INTO csl_payments (${PAYMENT_COLUMNS})
        VALUES (
          $1,
          $2,
          $3,
          $4::bigint,
          $5::bigint,
          $6::bigint,
          $7::bigint,
          $8::bigint,
          $9::bigint,
          $10,
          $11::bigint,
          $12,
          $13,
          $14::timestamptz,
          $15::timestamptz
        )
        ON CONFLICT (id) DO UPDATE
        SET payer = EXCLUDED.payer,
            sponsor = EXCLUDED.sponsor,
            subsidy_limit = EXCLUDED.subsidy_limit,
            base_amount = EXCLUDED.base_amount,
            extra_amount = EXCLUDED.extra_amount,
            refund_amount = EXCLUDED.refund_amount,
            cashback_amount = EXCLUDED.cashback_amount,
            confirmed_amount = EXCLUDED.confirmed_amount,
            cashback_rate = EXCLUDED.cashback_rate,
            cashback_nonce = EXCLUDED.cashback_nonce,
            revocation_counter = EXCLUDED.revocation_counter,
            status = EXCLUDED.status,
            created_at = EXCLUDED.created_at,
            updated_at = EXCLUDED.updated_at
      `,
      [
        payment.id,
        payment.payer,
        payment.sponsor,
        payment.subsidy_limit,
        payment.base_amount,
        payment.extra_amount,
        payment.refund_amount,
        payment.cashback_amount,
        payment.confirmed_amount,
        payment.cashback_rate,
        payment.cashback_nonce,
        payment.revocation_counter,
        payment.status,
        payment.created_at,
        payment.updated_at,
      ],
    );
  }

  async listPayments(input: PaymentListInput): Promise<PaymentRecord[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    let index = 1;

    if (input.payer) {
      conditions.push(`payer = $${index}`);
      values.push(input.payer);
      index += 1;
    }
    if (input.statuses) {
      conditions.push(`status = ANY($${index}::text[])`);
      values.push(input.statuses);
      index += 1;
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const result = await this.query<PaymentRow>(
      `SELECT ${PAYMENT_COLUMNS} FROM csl_payments ${whereClause} ORDER BY created_at ASC, id ASC`,
      values,
    );
    return result.rows.map(mapPaymentRow);
  }

  async applyBalanceDelta(bucket: BalanceBucket, account: string, delta: number): Promise<BalanceChangeResult> {
    const accountResult = await this.query<{ amount: unknown }>(
      `
        INSERT INTO csl_account_balances (bucket, account, amount)
        VALUES ($1, $2, $3::bigint)
        ON CONFLICT (bucket, account) DO UPDATE
        SET amount = csl_account_balances.amount + EXCLUDED.amount
        RETURNING amount
      `,
      [bucket, account, delta],
    );
    const totalResult = await this.query<{ amount: unknown }>(
      `
        INSERT INTO csl_balance_totals (bucket, amount)
        VALUES ($1, $2::bigint)
        ON CONFLICT (bucket) DO UPDATE
        SET amount = csl_balance_totals.amount + EXCLUDED.amount
        RETURNING amount
      `,
      [bucket, delta],
    );

    const accountBalance = toNumber(accountResult.rows[0]?.amount, "account_balance");
    const totalBalance = toNumber(totalResult.rows[0]?.amount, "total_balance");
    if (accountBalance < 0 || totalBalance < 0) {
      throw new AppError(
        500,
        "ledger_invariant_violation",
        `Balance of bucket '${bucket}' would become negative for account '${account}'.`,
      );
    }
    if (accountBalance === 0) {
      await this.query("DELETE FROM csl_account_balances WHERE bucket = $1 AND account = $2", [bucket, account]);
    }
    return { accountBalance, totalBalance };
  }

  async getAccountBalance(bucket: BalanceBucket, account: string): Promise<number> {
    const result = await this.query<{ amount: unknown }>(
      "SELECT amount FROM csl_account_balances WHERE bucket = $1 AND account = $2",
      [bucket, account],
    );
    const row = result.rows[0];
    return row ? toNumber(row.amount, "account_balance") : 0;
  }

  async getTotalBalance(bucket: BalanceBucket): Promise<number> {
    const result = await this.query<{ amount: unknown }>(
      "SELECT amount FROM csl_balance_totals WHERE bucket = $1",
      [bucket],
    );
    const row = result.rows[0];
    return row ? toNumber(row.amount, "total_balance") : 0;
  }

  async listAccountBalances(): Promise<AccountBucketBalance[]> {
    const result = await this.query<{ bucket: string; account: string; amount: unknown }>(
      "SELECT bucket, account, amount FROM csl_account_balances ORDER BY bucket, account",
    );
    const balances: AccountBucketBalance[] = [];
    for (const row of result.rows) {
      if (row.bucket !== "uncleared" && row.bucket !== "cleared") {
        throw new AppError(500, "persistence_mapping_error", `Unknown balance bucket '${row.bucket}'.`);
      }
      balances.push({ bucket: row.bucket, account: row.account, amount: toNumber(row.amount, "amount") });
    }
    return balances;
  }

  async hasCancellationFlag(kind: CancellationKind, reference: string): Promise<boolean> {
    const result = await this.query(
      "SELECT 1 FROM csl_cancellation_flags WHERE kind = $1 AND reference = $2",
      [kind, reference],
    );
    return result.rows.length > 0;
  }

  async setCancellationFlag(kind: CancellationKind, reference: string): Promise<void> {
    await this.query(
      `
        INSERT INTO csl_cancellation_flags (kind, reference)
        VALUES ($1, $2)
        ON CONFLICT (kind, reference) DO NOTHING
      `,
      [kind, reference],
    );
  }

  async getSettings(): Promise<LedgerSettings> {
    const result = await this.query<{
      cash_out_account: string | null;
      cashback_distributor: string | null;
      cashback_enabled: boolean;
      cashback_rate: unknown;
      revocation_limit: unknown;
    }>(
      `
        SELECT cash_out_account, cashback_distributor, cashback_enabled, cashback_rate, revocation_limit
        FROM csl_settings
        WHERE id = 1
      `,
    );
    const row = result.rows[0];
    if (!row) {
      return { ...this.defaultSettings };
    }
    return {
      cash_out_account: row.cash_out_account,
      cashback_distributor: row.cashback_distributor,
      cashback_enabled: row.cashback_enabled,
      cashback_rate: toNumber(row.cashback_rate, "cashback_rate"),
      revocation_limit: toNumber(row.revocation_limit, "revocation_limit"),
    };
  }

  async saveSettings(settings: LedgerSettings): Promise<void> {
    await this.query(
      `
        INSERT INTO csl_settings (
          id,
          cash_out_account,
          cashback_distributor,
          cashback_enabled,
          cashback_rate,
          revocation_limit
        )
        VALUES (1, $1, $2, $3, $4, $5)
        ON CONFLICT (id) DO UPDATE
        SET cash_out_account = EXCLUDED.cash_out_account,
            cashback_distributor = EXCLUDED.cashback_distributor,
            cashback_enabled = EXCLUDED.cashback_enabled,
            cashback_rate = EXCLUDED.cashback_rate,
            revocation_limit = EXCLUDED.revocation_limit
      `,
      [
        settings.cash_out_account,
        settings.cashback_distributor,
        settings.cashback_enabled,
        settings.cashback_rate,
        settings.revocation_limit,
      ],
    );
  }

  private async query<TRow extends QueryResultRow = QueryResultRow>(
    text: string,
    values: unknown[] = [],
  ): Promise<QueryResult<TRow>> {
    if (this.client) {
      return this.client.query<TRow>(text, values);
    }
    return this.pool.query<TRow>(text, values);
  }

  private async finish(statement: "COMMIT" | "ROLLBACK"): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }
    this.client = null;
    try {
      await client.query(statement);
    } finally {
      client.release();
    }
  }
}
