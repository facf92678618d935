import type { LedgerEvent, PaymentStatus } from "../domain/types.js";

type LabelSet = Record<string, string>;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function buildLabelKey(labelNames: string[], labels: LabelSet): string {
  return labelNames.map((name) => `${name}=${labels[name] ?? ""}`).join("|");
}

function parseLabelKey(labelNames: string[], key: string): LabelSet {
  const parts = key.split("|");
  const labels: LabelSet = {};
  for (const [index, name] of labelNames.entries()) {
    const value = parts[index];
    labels[name] = value ? value.slice(name.length + 1) : "";
  }
  return labels;
}

function formatLabels(labels: LabelSet): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return "";
  }
  const inner = entries.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",");
  return `{${inner}}`;
}

class CounterMetric {
  private readonly values = new Map<string, number>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly labelNames: string[],
  ) {}

  inc(labels: LabelSet, value = 1): void {
    const key = buildLabelKey(this.labelNames, labels);
    const current = this.values.get(key) ?? 0;
    this.values.set(key, current + value);
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} counter`];
    for (const [key, value] of this.values.entries()) {
      const labels = parseLabelKey(this.labelNames, key);
      lines.push(`${this.name}${formatLabels(labels)} ${value}`);
    }
    return lines;
  }
}

class HistogramMetric {
  private readonly values = new Map<string, { count: number; sum: number; buckets: number[] }>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly labelNames: string[],
    private readonly buckets: number[],
  ) {}

  observe(labels: LabelSet, value: number): void {
    const key = buildLabelKey(this.labelNames, labels);
    const current =
      this.values.get(key) ?? {
        count: 0,
        sum: 0,
        buckets: this.buckets.map(() => 0),
      };
    current.count += 1;
    current.sum += value;
    for (const [index, bucket] of this.buckets.entries()) {
      if (value <= bucket) {
        current.buckets[index] = (current.buckets[index] ?? 0) + 1;
      }
    }
    this.values.set(key, current);
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    for (const [key, stats] of this.values.entries()) {
      const baseLabels = parseLabelKey(this.labelNames, key);
      for (const [index, bucket] of this.buckets.entries()) {
        lines.push(
          `${this.name}_bucket${formatLabels({ ...baseLabels, le: String(bucket) })} ${stats.buckets[index] ?? 0}`,
        );
      }
      lines.push(`${this.name}_bucket${formatLabels({ ...baseLabels, le: "+Inf" })} ${stats.count}`);
      lines.push(`${this.name}_sum${formatLabels(baseLabels)} ${stats.sum}`);
      lines.push(`${this.name}_count${formatLabels(baseLabels)} ${stats.count}`);
    }
    return lines;
  }
}

const STATUS_BY_EVENT: Partial<Record<LedgerEvent["type"], PaymentStatus>> = {
  "payment.made": "active",
  "payment.cleared": "cleared",
  "payment.uncleared": "active",
  "payment.confirmed": "confirmed",
  "payment.revoked": "revoked",
  "payment.reversed": "reversed",
};

const CASHBACK_OUTCOMES: Partial<Record<LedgerEvent["type"], { operation: string; outcome: string }>> = {
  "cashback.sent": { operation: "send", outcome: "success" },
  "cashback.send_failed": { operation: "send", outcome: "failure" },
  "cashback.increased": { operation: "increase", outcome: "success" },
  "cashback.increase_failed": { operation: "increase", outcome: "failure" },
  "cashback.revoked": { operation: "revoke", outcome: "success" },
  "cashback.revoke_failed": { operation: "revoke", outcome: "failure" },
};

export class CslMetricsRegistry {
  private readonly httpRequests = new CounterMetric(
    "csl_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new HistogramMetric(
    "csl_http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    ["method", "route"],
    [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  );
  private readonly rateLimitRejections = new CounterMetric(
    "csl_http_rate_limited_total",
    "Total number of HTTP requests rejected by rate limiting.",
    ["scope"],
  );
  private readonly ledgerEvents = new CounterMetric(
    "csl_ledger_events_total",
    "Total number of published ledger events by type.",
    ["event_type"],
  );
  private readonly paymentStatusTransitions = new CounterMetric(
    "csl_payment_status_transitions_total",
    "Total number of payment transitions by resulting status.",
    ["status"],
  );
  private readonly mergedPayments = new CounterMetric(
    "csl_payments_merged_total",
    "Total number of source payments absorbed by merges.",
    [],
  );
  private readonly cashbackOutcomes = new CounterMetric(
    "csl_cashback_operations_total",
    "Total number of cashback distributor calls by operation and outcome.",
    ["operation", "outcome"],
  );
  private readonly rolledBackOperations = new CounterMetric(
    "csl_operations_rolled_back_total",
    "Total number of ledger operations rolled back by operation and error code.",
    ["operation", "code"],
  );

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    this.httpRequests.inc({
      method: method.toUpperCase(),
      route,
      status_code: String(statusCode),
    });
    this.httpDuration.observe(
      {
        method: method.toUpperCase(),
        route,
      },
      durationSeconds,
    );
  }

  recordRateLimitRejection(scope: string): void {
    this.rateLimitRejections.inc({ scope });
  }

  recordRolledBackOperation(operation: string, code: string): void {
    this.rolledBackOperations.inc({ operation, code });
  }

  recordPublishedEvent(event: LedgerEvent): void {
    this.ledgerEvents.inc({ event_type: event.type });

    const status = STATUS_BY_EVENT[event.type];
    if (status) {
      this.paymentStatusTransitions.inc({ status });
    }
    const cashbackOutcome = CASHBACK_OUTCOMES[event.type];
    if (cashbackOutcome) {
      this.cashbackOutcomes.inc(cashbackOutcome);
    }
    if (event.type === "payments.merged") {
      const mergedIds = event.data.merged_payment_ids;
      const mergedCount = Array.isArray(mergedIds) ? mergedIds.length : 0;
      this.mergedPayments.inc({}, mergedCount);
      this.paymentStatusTransitions.inc({ status: "merged" }, mergedCount);
    }
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.rateLimitRejections.render(),
      ...this.ledgerEvents.render(),
      ...this.paymentStatusTransitions.render(),
      ...this.mergedPayments.render(),
      ...this.cashbackOutcomes.render(),
      ...this.rolledBackOperations.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
