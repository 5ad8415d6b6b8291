import type { PaymentStatus, RefundOutcomeStatus } from "../domain/types.js";

type LabelSet = Record<string, string>;

const DURATION_BUCKETS_SECONDS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5];

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function formatLabels(pairs: ReadonlyArray<readonly [string, string]>): string {
  if (pairs.length === 0) {
    return "";
  }
  return `{${pairs.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",")}}`;
}

/**
 * One metric family: a series per distinct label combination, each label
 * rendered in declaration order.
 */
abstract class MetricFamily<TSeries> {
  private readonly series = new Map<string, { pairs: Array<[string, string]>; state: TSeries }>();

  constructor(
    protected readonly name: string,
    private readonly help: string,
    private readonly type: "counter" | "histogram",
    private readonly labelNames: readonly string[],
  ) {}

  protected abstract initialState(): TSeries;

  protected abstract renderSeries(pairs: Array<[string, string]>, state: TSeries): string[];

  protected seriesFor(labels: LabelSet): TSeries {
    const pairs = this.labelNames.map((name): [string, string] => [name, labels[name] ?? ""]);
    const key = JSON.stringify(pairs);
    const existing = this.series.get(key);
    if (existing) {
      return existing.state;
    }
    const created = { pairs, state: this.initialState() };
    this.series.set(key, created);
    return created.state;
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} ${this.type}`];
    for (const { pairs, state } of this.series.values()) {
      lines.push(...this.renderSeries(pairs, state));
    }
    return lines;
  }
}

class CounterMetric extends MetricFamily<{ value: number }> {
  constructor(name: string, help: string, labelNames: readonly string[]) {
    super(name, help, "counter", labelNames);
  }

  inc(labels: LabelSet, value = 1): void {
    this.seriesFor(labels).value += value;
  }

  protected initialState(): { value: number } {
    return { value: 0 };
  }

  protected renderSeries(pairs: Array<[string, string]>, state: { value: number }): string[] {
    return [`${this.name}${formatLabels(pairs)} ${state.value}`];
  }
}

interface HistogramState {
  count: number;
  sum: number;
  bucketCounts: number[];
}

class HistogramMetric extends MetricFamily<HistogramState> {
  constructor(
    name: string,
    help: string,
    labelNames: readonly string[],
    private readonly buckets: readonly number[],
  ) {
    super(name, help, "histogram", labelNames);
  }

  observe(labels: LabelSet, value: number): void {
    const state = this.seriesFor(labels);
    state.count += 1;
    state.sum += value;
    this.buckets.forEach((bound, index) => {
      if (value <= bound) {
        state.bucketCounts[index] = (state.bucketCounts[index] ?? 0) + 1;
      }
    });
  }

  protected initialState(): HistogramState {
    return { count: 0, sum: 0, bucketCounts: this.buckets.map(() => 0) };
  }

  protected renderSeries(pairs: Array<[string, string]>, state: HistogramState): string[] {
    const lines = this.buckets.map(
      (bound, index) =>
        `${this.name}_bucket${formatLabels([...pairs, ["le", String(bound)]])} ${state.bucketCounts[index] ?? 0}`,
    );
    lines.push(`${this.name}_bucket${formatLabels([...pairs, ["le", "+Inf"]])} ${state.count}`);
    lines.push(`${this.name}_sum${formatLabels(pairs)} ${state.sum}`);
    lines.push(`${this.name}_count${formatLabels(pairs)} ${state.count}`);
    return lines;
  }
}

export type AnnotationOutcome = "recorded" | "merged" | "failed" | "skipped";

export class PaymentMetricsRegistry {
  private readonly httpRequests = new CounterMetric(
    "payments_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new HistogramMetric(
    "payments_http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    ["method", "route"],
    DURATION_BUCKETS_SECONDS,
  );
  private readonly idempotencyReplays = new CounterMetric(
    "payments_idempotency_replays_total",
    "Total number of idempotent replay responses by operation.",
    ["operation"],
  );
  private readonly statusTransitions = new CounterMetric(
    "payments_status_transitions_total",
    "Total number of payment intent transitions by target status.",
    ["status"],
  );
  private readonly refundOutcomes = new CounterMetric(
    "payments_refund_outcomes_total",
    "Total number of decided refunds by outcome.",
    ["status"],
  );
  private readonly orderAnnotations = new CounterMetric(
    "payments_order_annotations_total",
    "Total number of best-effort order annotations by outcome.",
    ["outcome"],
  );
  private readonly errorResponses = new CounterMetric(
    "payments_error_responses_total",
    "Total number of error responses by category.",
    ["category"],
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

  recordIdempotencyReplay(operation: string): void {
    this.idempotencyReplays.inc({ operation });
  }

  recordTransition(status: PaymentStatus): void {
    this.statusTransitions.inc({ status });
  }

  recordRefundOutcome(status: RefundOutcomeStatus): void {
    this.refundOutcomes.inc({ status });
  }

  recordOrderAnnotation(outcome: AnnotationOutcome): void {
    this.orderAnnotations.inc({ outcome });
  }

  recordError(category: string): void {
    this.errorResponses.inc({ category });
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.idempotencyReplays.render(),
      ...this.statusTransitions.render(),
      ...this.refundOutcomes.render(),
      ...this.orderAnnotations.render(),
      ...this.errorResponses.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
