import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { Pool } from "pg";
import { HttpOrderStore } from "./adapters/http/order-store.js";
import { HttpRecordClient } from "./adapters/http/record-client.js";
import { HttpRecordStore } from "./adapters/http/record-store.js";
import { InMemoryIdempotencyLedger } from "./adapters/inmemory/idempotency-ledger.js";
import { InMemoryOrderStore } from "./adapters/inmemory/order-store.js";
import { InMemoryRecordStore } from "./adapters/inmemory/record-store.js";
import { PostgresIdempotencyLedger } from "./adapters/postgres/idempotency-ledger.js";
import { MockProviderGateway } from "./adapters/providers/mock-provider.js";
import { normalizeIdempotencyKey, requireResourceId } from "./api/validators.js";
import { IdempotencyLedger } from "./application/idempotency-ledger.js";
import { OrderAnnotator } from "./application/order-annotator.js";
import { PaymentService } from "./application/payment-service.js";
import { RefundOrchestrator } from "./application/refund-orchestrator.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { PaymentMetricsRegistry } from "./infra/metrics.js";
import type { IdempotencyLedgerPort } from "./ports/idempotency-ledger.js";
import type { OrderStorePort } from "./ports/order-store.js";
import type { ProviderGatewayPort } from "./ports/provider-gateway.js";
import type { RecordStorePort } from "./ports/record-store.js";

/** Collaborators that tests (or embedders) may swap out. */
export interface AppDependencies {
  recordStore: RecordStorePort;
  orderStore: OrderStorePort;
  idempotencyLedger: IdempotencyLedgerPort;
  gateway: ProviderGatewayPort;
  clock: ClockPort;
}

export interface PaymentApp {
  app: FastifyInstance;
  service: PaymentService;
  annotator: OrderAnnotator;
  metrics: PaymentMetricsRegistry;
}

function setIdempotencyHeaders(
  reply: FastifyReply,
  idempotencyKey: string | undefined,
  replayed: boolean,
): void {
  if (idempotencyKey) {
    reply.header("Idempotency-Key", idempotencyKey);
  }
  reply.header("X-Idempotency-Replayed", replayed ? "true" : "false");
}

function pathId(request: FastifyRequest, label: string): string {
  const params = request.params;
  const id = params && typeof params === "object" && "id" in params ? params.id : undefined;
  return requireResourceId(id, label);
}

export function buildPaymentApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  overrides: Partial<AppDependencies> = {},
): PaymentApp {
  const app = Fastify({
    logger: config.logLevel === "silent" ? false : { level: config.logLevel },
  });
  const metrics = new PaymentMetricsRegistry();
  const closeActions: Array<() => Promise<void>> = [];
  const requestStarts = new WeakMap<FastifyRequest, bigint>();

  const clock = overrides.clock ?? new SystemClock();
  const recordClient =
    config.storeBackend === "http" && config.storeBaseUrl
      ? new HttpRecordClient({
        baseUrl: config.storeBaseUrl,
        connectTimeoutMs: config.storeConnectTimeoutMs,
        readTimeoutMs: config.storeReadTimeoutMs,
      })
      : null;
  if (config.storeBackend === "http" && !recordClient && (!overrides.recordStore || !overrides.orderStore)) {
    throw new AppError("internal", "invalid_runtime_config", "HTTP record store requested without a base URL.");
  }

  const recordStore = overrides.recordStore
    ?? (recordClient ? new HttpRecordStore(recordClient) : new InMemoryRecordStore());
  const orderStore = overrides.orderStore
    ?? (recordClient ? new HttpOrderStore(recordClient) : new InMemoryOrderStore());

  let idempotencyLedger: IdempotencyLedgerPort;
  if (overrides.idempotencyLedger) {
    idempotencyLedger = overrides.idempotencyLedger;
  } else if (config.idempotencyBackend === "postgres") {
    if (!config.postgresUrl) {
      throw new AppError("internal", "invalid_runtime_config", "Postgres idempotency requested without PostgreSQL.");
    }
    const pool = new Pool({ connectionString: config.postgresUrl });
    closeActions.push(async () => {
      await pool.end();
    });
    idempotencyLedger = new PostgresIdempotencyLedger(pool);
  } else {
    idempotencyLedger = new InMemoryIdempotencyLedger();
  }

  const gateway = overrides.gateway ?? new MockProviderGateway({ name: "simulated" });
  const annotator = new OrderAnnotator(
    orderStore,
    app.log,
    { enabled: config.orderAnnotationEnabled },
    metrics,
  );
  const refunds = new RefundOrchestrator(recordStore, gateway, annotator, clock, app.log, metrics);
  const service = new PaymentService(
    recordStore,
    new IdempotencyLedger(idempotencyLedger),
    gateway,
    refunds,
    clock,
    app.log,
    {
      defaultCurrency: config.defaultCurrency,
      syncResolution: config.syncResolution,
    },
    metrics,
  );

  app.addHook("onRequest", async (request) => {
    requestStarts.set(request, process.hrtime.bigint());
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestStarts.get(request);
    if (!startNs) {
      return;
    }
    const durationSeconds = Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? request.url.split("?")[0] ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.get("/health", async (_request, reply) => {
    return reply.status(200).send({ status: "ok", service: config.serviceName });
  });

  const createHandler = async (request: FastifyRequest, reply: FastifyReply) => {
    const idempotencyKey = normalizeIdempotencyKey(request.headers, config.idempotencyKeyMaxLength);
    const result = await service.createPaymentIntent(request.body, idempotencyKey);
    setIdempotencyHeaders(reply, idempotencyKey, result.idempotencyReplayed);
    if (result.idempotencyReplayed) {
      metrics.recordIdempotencyReplay("create_payment_intent");
    }
    return reply.status(result.statusCode).send(result.body);
  };

  app.post("/intents", createHandler);
  app.post("/payments", createHandler);

  app.post("/intents/:id/confirm", async (request, reply) => {
    const intent = await service.confirmPaymentIntent(pathId(request, "Payment intent id"));
    return reply.status(200).send(intent);
  });

  app.post("/intents/:id/capture", async (request, reply) => {
    const charge = await service.capturePaymentIntent(pathId(request, "Payment intent id"));
    return reply.status(200).send(charge);
  });

  app.post("/intents/:id/cancel", async (request, reply) => {
    const intent = await service.cancelPaymentIntent(pathId(request, "Payment intent id"));
    return reply.status(200).send(intent);
  });

  app.post("/payments/:id/refund", async (request, reply) => {
    const intent = await service.refundPaymentIntent(pathId(request, "Payment id"));
    return reply.status(200).send(intent);
  });

  app.post("/charges/:id/refund", async (request, reply) => {
    const charge = await service.refundCharge(pathId(request, "Charge id"));
    return reply.status(200).send(charge);
  });

  app.get("/payments", async (_request, reply) => {
    const intents = await service.listPaymentIntents();
    return reply.status(200).send({ data: intents });
  });

  app.get("/payments/:id", async (request, reply) => {
    const intent = await service.getPaymentIntent(pathId(request, "Payment id"));
    return reply.status(200).send(intent);
  });

  app.put("/payments/:id", async (request, reply) => {
    const intent = await service.updatePaymentIntent(pathId(request, "Payment id"), request.body);
    return reply.status(200).send(intent);
  });

  app.get("/charges/:id", async (request, reply) => {
    const charge = await service.getCharge(pathId(request, "Charge id"));
    return reply.status(200).send(charge);
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send({
      error: {
        category: "not_found",
        code: "resource_not_found",
        message: "Route not found.",
        retryable: false,
        request_id: request.id,
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      metrics.recordError(error.category);
      return reply.status(error.statusCode).send({
        error: {
          category: error.category,
          code: error.code,
          message: error.message,
          retryable: error.retryable,
          request_id: request.id,
          ...(error.downstreamStatus !== undefined ? { downstream_status: error.downstreamStatus } : {}),
        },
      });
    }
    const statusCode = error.statusCode;
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      metrics.recordError("invalid_input");
      return reply.status(statusCode).send({
        error: {
          category: "invalid_input",
          code: "invalid_request",
          message: error.message,
          retryable: false,
          request_id: request.id,
        },
      });
    }
    metrics.recordError("internal");
    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({
      error: {
        category: "internal",
        code: "internal_server_error",
        message: "Unexpected error.",
        retryable: false,
        request_id: request.id,
      },
    });
  });

  app.addHook("onClose", async () => {
    await annotator.drain();
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  });

  return { app, service, annotator, metrics };
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  overrides: Partial<AppDependencies> = {},
): FastifyInstance {
  return buildPaymentApp(config, overrides).app;
}
