import client, { Registry, Counter, Histogram } from 'prom-client';

// Dedicated registry to avoid default global pollution
const register = new Registry();
client.collectDefaultMetrics({ register, prefix: 'app_' });

// Buckets tuned for ms latencies typical of local/dev environments
const LATENCY_BUCKETS = [5, 10, 20, 50, 100, 200, 500, 1000, 2000, 5000];

const dbQueryLatencyMs = new Histogram({
  name: 'db_query_latency_ms',
  help: 'Latency of database queries in milliseconds',
  labelNames: ['operation', 'table'],
  buckets: LATENCY_BUCKETS,
  registers: [register],
});

const dbRowsReturned = new Counter({
  name: 'db_rows_returned_total',
  help: 'Total rows returned by DB queries',
  labelNames: ['operation', 'table'],
  registers: [register],
});

const apiRequestLatencyMs = new Histogram({
  name: 'api_request_latency_ms',
  help: 'Latency of API requests in milliseconds',
  labelNames: ['endpoint', 'method', 'status'],
  buckets: LATENCY_BUCKETS,
  registers: [register],
});

const apiRequestsTotal = new Counter({
  name: 'api_requests_total',
  help: 'Total API requests by endpoint, method, and status',
  labelNames: ['endpoint', 'method', 'status'],
  registers: [register],
});

// outcome: clear | duplicate | scan_failed
const duplicateChecksTotal = new Counter({
  name: 'duplicate_checks_total',
  help: 'Duplicate checks by call site and outcome',
  labelNames: ['site', 'outcome'],
  registers: [register],
});

const duplicateScanDurationMs = new Histogram({
  name: 'duplicate_scan_duration_ms',
  help: 'Duration of full-table duplicate scans in ms',
  labelNames: ['site'],
  buckets: LATENCY_BUCKETS,
  registers: [register],
});

// outcome: sent | failed | skipped
const nuggetDeliveriesTotal = new Counter({
  name: 'nugget_deliveries_total',
  help: 'Daily nugget deliveries by method and outcome',
  labelNames: ['method', 'outcome'],
  registers: [register],
});

const errorsTotal = new Counter({
  name: 'errors_total',
  help: 'Errors logged by handlers, by error code and operation',
  labelNames: ['error_code', 'operation'],
  registers: [register],
});

function observeDbQuery(operation: string, table: string, durationMs: number, rows: number): void {
  dbQueryLatencyMs.labels(operation, table).observe(durationMs);
  dbRowsReturned.labels(operation, table).inc(rows);
}

function observeApiRequest(endpoint: string, method: string, status: number, durationMs: number): void {
  const statusStr = String(status);
  apiRequestLatencyMs.labels(endpoint, method, statusStr).observe(durationMs);
  apiRequestsTotal.labels(endpoint, method, statusStr).inc();
}

export type DuplicateCheckSite = 'create' | 'check';
export type DuplicateCheckOutcome = 'clear' | 'duplicate' | 'scan_failed';

function recordDuplicateCheck(site: DuplicateCheckSite, outcome: DuplicateCheckOutcome, durationMs: number): void {
  duplicateChecksTotal.labels(site, outcome).inc();
  duplicateScanDurationMs.labels(site).observe(durationMs);
}

export type NuggetDeliveryOutcome = 'sent' | 'failed' | 'skipped';

function recordNuggetDelivery(method: string, outcome: NuggetDeliveryOutcome): void {
  nuggetDeliveriesTotal.labels(method, outcome).inc();
}

function recordError(errorCode: string, operation: string): void {
  errorsTotal.labels(errorCode, operation).inc();
}

async function getMetricsContent(): Promise<string> {
  return await register.metrics();
}

export const metrics = {
  register,
  dbQueryLatencyMs,
  dbRowsReturned,
  apiRequestLatencyMs,
  apiRequestsTotal,
  duplicateChecksTotal,
  duplicateScanDurationMs,
  nuggetDeliveriesTotal,
  errorsTotal,
  observeDbQuery,
  observeApiRequest,
  recordDuplicateCheck,
  recordNuggetDelivery,
  recordError,
  getMetricsContent,
};
