import http from 'http';
import { Counter, Gauge, Histogram, register } from 'prom-client';
import { logger } from '../utils/logger';

let server: http.Server | null = null;

export const ordersPlacedCounter = new Counter({
  name: 'grid_orders_placed_total',
  help: 'Grid and exit orders accepted by the exchange, by side',
  labelNames: ['side'] as const,
});

export const ordersFailedCounter = new Counter({
  name: 'grid_orders_failed_total',
  help: 'Orders that could not be executed, by side',
  labelNames: ['side'] as const,
});

export const fillCounter = new Counter({
  name: 'grid_fills_total',
  help: 'Completed orders by side',
  labelNames: ['side'] as const,
});

export const orderCancelCounter = new Counter({
  name: 'grid_orders_cancelled_total',
  help: 'Orders reported cancelled by the exchange, by side',
  labelNames: ['side'] as const,
});

export const apiErrorCounter = new Counter({
  name: 'exchange_api_errors_total',
  help: 'Exchange call failures by operation',
  labelNames: ['operation'] as const,
});

export const orderPollLatency = new Histogram({
  name: 'order_status_poll_ms',
  help: 'Duration of one order status reconciliation cycle (ms)',
  buckets: [50, 250, 1000, 5000, 15000],
});

export const accountValueGauge = new Gauge({
  name: 'grid_account_value',
  help: 'Fiat plus crypto marked at the last seen price',
});

export function startMetricsServer(port: number) {
  if (server) return server;
  server = http.createServer(async (req, res) => {
    if (req.url === '/metrics') {
      try {
        const metrics = await register.metrics();
        res.writeHead(200, { 'Content-Type': register.contentType });
        res.end(metrics);
      } catch (err) {
        res.writeHead(500);
        res.end(String(err));
      }
    } else {
      res.writeHead(404);
      res.end('Not found');
    }
  });
  server.listen(port, () => {
    logger.info('metrics_server_listening', { event: 'metrics_server_listening', port });
  });
  return server;
}

export async function stopMetricsServer() {
  const current = server;
  server = null;
  if (!current) return;
  await new Promise<void>((resolve, reject) => {
    current.close((error) => (error ? reject(error) : resolve()));
  });
}

export function resetMetrics() {
  ordersPlacedCounter.reset();
  ordersFailedCounter.reset();
  fillCounter.reset();
  orderCancelCounter.reset();
  apiErrorCounter.reset();
  orderPollLatency.reset();
  accountValueGauge.reset();
}
