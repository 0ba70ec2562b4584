import type { FastifyInstance } from "fastify";

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

export interface SignalSource {
  once(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  exit(code: number): void;
}

/**
 * Close the app on SIGTERM/SIGINT so `onClose` hooks run (pending deadlines
 * cancelled, cache and database connections ended). A second signal falls
 * back to the default handler.
 */
export function closeOnSignals(app: FastifyInstance, source: SignalSource = process): void {
  for (const signal of SHUTDOWN_SIGNALS) {
    source.once(signal, (received) => {
      app.log.info({ signal: received }, "Shutdown signal received");
      app.close().then(
        () => {
          source.exit(0);
        },
        (err: unknown) => {
          app.log.error({ err }, "Shutdown failed");
          source.exit(1);
        },
      );
    });
  }
}
