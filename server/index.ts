import { createApp } from "./app";
import { config, warnMissingCriticalEnv } from "./config";
import { closeDb } from "./db";
import { storage } from "./storage";
import { withSource } from "./logger";
import { toError } from "./types/errors";

const bootLog = withSource("boot");

function start(): void {
  // Environment validation (non-fatal warnings for missing criticals)
  warnMissingCriticalEnv();
  bootLog.info({ env: config.nodeEnv, port: config.port }, "starting server");
  // Startup environment summary (no secrets)
  bootLog.info(
    {
      storage: storage.constructor.name,
      memStorageForced: config.useMemStorage,
      firebaseConfigured: Boolean(
        config.firebase.projectId && config.firebase.clientEmail && config.firebase.privateKey
      ),
      adminGroup: config.adminGroup,
      scanPageSize: config.scanPageSize,
      corsOriginsCount: config.cors.allowedOrigins.length,
      dbSlowQueryMs: config.dbSlowQueryMs,
    },
    "environment summary"
  );

  const { server } = createApp(storage);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    bootLog.info({ signal }, "shutting down");
    server.close((err) => {
      if (err) bootLog.error({ err }, "error closing http server");
      void closeDb()
        .catch((dbErr: unknown) => bootLog.error({ err: toError(dbErr) }, "error closing database pool"))
        .finally(() => process.exit(err ? 1 : 0));
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  server.once("error", (err: NodeJS.ErrnoException) => {
    bootLog.error({ err, port: config.port }, "failed to start server");
    if (err.code === "EADDRINUSE") {
      bootLog.error("Port is already in use. Stop the other server or set PORT to a unique value.");
    }
    process.exitCode = 1;
  });

  server.listen({ port: config.port, host: "0.0.0.0" }, () => {
    bootLog.info(`serving on port ${config.port}`);
  });
}

start();
