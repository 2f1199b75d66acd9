import path from "node:path";
import type pino from "pino";
import { ensureDefaultConfig, getDataDir, loadEngineConfig, readFullConfig, type EngineConfig } from "./config.js";
import type { SnapshotActuator } from "./engine/actuator.js";
import { SessionEngine } from "./engine/engine.js";
import type { Dialer, SnapshotSource } from "./engine/ports.js";
import { PaymentService } from "./payments/service.js";
import { createInMemoryTransactionStore } from "./records/in-memory.js";
import { createSqliteTransactionStore } from "./records/sqlite.js";
import type { TransactionStore } from "./records/store.js";
import { getEnv } from "./shared/env.js";
import { getLogger, initLogger, isValidFormat, type LogFormat } from "./shared/logging.js";

export interface AutopilotOptions {
  source: SnapshotSource;
  actuator: SnapshotActuator;
  dialer: Dialer;
  dataDir?: string;
  /** Use this store instead of the SQLite file in the data dir. */
  store?: TransactionStore;
  /** Keep records in memory only. Ignored when `store` is given. */
  inMemory?: boolean;
  env?: NodeJS.ProcessEnv;
}

export interface Autopilot {
  config: EngineConfig;
  engine: SessionEngine;
  payments: PaymentService;
  store: TransactionStore;
  logger: pino.Logger;
}

/**
 * Wire config, logging, the record store, the engine and the payment
 * dispatcher together and attach the engine to the snapshot feed.
 */
export async function createAutopilot(opts: AutopilotOptions): Promise<Autopilot> {
  const env = opts.env ?? process.env;
  const dataDir = getDataDir(opts.dataDir, env);
  await ensureDefaultConfig(dataDir);

  const file = await readFullConfig(dataDir);
  const config = await loadEngineConfig(dataDir, env);
  const rawFormat = getEnv("LOG_FORMAT", env) ?? file["log.format"];
  const format: LogFormat = typeof rawFormat === "string" && isValidFormat(rawFormat) ? rawFormat : "text";
  initLogger(config.logLevel, format);
  const logger = getLogger("autopilot");

  let store = opts.store;
  if (!store) {
    if (opts.inMemory) {
      store = createInMemoryTransactionStore();
    } else {
      const configured = file["store.path"];
      const dbPath = typeof configured === "string" && configured ? configured : path.join(dataDir, "transactions.db");
      store = await createSqliteTransactionStore(dbPath);
      logger.debug({ dbPath }, "Opened transaction store");
    }
  }

  const engine = new SessionEngine({ source: opts.source, actuator: opts.actuator, config });
  const payments = new PaymentService({ engine, dialer: opts.dialer, store, shortCode: config.shortCode });
  engine.attach();
  logger.info({ dataDir, shortCode: config.shortCode }, "Autopilot ready");
  return { config, engine, payments, store, logger };
}
