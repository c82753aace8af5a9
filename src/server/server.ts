import type { AddressInfo, Server } from "node:net";
import { serve } from "@hono/node-server";
import { Err, Ok, type Result } from "slang-ts";
import type { AppConfig } from "@/config";
import { createStore, pushSchema, redactStoreUrl } from "@/db";
import { createLogger } from "@/logging";
import { createRestApp } from "@/rest";
import { createTaskModel } from "@/tasks";
import { createDiagnosticsLog, type StoreUnavailableError } from "@/utils";
import type { TaskServer, TaskServerOverrides } from "./types";

const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_PORT = 8000;

const closeListener = (listener: Server) =>
  new Promise<void>((resolve, reject) => {
    listener.close((error) => (error ? reject(error) : resolve()));
  });

/**
 * Bootstraps a task server instance.
 *
 * Wires logger, store, schema bootstrap, task model and REST app. The schema
 * is applied before this resolves, so a returned server is ready to serve.
 * Nothing listens until `start()`.
 *
 * @example
 * ```typescript
 * const server = await createTaskServer(loadConfig());
 * if (server.isOk) {
 *   await server.value.start();
 * }
 * ```
 */
export async function createTaskServer(
  config: AppConfig,
  overrides: TaskServerOverrides = {}
): Promise<Result<TaskServer, StoreUnavailableError>> {
  const logger =
    overrides.logger ?? createLogger(config.serverName, config.logging);
  const log = createDiagnosticsLog("TaskServer", {
    diagnostics: config.diagnostics,
    logger,
  });

  const store = overrides.store ?? createStore(config.database, logger);
  log(
    `Store opened (${store.driver}) at ${redactStoreUrl(config.database.url)}`
  );

  const pushed = await pushSchema({ db: store.db, logger });
  if (pushed.isErr) {
    await store.close();
    return Err(pushed.error);
  }
  log("Task schema ready");

  const model = createTaskModel({
    db: store.db,
    logger,
    pagination: config.pagination,
  });

  const app = createRestApp({
    config: config.rest,
    model,
    store,
    logger,
    serverName: config.serverName,
    version: config.version,
  });

  let listener: Server | null = null;

  const start = () =>
    new Promise<AddressInfo>((resolve, reject) => {
      const hostname = config.rest.host ?? DEFAULT_HOST;
      const port = config.rest.port ?? DEFAULT_PORT;

      const onListening = (info: AddressInfo) => {
        logger.info({
          atFunction: "TaskServer.start",
          message: `${config.serverName} listening on http://${info.address}:${info.port}`,
          data: { basePath: config.rest.baseUrl || "/" },
        });
        resolve(info);
      };

      const server: Server = serve(
        { fetch: app.fetch, hostname, port },
        onListening
      );
      // A listener that failed to bind has nothing to close
      server.once("error", (error) => {
        listener = null;
        reject(error);
      });
      listener = server;
    });

  const stop = async () => {
    const current = listener;
    listener = null;
    try {
      if (current) {
        await closeListener(current);
      }
    } finally {
      await store.close();
    }
    logger.info({
      atFunction: "TaskServer.stop",
      message: `${config.serverName} stopped`,
    });
  };

  log(`${config.serverName} server ready`);

  return Ok({ config, logger, store, model, app, start, stop });
}
