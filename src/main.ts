import { safeTry } from "slang-ts";
import { loadConfig } from "@/config";
import { createTaskServer } from "@/server";

// --- Configuration ---

const config = await safeTry(() => loadConfig(process.env));
if (config.isErr) {
  console.error(
    config.error instanceof Error ? config.error.message : config.error
  );
  process.exit(1);
}

// --- Create the server ---

const created = await createTaskServer(config.value);
if (created.isErr) {
  console.error(`Startup failed: ${created.error.message}`);
  process.exit(1);
}

const server = created.value;

// --- Start listening ---

const started = await safeTry(() => server.start());
if (started.isErr) {
  server.logger.error({
    atFunction: "main",
    message: "Failed to start listening",
    data: { error: started.error },
  });
  await server.stop();
  process.exit(1);
}

// --- Graceful shutdown ---

const shutdown = async (signal: NodeJS.Signals) => {
  server.logger.info({
    atFunction: "main",
    message: `Received ${signal}, shutting down`,
  });
  const stopped = await safeTry(() => server.stop());
  if (stopped.isErr) {
    server.logger.error({
      atFunction: "main",
      message: "Shutdown failed",
      data: { error: stopped.error },
    });
    process.exit(1);
  }
  process.exit(0);
};

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  });
}
