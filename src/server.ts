import { createApp } from "./app";
import { loadEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, logger } = createApp(env);

  await new Promise<void>((resolve) => {
    app.listen(env.port, () => {
      logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
      logger.info("Default component weights", { ...env.defaultWeights });
      resolve();
    });
  });
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Failed to start: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
