import { env } from "./config/env";
import { createApp } from "./app";
import { createLogger } from "./utils/logger";

const log = createLogger(env.LOG_LEVEL, "server");

async function bootstrap(): Promise<void> {
  const app = createApp();
  await new Promise<void>((resolve, reject) => {
    const server = app.listen(env.PORT, () => resolve());
    server.on("error", reject);
  });
  log.info(`Grader listening on http://localhost:${env.PORT}`);
  log.info(
    `best_n=${env.GRADER_BEST_N} scaled_range=[${env.GRADER_SCALED_MIN}, ${env.GRADER_SCALED_MAX}] context_scope=${env.GRADER_CONTEXT_SCOPE}`
  );
}

bootstrap().catch((error) => {
  log.error("Failed to start grader:", error);
  process.exit(1);
});
