import { createApp } from "./app";
import { loadConfig } from "./config";
import { log, logError } from "./logger";

(async () => {
  const config = loadConfig();
  const { server } = await createApp(config);

  if (config.wordList.length === 0) {
    log("word list is empty; anagram results will be empty", "config");
  }

  server.listen({
    port: config.port,
    host: config.host,
  }, () => {
    log(`serving on ${config.host}:${config.port}`);
  });
})().catch(error => {
  logError("Failed to start server", error);
  process.exit(1);
});
