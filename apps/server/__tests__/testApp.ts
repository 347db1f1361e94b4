import { createApp } from "../app";
import { loadConfig } from "../config";

export async function createTestApp(env: NodeJS.ProcessEnv = {}) {
  const { app } = await createApp(loadConfig(env));
  return app;
}
