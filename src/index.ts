// Scam Honeypot - Entry point
// Loads configuration, wires the engagement pipeline and starts the server.

import "dotenv/config";
import { pathToFileURL } from "node:url";
import { CallbackReporter } from "./callback-reporter.js";
import { loadCatalog } from "./catalog.js";
import { ConfigError, loadServiceConfig } from "./config.js";
import { createConsoleLogger } from "./logger.js";
import { createAppServer, type AppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { SessionStore } from "./session-store.js";
import { StageController } from "./stage-controller.js";
import { createSeededRandom } from "./utils.js";

export const APP_NAME = "Scam Honeypot";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

/** Builds every component from the environment and starts listening. */
export async function main(env: Record<string, string | undefined> = process.env): Promise<AppServer> {
  const config = loadServiceConfig(env);
  logInit("Configuration loaded");

  logInit("Loading signal layers and reply templates...");
  const catalog = loadCatalog();
  logInit(`Catalog ready: ${catalog.layers.length} signal layers`);

  const controller = new StageController({
    catalog,
    config: config.engagement,
    random: config.randomSeed !== null ? createSeededRandom(config.randomSeed) : undefined,
    logger: createConsoleLogger("StageController"),
  });

  const reporter = config.callbackUrl
    ? new CallbackReporter({
        url: config.callbackUrl,
        timeoutMs: config.callbackTimeoutMs,
        maxAttempts: config.callbackMaxAttempts,
        backoffMs: config.callbackBackoffMs,
        logger: createConsoleLogger("CallbackReporter"),
      })
    : null;
  logInit(reporter ? `Final results go to ${config.callbackUrl}` : "CALLBACK_URL not set, final results are not sent");

  logInit("Wiring SessionManager...");
  const sessionManager = new SessionManager({
    store: new SessionStore({ ttlSeconds: config.sessionTtlSeconds, logger: createConsoleLogger("SessionStore") }),
    controller,
    reporter,
    logger: createConsoleLogger("SessionManager"),
  });

  const server = createAppServer({ apiKey: config.apiKey, sessionManager });
  await server.listen(config.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
  logInit("Ready for connections");
  return server;
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  main().catch((err: unknown) => {
    if (err instanceof ConfigError) {
      for (const issue of err.issues) logFatal(issue);
      logFatal("Fix the settings in your .env file and restart.");
    } else {
      logFatal(err instanceof Error ? err.message : String(err));
    }
    process.exit(1);
  });
}
