import type { AppConfig } from "./types/index.js";
import { createAuthManager, type AuthManager, type TokenCache } from "./auth/index.js";
import { SessionClient, TopicApi, type FetchFn, type SleepFn } from "./api/index.js";
import { loadConfig } from "./utils/config.js";
import { configStoreExists, getConfigStorePath, loadConfigStore } from "./utils/config-store.js";
import { log, setLogLevel } from "./utils/logger.js";

export interface Runtime {
  config: AppConfig;
  auth: AuthManager;
  client: SessionClient;
  api: TopicApi;
}

export interface RuntimeOptions {
  env?: NodeJS.ProcessEnv;
  fetch?: FetchFn;
  sleep?: SleepFn;
  cache?: TokenCache;
}

/**
 * Read the configuration and wire the auth manager, session client and topic API.
 * Nothing here touches the network.
 */
export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const env = options.env ?? process.env;
  const storePath = getConfigStorePath(env);
  const store = configStoreExists(storePath) ? loadConfigStore(storePath) : {};
  const config = loadConfig(env, store);

  if (config.debug) {
    setLogLevel("DEBUG");
  }
  log("DEBUG", `Configuration loaded (${config.auth.mode} auth, base ${config.baseUrl})`);

  const auth = createAuthManager(config, {
    fetch: options.fetch,
    timeoutMs: config.requestTimeoutMs,
    cache: options.cache,
  });

  const client = new SessionClient({
    baseUrl: config.baseUrl,
    auth,
    timeoutMs: config.requestTimeoutMs,
    rateLimitMs: config.rateLimitMs,
    fetch: options.fetch,
    sleep: options.sleep,
  });

  return { config, auth, client, api: new TopicApi(client) };
}
