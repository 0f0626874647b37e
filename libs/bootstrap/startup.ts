import { logger } from "../logging/logger.js";
import { RegistryConfig, loadRegistryConfig } from "./config/registry-config.js";
import { Env } from "./config-guard.js";

/**
 * Loads and guards configuration, then applies the log level.
 */
export function bootstrap(serviceName: string, env: Env = process.env): RegistryConfig {
    logger.info({ serviceName }, "Bootstrapping service");

    const config = loadRegistryConfig(env);
    logger.level = config.logLevel;

    logger.info({ serviceName, nodeEnv: config.nodeEnv, persistence: config.databaseUrl ? 'postgres' : 'memory' }, "Startup checks passed");
    return config;
}
