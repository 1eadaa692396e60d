import { BITCOIN_RPC, DEFAULTS, DISCOVERY, ENV_VARS } from '@common/constants/config';
import { ConfigurationError, errorMessage } from '@common/utils/error-handler';
import { Injectable, Logger } from '@nestjs/common';
import { DiscoveryConfig, RpcConfig } from '@types';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { join } from 'path';

/**
 * Configuration service with strict typing and validation
 */
@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly env: Record<string, string | undefined>;

  // Cached config values
  private rpcConfig: RpcConfig | null = null;
  private discoveryConfig: DiscoveryConfig | null = null;

  /**
   * @param overrides values that take precedence over the process environment and .env
   */
  constructor(overrides: Record<string, string> = {}) {
    // Load .env file if it exists
    try {
      const envPath = join(process.cwd(), '.env');
      if (fs.existsSync(envPath)) {
        const envConfig = dotenv.parse(fs.readFileSync(envPath));
        this.env = { ...process.env, ...envConfig, ...overrides };
        this.logger.log(`Loaded environment variables from ${envPath}`);
      } else {
        this.env = { ...process.env, ...overrides };
        this.logger.log('No .env file found, using process environment variables');
      }
    } catch (error) {
      this.logger.error(`Failed to load environment variables: ${errorMessage(error)}`);
      this.env = { ...process.env, ...overrides };
    }
  }

  /**
   * Get a string value from environment variables
   */
  get(key: string, defaultValue?: string): string {
    return this.getTransformed(key, defaultValue, value => value);
  }

  /**
   * Get a numeric value from environment variables
   */
  getNumber(key: string, defaultValue?: number): number {
    return this.getTransformed(key, defaultValue, value => {
      const num = Number(value);
      if (value.trim() === '' || isNaN(num)) {
        throw new Error(`Cannot convert "${value}" to a number`);
      }
      return num;
    });
  }

  /**
   * Get a boolean value from environment variables
   */
  getBoolean(key: string, defaultValue?: boolean): boolean {
    return this.getTransformed(key, defaultValue, value => {
      if (value.toLowerCase() === 'true' || value === '1') return true;
      if (value.toLowerCase() === 'false' || value === '0') return false;
      throw new Error(`Cannot convert "${value}" to a boolean`);
    });
  }

  /**
   * Get the application port
   */
  getPort(): number {
    return this.getNumber(ENV_VARS.PORT, DEFAULTS.PORT);
  }

  /**
   * Get the log level
   */
  getLogLevel(): string {
    return this.get(ENV_VARS.LOG_LEVEL, DEFAULTS.LOG_LEVEL);
  }

  /**
   * Whether winston should also write daily log files
   */
  get logToFile(): boolean {
    return this.getBoolean(ENV_VARS.LOG_TO_FILE, DEFAULTS.LOG_TO_FILE);
  }

  get environment(): string {
    return this.get(ENV_VARS.NODE_ENV, DEFAULTS.NODE_ENV);
  }

  /**
   * Get bitcoind RPC connection settings
   */
  getRpcConfig(): RpcConfig {
    if (!this.rpcConfig) {
      this.rpcConfig = {
        host: this.get(ENV_VARS.BITCOIN_HOST, DEFAULTS.BITCOIN_HOST),
        port: this.getNumber(ENV_VARS.BITCOIN_PORT, DEFAULTS.BITCOIN_PORT),
        user: this.get(ENV_VARS.BITCOIN_USER, DEFAULTS.BITCOIN_USER),
        password: this.get(ENV_VARS.BITCOIN_PASSWORD, DEFAULTS.BITCOIN_PASSWORD),
        timeoutMs: BITCOIN_RPC.TIMEOUT_MS,
      };
    }
    return this.rpcConfig;
  }

  /**
   * Get pod discovery settings
   */
  getDiscoveryConfig(): DiscoveryConfig {
    if (!this.discoveryConfig) {
      this.discoveryConfig = {
        serviceName: this.get(ENV_VARS.BITCOIN_SERVICE_NAME, DEFAULTS.BITCOIN_SERVICE_NAME),
        namespace: this.get(ENV_VARS.BITCOIN_NAMESPACE, DEFAULTS.BITCOIN_NAMESPACE),
        clusterDomain: DISCOVERY.CLUSTER_DOMAIN,
        maxPods: DISCOVERY.MAX_PODS,
      };
    }
    return this.discoveryConfig;
  }

  private getTransformed<T>(key: string, defaultValue: T | undefined, transform: (value: string) => T): T {
    const value = this.env[key];

    if (value === undefined) {
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      throw new ConfigurationError(`Missing required environment variable: ${key}`, key);
    }

    try {
      return transform(value);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to transform environment variable ${key}: ${errorMessage(error)}`,
        key,
      );
    }
  }
}
