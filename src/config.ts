import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigValidationError } from './core/errors.js';
import { DEFAULT_USER_AGENT } from './infrastructure/browser/HttpPageSession.js';

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  scheduler: {
    maxWorkers: number;
    historyCapacity: number;
  };
  crawler: {
    waitTimeoutMs: number;
    pageLoadDelayMs: number;
    itemDelayMs: number;
    clickDelayMs: number;
    maxShowMoreClicks: number;
    requestTimeoutMs: number;
    userAgent: string;
  };
  web: {
    enabled: boolean;
    port: number;
    corsOrigins: string[];
  };
  mcp: {
    enabled: boolean;
  };
}

const delay = (max: number) => z.number().int().min(0).max(max);

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  scheduler: z.object({
    maxWorkers: z.number().int().min(1).max(20),
    historyCapacity: z.number().int().min(1).max(1000),
  }),
  crawler: z.object({
    waitTimeoutMs: delay(300000),
    pageLoadDelayMs: delay(60000),
    itemDelayMs: delay(60000),
    clickDelayMs: delay(60000),
    maxShowMoreClicks: z.number().int().min(0).max(10000),
    requestTimeoutMs: z.number().int().min(1000).max(300000),
    userAgent: z.string().min(1, 'User agent must not be empty'),
  }),
  web: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(1).max(65535),
    corsOrigins: z.array(z.string().min(1)).min(1, 'At least 1 CORS origin is required'),
  }),
  mcp: z.object({
    enabled: z.boolean(),
  }),
});

export type CliArgs = Record<string, string | boolean>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --max-workers 3 --port 8000 --debug
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Get configuration from CLI arguments, then environment variables, then defaults.
 * Throws ConfigValidationError when the result does not pass the schema.
 */
export function getConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = loadEnv()
): Config {
  const cliArgs = parseArgs(argv);

  const raw = (cliKey: string, envKey: string): string | boolean | undefined => cliArgs[cliKey] ?? env[envKey];

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const value = raw(cliKey, envKey);
    return typeof value === 'string' && value !== '' ? value : defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const value = raw(cliKey, envKey);
    if (value === true || value === 'true') return true;
    if (value === false || value === 'false') return false;
    return defaultValue;
  };

  // NaN is left for the schema to reject
  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const value = raw(cliKey, envKey);
    return typeof value === 'string' && value !== '' ? Number(value) : defaultValue;
  };

  const getStringArray = (cliKey: string, envKey: string, defaultValue: string[]): string[] => {
    const value = raw(cliKey, envKey);
    if (typeof value !== 'string' || value === '') return defaultValue;
    return value
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  };

  const config: Config = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'paper-harvest-server'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    scheduler: {
      maxWorkers: getNumber('max-workers', 'MAX_WORKERS', 5),
      historyCapacity: getNumber('history-capacity', 'HISTORY_CAPACITY', 20),
    },
    crawler: {
      waitTimeoutMs: getNumber('wait-timeout', 'WAIT_TIMEOUT_MS', 10000),
      pageLoadDelayMs: getNumber('page-load-delay', 'PAGE_LOAD_DELAY_MS', 3000),
      itemDelayMs: getNumber('item-delay', 'ITEM_DELAY_MS', 2000),
      clickDelayMs: getNumber('click-delay', 'CLICK_DELAY_MS', 1000),
      maxShowMoreClicks: getNumber('max-show-more', 'MAX_SHOW_MORE_CLICKS', 1000),
      requestTimeoutMs: getNumber('request-timeout', 'REQUEST_TIMEOUT_MS', 30000),
      userAgent: getString('user-agent', 'USER_AGENT', DEFAULT_USER_AGENT),
    },
    web: {
      enabled: getBoolean('web', 'WEB_ENABLED', true),
      port: getNumber('port', 'PORT', 8000),
      corsOrigins: getStringArray('cors-origins', 'CORS_ORIGINS', ['*']),
    },
    mcp: {
      enabled: getBoolean('mcp', 'MCP_ENABLED', false),
    },
  };

  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    console.error('[Config] ✗ Configuration validation failed:');
    issues.forEach((issue) => console.error(`  - ${issue}`));
    throw new ConfigValidationError(issues);
  }

  return result.data;
}

/**
 * Variables from .env merged under the real environment
 */
function loadEnv(): NodeJS.ProcessEnv {
  dotenv.config();
  return process.env;
}

/**
 * Print configuration info
 */
export function printConfigInfo(config: Config): void {
  console.error(`\n📚 ${config.server.name} v${config.server.version}`);
  console.error(`   Workers: ${config.scheduler.maxWorkers}, history: ${config.scheduler.historyCapacity}`);
  console.error(
    `   Pacing: page ${config.crawler.pageLoadDelayMs}ms, item ${config.crawler.itemDelayMs}ms, click ${config.crawler.clickDelayMs}ms`
  );
  console.error(`   Web API: ${config.web.enabled ? `port ${config.web.port}` : 'disabled'}`);
  console.error(`   MCP (stdio): ${config.mcp.enabled ? 'enabled' : 'disabled'}`);
  if (config.server.debug) {
    console.error('   Debug logging: on');
  }
  console.error('');
}
