import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './core/errors.js';
import { toValidationIssues } from './core/validation.js';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  http: {
    host: string;
    port: number;
    corsOrigins: string[];
  };
  database: {
    path: string;
  };
}

const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  http: z.object({
    host: z.string().min(1, 'Host must not be empty'),
    port: z.number().int().min(0).max(65535),
    corsOrigins: z.array(z.string().min(1)).min(1, 'At least 1 CORS origin is required'),
  }),
  database: z.object({
    path: z.string().min(1, 'Database path must not be empty'),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --port 8000 --database-path data/chat.db --debug
 */
function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = argv[i + 1];

      // Check if next arg is a value or another flag
      if (next !== undefined && !next.startsWith('--')) {
        args[key] = next;
        i++;
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Get configuration from CLI arguments, then environment variables, then defaults.
 * Throws ConfigurationError when the result fails validation.
 */
export function getConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cliValue = cliArgs[cliKey];
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const getStringArray = (cliKey: string, envKey: string, defaultValue: string[]): string[] => {
    const cliValue = cliArgs[cliKey];
    const value = typeof cliValue === 'string' ? cliValue : env[envKey];
    if (!value) return defaultValue;
    return value.split(',').map((s) => s.trim());
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'chat-relay-backend'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    http: {
      host: getString('host', 'HOST', '0.0.0.0'),
      port: getNumber('port', 'PORT', 8000),
      corsOrigins: getStringArray('cors-origins', 'CORS_ORIGINS', ['*']),
    },
    database: {
      path: getString('database-path', 'DATABASE_PATH', 'data/chat.db'),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    console.error('\n❌ Configuration Validation Failed!\n');
    console.error('Errors:');
    issues.forEach((issue) => console.error(`  • ${issue.path}: ${issue.message}`));
    console.error('\n💡 Tips:');
    console.error('  - Check your .env file');
    console.error('  - Verify CLI arguments');
    console.error('  - PORT must be an integer between 0 and 65535');
    console.error();
    throw new ConfigurationError(issues);
  }

  return result.data;
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  const title = `${config.server.name} v${config.server.version}`;
  const width = Math.max(title.length + 8, 48);

  console.error('╔' + '═'.repeat(width) + '╗');
  console.error('║' + title.padStart((width + title.length) / 2).padEnd(width) + '║');
  console.error('╚' + '═'.repeat(width) + '╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🌐 HTTP:   http://${config.http.host}:${config.http.port}`);
  console.error(`🔓 CORS:   ${config.http.corsOrigins.join(', ')}`);
  console.error(`💾 Store:  ${config.database.path}`);

  console.error('\n' + '─'.repeat(width));
}
