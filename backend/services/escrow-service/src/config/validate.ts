/**
 * Configuration validation for the escrow service.
 *
 * Every environment variable the service reads is listed here with its
 * default and format check. `validateAndFail` collects all problems before
 * throwing so a misconfigured deployment reports everything at once.
 */

import { ConfigError } from '../errors';
import { logger } from '../utils/logger';

interface ConfigRequirement {
  name: string;
  required: boolean;
  sensitive?: boolean;
  validator?: (value: string) => boolean;
  default?: string;
  description: string;
}

export type Environment = Record<string, string | undefined>;

const isPositiveInt = (v: string): boolean => /^\d+$/.test(v) && parseInt(v, 10) > 0;
const isNonNegativeInt = (v: string): boolean => /^\d+$/.test(v);
const isHttpUrl = (v: string): boolean => v.startsWith('http://') || v.startsWith('https://');
const isBytes32 = (v: string): boolean => /^0x[0-9a-fA-F]{64}$/.test(v);
const isHexBytes = (v: string): boolean => /^0x([0-9a-fA-F]{2})*$/.test(v);

export const CONFIG_REQUIREMENTS: ConfigRequirement[] = [
  // Application
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Runtime environment'
  },
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'info',
    validator: (v) => ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'].includes(v),
    description: 'Logging level'
  },

  // Database
  {
    name: 'DATABASE_URL',
    required: false,
    sensitive: true,
    validator: (v) => v.startsWith('postgres://') || v.startsWith('postgresql://'),
    description: 'PostgreSQL connection string (overrides DB_HOST/DB_PORT/DB_NAME/DB_USER/DB_PASSWORD)'
  },
  { name: 'DB_HOST', required: false, default: 'localhost', description: 'PostgreSQL host' },
  { name: 'DB_PORT', required: false, default: '5432', validator: isPositiveInt, description: 'PostgreSQL port' },
  { name: 'DB_NAME', required: false, default: 'escrow', description: 'PostgreSQL database' },
  { name: 'DB_USER', required: false, default: 'postgres', description: 'PostgreSQL user' },
  { name: 'DB_PASSWORD', required: false, sensitive: true, default: 'postgres', description: 'PostgreSQL password' },

  // Chain
  {
    name: 'BLOCKCHAIN_NETWORK',
    required: false,
    default: 'arbitrum_sepolia',
    validator: (v) => /^[a-z0-9_]+$/.test(v),
    description: 'Active network name'
  },
  {
    name: 'BLOCKCHAIN_RPC_URL',
    required: false,
    validator: isHttpUrl,
    description: 'RPC endpoint overriding the network default'
  },
  {
    name: 'RECEIPT_TIMEOUT_SECONDS',
    required: false,
    default: '120',
    validator: isPositiveInt,
    description: 'How long to wait for a transaction receipt'
  },

  // Oracle
  {
    name: 'ORACLE_SUBSCRIPTION_ID',
    required: false,
    default: '518',
    validator: isNonNegativeInt,
    description: 'Oracle billing subscription id'
  },
  {
    name: 'ORACLE_DON_ID',
    required: false,
    default: '0x66756e2d617262697472756d2d7365706f6c69612d3100000000000000000000',
    validator: isBytes32,
    description: 'Oracle network id (bytes32)'
  },
  {
    name: 'ORACLE_SECRETS_SLOT',
    required: false,
    default: '0',
    validator: (v) => isNonNegativeInt(v) && parseInt(v, 10) < 256,
    description: 'Hosted secrets slot'
  },
  {
    name: 'ORACLE_SECRETS_VERSION',
    required: false,
    default: '0',
    validator: isNonNegativeInt,
    description: 'Hosted secrets version'
  },
  {
    name: 'ORACLE_CALLBACK_GAS_LIMIT',
    required: false,
    default: '300000',
    validator: isPositiveInt,
    description: 'Gas limit for the oracle fulfilment callback'
  },
  {
    name: 'ORACLE_ENCRYPTED_SECRETS_URLS',
    required: false,
    sensitive: true,
    default: '0x',
    validator: isHexBytes,
    description: 'Encrypted secrets URLs (hex bytes)'
  },
  {
    name: 'ORACLE_SOURCES_DIR',
    required: false,
    description: 'Directory holding the oracle scripts'
  },

  // Dispute eligibility sweep
  {
    name: 'SELLER_DISPUTE_GRACE_SECONDS',
    required: false,
    default: '3600',
    validator: isNonNegativeInt,
    description: 'Seconds after delivery before a seller may dispute'
  },
  {
    name: 'DISPUTE_SCAN_INTERVAL_MS',
    required: false,
    default: '60000',
    validator: isPositiveInt,
    description: 'Interval between eligibility sweeps'
  },
  {
    name: 'DISPUTE_SCAN_BATCH_SIZE',
    required: false,
    default: '100',
    validator: isPositiveInt,
    description: 'Maximum orders reported per sweep'
  }
];

interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  config: Record<string, string>;
}

export function validateConfig(env: Environment = process.env): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const config: Record<string, string> = {};

  for (const requirement of CONFIG_REQUIREMENTS) {
    const value = env[requirement.name];

    if (!value) {
      if (requirement.required) {
        errors.push(`Missing required config: ${requirement.name} (${requirement.description})`);
      } else if (requirement.default !== undefined) {
        config[requirement.name] = requirement.default;
        warnings.push(
          `Using default for ${requirement.name}: ${requirement.sensitive ? '[REDACTED]' : requirement.default}`
        );
      }
      continue;
    }

    if (requirement.validator && !requirement.validator(value)) {
      errors.push(`Invalid config: ${requirement.name} - value doesn't pass validation (${requirement.description})`);
      continue;
    }

    config[requirement.name] = value;
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config
  };
}

export function validateAndFail(env: Environment = process.env): Record<string, string> {
  const log = logger.child({ component: 'ConfigValidation' });
  const result = validateConfig(env);

  for (const warning of result.warnings) {
    log.debug(warning);
  }

  if (!result.valid) {
    log.error('Configuration validation failed', { errors: result.errors });
    throw new ConfigError(`Configuration validation failed: ${result.errors.join('; ')}`, {
      errors: result.errors
    });
  }

  return result.config;
}
