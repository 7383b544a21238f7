import path from 'path';
import dotenv from 'dotenv';
import { Environment, validateAndFail } from './validate';

// Load environment variables
dotenv.config();

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface OracleConfig {
  subscriptionId: bigint;
  donId: string;
  secretsSlot: number;
  secretsVersion: bigint;
  callbackGasLimit: number;
  encryptedSecretsUrls: string;
  sourcesDir: string;
}

export interface DisputeScanConfig {
  graceSeconds: number;
  intervalMs: number;
  batchSize: number;
}

export interface EscrowServiceConfig {
  env: string;
  network: string;
  rpcUrlOverride?: string;
  receiptTimeoutSeconds: number;
  oracle: OracleConfig;
  disputeScan: DisputeScanConfig;
  database: DatabaseConfig;
}

export const DEFAULT_ORACLE_SOURCES_DIR = path.resolve(__dirname, '..', '..', 'oracle-sources');

/**
 * Builds the service configuration from an environment map. Throws
 * ConfigError when any variable fails validation.
 */
export function loadConfig(env: Environment = process.env): EscrowServiceConfig {
  const values = validateAndFail(env);
  const int = (name: string): number => parseInt(values[name], 10);

  return {
    env: values.NODE_ENV,
    network: values.BLOCKCHAIN_NETWORK,
    rpcUrlOverride: values.BLOCKCHAIN_RPC_URL,
    receiptTimeoutSeconds: int('RECEIPT_TIMEOUT_SECONDS'),
    oracle: {
      subscriptionId: BigInt(values.ORACLE_SUBSCRIPTION_ID),
      donId: values.ORACLE_DON_ID,
      secretsSlot: int('ORACLE_SECRETS_SLOT'),
      secretsVersion: BigInt(values.ORACLE_SECRETS_VERSION),
      callbackGasLimit: int('ORACLE_CALLBACK_GAS_LIMIT'),
      encryptedSecretsUrls: values.ORACLE_ENCRYPTED_SECRETS_URLS,
      sourcesDir: values.ORACLE_SOURCES_DIR ?? DEFAULT_ORACLE_SOURCES_DIR,
    },
    disputeScan: {
      graceSeconds: int('SELLER_DISPUTE_GRACE_SECONDS'),
      intervalMs: int('DISPUTE_SCAN_INTERVAL_MS'),
      batchSize: int('DISPUTE_SCAN_BATCH_SIZE'),
    },
    database: {
      connectionString: values.DATABASE_URL,
      host: values.DB_HOST,
      port: int('DB_PORT'),
      database: values.DB_NAME,
      user: values.DB_USER,
      password: values.DB_PASSWORD,
    },
  };
}
