import path from 'path';
import type { Knex } from 'knex';
import { ChainClient, EthersChainClient, RpcProvider } from './blockchain/chain-client';
import type { OracleSources } from './blockchain/extra-data';
import { NetworkRegistry } from './blockchain/network-registry';
import type { EscrowServiceConfig, OracleConfig } from './config';
import { createDatabase } from './config/database';
import { DisputeEligibilityJobRunner, DisputeEligibilityScanner } from './jobs/dispute-eligibility';
import { EscrowStore, KnexEscrowStore } from './models/escrow.store';
import { DisputeService } from './services/dispute.service';
import { ListingService } from './services/listing.service';
import { OrderService } from './services/order.service';
import { ReconciliationService } from './services/reconciliation.service';
import { OracleSettings, TransactionBuilder } from './services/transaction-builder.service';
import { KeyedLock } from './utils/keyed-lock';
import { logger } from './utils/logger';
import { loadOracleSource } from './utils/oracle-source';

export const ORACLE_SOURCE_FILES: Readonly<Record<keyof OracleSources, string>> = {
  tweet_repost: 'tweet-repost.js',
  crosschain_nft: 'crosschain-nft.js',
};

export interface EscrowCore {
  config: EscrowServiceConfig;
  registry: NetworkRegistry;
  chain: ChainClient;
  store: EscrowStore;
  builder: TransactionBuilder;
  listings: ListingService;
  orders: OrderService;
  reconciliation: ReconciliationService;
  disputes: DisputeService;
  disputeScanner: DisputeEligibilityScanner;
  disputeScanJob: DisputeEligibilityJobRunner;
  db: Knex | null;
}

/**
 * Replacements for the pieces that reach outside the process.
 */
export interface EscrowCoreOverrides {
  store?: EscrowStore;
  chain?: ChainClient;
  provider?: RpcProvider;
  oracleSources?: OracleSources;
  now?: () => Date;
}

export function loadOracleSources(sourcesDir: string): OracleSources {
  return {
    tweet_repost: loadOracleSource(path.join(sourcesDir, ORACLE_SOURCE_FILES.tweet_repost)),
    crosschain_nft: loadOracleSource(path.join(sourcesDir, ORACLE_SOURCE_FILES.crosschain_nft)),
  };
}

export function oracleSettings(oracle: OracleConfig, sources: OracleSources): OracleSettings {
  return {
    subscriptionId: oracle.subscriptionId,
    donId: oracle.donId,
    secretsSlot: oracle.secretsSlot,
    secretsVersion: oracle.secretsVersion,
    callbackGasLimit: oracle.callbackGasLimit,
    encryptedSecretsUrls: oracle.encryptedSecretsUrls,
    sources,
  };
}

/**
 * Wires the escrow core from explicit configuration. Nothing here is a module
 * singleton; two cores built from different configs do not share state.
 */
export async function createEscrowCore(
  config: EscrowServiceConfig,
  overrides: EscrowCoreOverrides = {}
): Promise<EscrowCore> {
  const registry = new NetworkRegistry({
    defaultNetwork: config.network,
    rpcUrlOverride: config.rpcUrlOverride,
  });
  const network = registry.resolveNetwork();

  const chain =
    overrides.chain ??
    (await EthersChainClient.connect({
      network,
      escrowAddress: registry.resolveContractAddress(network.name, 'escrow'),
      provider: overrides.provider,
    }));

  let db: Knex | null = null;
  let store = overrides.store;
  if (!store) {
    db = createDatabase(config.database);
    store = new KnexEscrowStore(db);
  }

  const sources = overrides.oracleSources ?? loadOracleSources(config.oracle.sourcesDir);
  const builder = new TransactionBuilder(chain, oracleSettings(config.oracle, sources));
  const locks = new KeyedLock();
  const now = overrides.now;

  const disputeScanner = new DisputeEligibilityScanner({
    orders: store.orders,
    graceSeconds: config.disputeScan.graceSeconds,
    batchSize: config.disputeScan.batchSize,
    now,
  });

  logger.info('Escrow core initialised', {
    network: network.name,
    chainId: network.chainId,
    escrowAddress: chain.escrowAddress,
  });

  return {
    config,
    registry,
    chain,
    store,
    builder,
    listings: new ListingService({ store, builder, chain, registry, networkName: network.name, now }),
    orders: new OrderService({ store, builder, now }),
    reconciliation: new ReconciliationService({
      store,
      chain,
      locks,
      receiptTimeoutSeconds: config.receiptTimeoutSeconds,
      now,
    }),
    disputes: new DisputeService({ store, chain, locks, now }),
    disputeScanner,
    disputeScanJob: new DisputeEligibilityJobRunner(disputeScanner, config.disputeScan.intervalMs),
    db,
  };
}
