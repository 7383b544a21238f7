export { createEscrowCore, loadOracleSources, oracleSettings } from './app';
export type { EscrowCore, EscrowCoreOverrides } from './app';
export { loadConfig } from './config';
export type { EscrowServiceConfig } from './config';

export { NetworkRegistry } from './blockchain/network-registry';
export type { NetworkInfo } from './blockchain/network-registry';
export { EthersChainClient, applyGasBuffer } from './blockchain/chain-client';
export type { ChainClient, GasEstimate, ReceiptSummary, RpcProvider } from './blockchain/chain-client';
export { encodeExtraData } from './blockchain/extra-data';

export { TransactionBuilder, toWalletRequest } from './services/transaction-builder.service';
export { ReconciliationService } from './services/reconciliation.service';
export { ListingService } from './services/listing.service';
export { OrderService } from './services/order.service';
export { DisputeService } from './services/dispute.service';
export { DisputeEligibilityJobRunner, DisputeEligibilityScanner } from './jobs/dispute-eligibility';

export { KnexEscrowStore } from './models/escrow.store';
export type { EscrowRepositories, EscrowStore } from './models/escrow.store';

export * from './errors';
export * from './types/escrow.types';
export * from './types/transaction.types';
export type { Fallback } from './utils/fallback';
export { generateId } from './utils/identifiers';
export { fromMinorUnits, toMinorUnits } from './utils/amounts';
