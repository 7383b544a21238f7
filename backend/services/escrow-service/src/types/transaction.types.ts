import type { Fallback } from '../utils/fallback';
import type { EscrowType } from './escrow.types';

export type GasSource = 'estimate' | 'default';

/**
 * Fields every unsigned transaction carries. `gas` is always set; `from` only
 * when the caller named a sender.
 */
export interface TransactionEnvelope {
  to: string;
  value: bigint;
  chainId: number;
  data: string;
  gas: bigint;
  gasSource: GasSource;
  from?: string;
}

export interface CreateListingTx extends TransactionEnvelope {
  action: 'createListing';
  listingId: string;
  tokenAddress: string;
  amount: bigint;
  expiration: number;
  escrowType: EscrowType;
}

export interface ApproveTokenTx extends TransactionEnvelope {
  action: 'approveToken';
  tokenAddress: string;
  spender: string;
  amount: bigint;
}

export interface FillListingTx extends TransactionEnvelope {
  action: 'fillListing';
  listingId: string;
  deadline: number;
  extraData: string;
}

export type DeliverAction =
  | 'deliverDisputableListing'
  | 'deliverOnchainApprovalListing'
  | 'deliverApiApprovalListing';

export interface DeliverListingTx extends TransactionEnvelope {
  action: DeliverAction;
  listingId: string;
}

export interface ResolveListingTx extends TransactionEnvelope {
  action: 'resolveListing';
  listingId: string;
  toBuyer: boolean;
}

export interface DisputeListingTx extends TransactionEnvelope {
  action: 'disputeListing';
  listingId: string;
  entropyFee: Fallback<bigint>;
}

export type CancelAction = 'cancelListingBySeller' | 'cancelListingByBuyer';

export interface CancelListingTx extends TransactionEnvelope {
  action: CancelAction;
  listingId: string;
}

export type UnsignedTransaction =
  | CreateListingTx
  | ApproveTokenTx
  | FillListingTx
  | DeliverListingTx
  | ResolveListingTx
  | DisputeListingTx
  | CancelListingTx;

export type TransactionAction = UnsignedTransaction['action'];

/** eth_sendTransaction parameters, hex quantities throughout. */
export interface WalletTransactionRequest {
  to: string;
  from?: string;
  value: string;
  data: string;
  gas: string;
  chainId: string;
}
