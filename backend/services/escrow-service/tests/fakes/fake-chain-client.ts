import { ZeroHash } from 'ethers';
import { escrowInterface } from '../../src/blockchain/abi';
import { applyGasBuffer } from '../../src/blockchain/chain-client';
import type {
  ChainClient,
  ContractCall,
  GasEstimate,
  ReceiptLog,
  ReceiptSummary,
} from '../../src/blockchain/chain-client';
import type { EscrowEvent } from '../../src/blockchain/escrow-events';
import type { NetworkInfo } from '../../src/blockchain/network-registry';
import { FALLBACKS, GAS_BUFFER } from '../../src/config/constants';
import { VerificationError } from '../../src/errors';
import type { ListingOnChain } from '../../src/types/escrow.types';
import { Fallback, actual, fallback } from '../../src/utils/fallback';
import { BLOCKCHAIN_LISTING_ID, BUYER, ESCROW_ADDRESS, SELLER, TEST_NETWORK, TOKEN } from '../fixtures/escrow';

export interface MineOptions {
  to?: string | null;
  from?: string;
  logs?: ReceiptLog[];
}

/**
 * A log as the escrow contract emits it. `party` fills the event's address
 * argument (seller, buyer, sender or recipient).
 */
export function escrowLog(
  event: EscrowEvent,
  party: string,
  listingId: string = BLOCKCHAIN_LISTING_ID,
  address: string = ESCROW_ADDRESS
): ReceiptLog {
  const values: Record<EscrowEvent, unknown[]> = {
    ListingCreated: [listingId, party, TOKEN, 100500000n, 0, 2],
    ListingFilled: [listingId, party, 0],
    Delivered: [listingId],
    ApiApprovalRequested: [listingId, ZeroHash],
    Released: [listingId],
    Resolved: [listingId, party],
    Disputed: [listingId, party],
    ListingCancelled: [party, listingId],
  };
  const { data, topics } = escrowInterface.encodeEventLog(`DeBazaar__${event}`, values[event]);
  return { address, topics, data };
}

export interface EstimateCall {
  call: ContractCall;
  from: string;
  value: bigint;
}

/**
 * Scriptable ChainClient. Receipts are registered per hash; an unregistered
 * hash behaves like a transaction the node has never seen.
 */
export class FakeChainClient implements ChainClient {
  readonly network: NetworkInfo = TEST_NETWORK;
  readonly escrowAddress: string = ESCROW_ADDRESS;

  receipts = new Map<string, ReceiptSummary | Error>();
  onChainListings = new Map<string, Partial<ListingOnChain>>();
  rawEstimate: bigint | null = null;
  whitelisted: Fallback<boolean> = actual(true);
  decimals: Fallback<number> = actual(6);
  allowance: Fallback<bigint> = actual(0n);
  balance: Fallback<bigint> = actual(0n);
  fee: Fallback<bigint> = fallback(FALLBACKS.ENTROPY_FEE_WEI);

  estimateCalls: EstimateCall[] = [];
  receiptRequests: string[] = [];

  /** Registers a successful receipt, sent to the escrow by the buyer unless told otherwise. */
  mine(txHash: string, options: MineOptions = {}): ReceiptSummary {
    const receipt: ReceiptSummary = {
      txHash,
      to: options.to === undefined ? ESCROW_ADDRESS : options.to,
      from: options.from ?? BUYER,
      blockNumber: 1234,
      gasUsed: 21000n,
      logs: options.logs ?? [],
    };
    this.receipts.set(txHash, receipt);
    return receipt;
  }

  /** Registers a receipt of `from` calling the escrow, emitting `event` for the listing. */
  mineEvent(
    txHash: string,
    from: string,
    event: EscrowEvent,
    listingId: string = BLOCKCHAIN_LISTING_ID,
    party: string = from
  ): ReceiptSummary {
    return this.mine(txHash, { from, logs: [escrowLog(event, party, listingId)] });
  }

  fail(txHash: string, error: Error): void {
    this.receipts.set(txHash, error);
  }

  async readListing(listingId: string): Promise<ListingOnChain> {
    return {
      listingId,
      buyer: BUYER,
      seller: SELLER,
      token: TOKEN,
      amount: 100500000n,
      expiration: 0,
      deadline: 0,
      state: 'open',
      escrowType: 'disputable',
      ...this.onChainListings.get(listingId),
    };
  }

  async estimateGas(call: ContractCall, from: string, value: bigint = 0n): Promise<GasEstimate> {
    this.estimateCalls.push({ call, from, value });
    if (this.rawEstimate === null) {
      return { ok: false, reason: 'execution reverted' };
    }
    return { ok: true, raw: this.rawEstimate, gas: applyGasBuffer(this.rawEstimate, GAS_BUFFER.STANDARD) };
  }

  async waitForReceipt(txHash: string, _timeoutSeconds: number): Promise<ReceiptSummary> {
    this.receiptRequests.push(txHash);
    const outcome = this.receipts.get(txHash);
    if (outcome instanceof Error) {
      throw outcome;
    }
    if (!outcome) {
      throw VerificationError.receiptNotFound(txHash);
    }
    return outcome;
  }

  async isTokenWhitelisted(_tokenAddress: string): Promise<Fallback<boolean>> {
    return this.whitelisted;
  }

  async tokenDecimals(_tokenAddress: string): Promise<Fallback<number>> {
    return this.decimals;
  }

  async tokenAllowance(_tokenAddress: string, _owner: string, _spender: string): Promise<Fallback<bigint>> {
    return this.allowance;
  }

  async tokenBalance(_tokenAddress: string, _owner: string): Promise<Fallback<bigint>> {
    return this.balance;
  }

  async entropyFee(): Promise<Fallback<bigint>> {
    return this.fee;
  }
}
