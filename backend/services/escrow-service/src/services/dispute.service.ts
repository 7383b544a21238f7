import type { ChainClient } from '../blockchain/chain-client';
import { NotFoundError, ValidationError } from '../errors';
import type { EscrowRepositories, EscrowStore } from '../models/escrow.store';
import { idSchema, resolutionSchema, validate } from '../schemas/validation';
import type { ArbitratorResult, Dispute, Listing, ListingStatus, OnChainListingState } from '../types/escrow.types';
import { listingStateMachine } from '../utils/escrow-state-machine';
import type { KeyedLock } from '../utils/keyed-lock';
import { logger } from '../utils/logger';
import { listingLockKey } from './reconciliation.service';

export interface DisputeServiceOptions {
  store: EscrowStore;
  chain: ChainClient;
  locks: KeyedLock;
  now?: () => Date;
}

export interface DisputeResolution {
  dispute: Dispute;
  listing: Listing;
}

const OUTCOMES: Partial<Record<OnChainListingState, { result: ArbitratorResult; listingStatus: ListingStatus }>> = {
  released: { result: 'seller', listingStatus: 'released' },
  refunded: { result: 'buyer', listingStatus: 'refunded' },
};

/**
 * Records arbitration outcomes. The arbiter settles on-chain; this service
 * only mirrors the contract's final listing state.
 */
export class DisputeService {
  private log = logger.child({ component: 'DisputeService' });
  private readonly store: EscrowStore;
  private readonly chain: ChainClient;
  private readonly locks: KeyedLock;
  private readonly now: () => Date;

  constructor(options: DisputeServiceOptions) {
    this.store = options.store;
    this.chain = options.chain;
    this.locks = options.locks;
    this.now = options.now ?? (() => new Date());
  }

  async getDisputeForOrder(orderId: string): Promise<Dispute> {
    const id = validate(idSchema, orderId);
    const dispute = await this.store.disputes.findByOrderId(id);
    if (!dispute) {
      throw new NotFoundError('Dispute', { orderId: id });
    }
    return dispute;
  }

  /**
   * Closes a dispute from the listing's on-chain state: released means the
   * seller won, refunded means the buyer did. Any other state is still
   * awaiting arbitration.
   */
  async recordResolution(disputeId: string, input: unknown = {}): Promise<DisputeResolution> {
    const id = validate(idSchema, disputeId);
    const { notes } = validate(resolutionSchema, input);

    const initial = await this.loadDispute(this.store, id, false);

    return this.locks.withLock(listingLockKey(initial.listing.id), async () => {
      const current = await this.loadDispute(this.store, id, false);
      if (current.dispute.status === 'resolved') {
        return current;
      }

      const onChain = await this.chain.readListing(current.listing.blockchainListingId);
      const outcome = OUTCOMES[onChain.state];
      if (!outcome) {
        throw ValidationError.invalidState('On-chain listing', onChain.state, ['released', 'refunded']);
      }

      return this.store.transaction(async (repos) => {
        const locked = await this.loadDispute(repos, id, true);
        if (locked.dispute.status === 'resolved') {
          return locked;
        }

        listingStateMachine.validateTransition(locked.listing.status, outcome.listingStatus);
        const listing = await repos.listings.update(locked.listing.id, { status: outcome.listingStatus });
        const dispute = await repos.disputes.update(id, {
          status: 'resolved',
          arbitratorResult: outcome.result,
          arbitratorNotes: notes ?? null,
          resolvedAt: this.now(),
        });

        this.log.info('Dispute resolved', {
          disputeId: id,
          orderId: dispute.orderId,
          result: outcome.result,
        });
        return { dispute, listing };
      });
    });
  }

  private async loadDispute(repos: EscrowRepositories, id: string, forUpdate: boolean): Promise<DisputeResolution> {
    const found = await repos.disputes.findById(id);
    if (!found) {
      throw new NotFoundError('Dispute', { disputeId: id });
    }
    const order = await repos.orders.findById(found.orderId);
    if (!order) {
      throw new NotFoundError('Order', { orderId: found.orderId });
    }
    const listing = await repos.listings.findById(order.listingId, { forUpdate });
    if (!listing) {
      throw new NotFoundError('Listing', { listingId: order.listingId });
    }
    const dispute = forUpdate ? await repos.disputes.findById(id, { forUpdate }) : found;
    if (!dispute) {
      throw new NotFoundError('Dispute', { disputeId: id });
    }
    return { dispute, listing };
  }
}
