import type { ChainClient, ReceiptSummary } from '../blockchain/chain-client';
import { StepProof, deliveryEvents, findEscrowEvent } from '../blockchain/escrow-events';
import { AuthorizationError, NotFoundError, ValidationError, VerificationError } from '../errors';
import type { EscrowRepositories, EscrowStore } from '../models/escrow.store';
import {
  disputeSubmissionSchema,
  idSchema,
  transactionSubmissionSchema,
  validate,
  walletRequestSchema,
} from '../schemas/validation';
import type { Dispute, Listing, Order } from '../types/escrow.types';
import { sameAddress } from '../utils/addresses';
import { blockchainStatusMachine, listingStateMachine, orderStateMachine } from '../utils/escrow-state-machine';
import { KeyedLock } from '../utils/keyed-lock';
import { logger } from '../utils/logger';

export interface ReconciliationServiceOptions {
  store: EscrowStore;
  chain: ChainClient;
  locks: KeyedLock;
  receiptTimeoutSeconds: number;
  now?: () => Date;
}

export interface OrderContext {
  order: Order;
  listing: Listing;
}

export interface DisputeConfirmation extends OrderContext {
  dispute: Dispute;
}

export interface CancelConfirmation {
  listing: Listing;
  order: Order | null;
}

type Precheck<T> = { done: true; result: T } | { done: false; proof: StepProof };

interface Confirmation<T> {
  action: string;
  lockKey: string;
  txHash: string;
  // Set when the hash is already stored on the record being confirmed
  recordedHash?: boolean;
  // Authorizes the caller, checks the precondition state and reports whether
  // this transaction was already applied. Runs before the receipt wait and
  // again under row locks.
  check: (repos: EscrowRepositories, forUpdate: boolean) => Promise<Precheck<T>>;
  apply: (repos: EscrowRepositories, receipt: ReceiptSummary) => Promise<T>;
}

export function listingLockKey(listingId: string): string {
  return `listing:${listingId}`;
}

/**
 * Advances listings and orders once the matching on-chain transaction is
 * proven. A transition needs a successful receipt sent by the acting wallet to
 * the escrow contract, carrying the escrow event of that step for the
 * listing. A hash already recorded for another step is refused. Any failure
 * leaves stored state as it was.
 *
 * Confirmations touching the same listing are serialised by an in-process
 * keyed lock and by row locks (listing row first, then order row) inside the
 * write transaction. Re-submitting an applied transaction returns the current
 * record; a different hash for an applied step is rejected.
 */
export class ReconciliationService {
  private log = logger.child({ component: 'ReconciliationService' });
  private readonly store: EscrowStore;
  private readonly chain: ChainClient;
  private readonly locks: KeyedLock;
  private readonly receiptTimeoutSeconds: number;
  private readonly now: () => Date;

  constructor(options: ReconciliationServiceOptions) {
    this.store = options.store;
    this.chain = options.chain;
    this.locks = options.locks;
    this.receiptTimeoutSeconds = options.receiptTimeoutSeconds;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Opens a listing once its recorded creation transaction is verified.
   * inactive/pending_confirmation -> open/confirmed
   */
  async finalizeListing(listingId: string, input: unknown): Promise<Listing> {
    const id = validate(idSchema, listingId);
    const { walletAddress } = validate(walletRequestSchema, input);

    const pending = await this.requireListing(this.store, id, false);
    if (!pending.creationTxHash) {
      throw ValidationError.invalidState('Listing', pending.blockchainStatus, ['pending_confirmation']);
    }
    const txHash = pending.creationTxHash;

    return this.confirm<Listing>({
      action: 'finalizeListing',
      lockKey: listingLockKey(id),
      txHash,
      recordedHash: true,
      check: async (repos, forUpdate) => {
        const listing = await this.requireListing(repos, id, forUpdate);
        if (!sameAddress(listing.sellerAddress, walletAddress)) {
          throw AuthorizationError.notSeller('listing');
        }
        if (listing.blockchainStatus === 'confirmed') {
          return { done: true, result: listing };
        }
        blockchainStatusMachine.validateTransition(listing.blockchainStatus, 'confirmed');
        listingStateMachine.validateTransition(listing.status, 'open');
        if (listing.creationTxHash !== txHash) {
          throw VerificationError.hashMismatch(txHash, String(listing.creationTxHash));
        }
        return {
          done: false,
          proof: {
            sender: walletAddress,
            listingId: listing.blockchainListingId,
            events: [{ event: 'ListingCreated', party: { arg: 'seller', address: listing.sellerAddress } }],
          },
        };
      },
      apply: (repos) => repos.listings.update(id, { status: 'open', blockchainStatus: 'confirmed' }),
    });
  }

  /**
   * Verifies the buyer's fillListing transaction.
   * order created -> paid, listing open -> filled
   */
  async confirmPurchase(orderId: string, input: unknown): Promise<OrderContext> {
    const id = validate(idSchema, orderId);
    const { walletAddress, txHash } = validate(transactionSubmissionSchema, input);
    const lockKey = await this.orderLockKey(id);

    return this.confirm<OrderContext>({
      action: 'confirmPurchase',
      lockKey,
      txHash,
      check: async (repos, forUpdate) => {
        const context = await this.loadOrder(repos, id, forUpdate);
        if (!sameAddress(context.order.buyerAddress, walletAddress)) {
          throw AuthorizationError.notBuyer('order');
        }
        if (context.order.escrowTxHash) {
          return this.alreadyApplied(context, context.order.escrowTxHash, txHash);
        }
        orderStateMachine.validateTransition(context.order.status, 'paid');
        listingStateMachine.validateTransition(context.listing.status, 'filled');
        return {
          done: false,
          proof: {
            sender: walletAddress,
            listingId: context.listing.blockchainListingId,
            events: [{ event: 'ListingFilled', party: { arg: 'buyer', address: context.order.buyerAddress } }],
          },
        };
      },
      apply: async (repos) => {
        const order = await repos.orders.update(id, { status: 'paid', escrowTxHash: txHash });
        const listing = await repos.listings.update(order.listingId, { status: 'filled' });
        return { order, listing };
      },
    });
  }

  /**
   * Verifies the seller's delivery transaction.
   * order paid -> delivered, listing filled -> delivered
   */
  async confirmDelivery(orderId: string, input: unknown): Promise<OrderContext> {
    const id = validate(idSchema, orderId);
    const { walletAddress, txHash } = validate(transactionSubmissionSchema, input);
    const lockKey = await this.orderLockKey(id);

    return this.confirm<OrderContext>({
      action: 'confirmDelivery',
      lockKey,
      txHash,
      check: async (repos, forUpdate) => {
        const context = await this.loadOrder(repos, id, forUpdate);
        if (!sameAddress(context.listing.sellerAddress, walletAddress)) {
          throw AuthorizationError.notSeller('order');
        }
        if (context.order.deliveryTxHash) {
          return this.alreadyApplied(context, context.order.deliveryTxHash, txHash);
        }
        orderStateMachine.validateTransition(context.order.status, 'delivered');
        listingStateMachine.validateTransition(context.listing.status, 'delivered');
        return {
          done: false,
          proof: {
            sender: walletAddress,
            listingId: context.listing.blockchainListingId,
            events: deliveryEvents(context.listing.escrowType),
          },
        };
      },
      apply: async (repos) => {
        const deliveredAt = this.now();
        const order = await repos.orders.update(id, { status: 'delivered', deliveryTxHash: txHash, deliveredAt });
        const listing = await repos.listings.update(order.listingId, { status: 'delivered', deliveredAt });
        return { order, listing };
      },
    });
  }

  /**
   * Verifies the buyer's resolveListing(toBuyer = false) transaction.
   * order delivered -> completed, listing delivered -> released
   */
  async confirmAcceptance(orderId: string, input: unknown): Promise<OrderContext> {
    const id = validate(idSchema, orderId);
    const { walletAddress, txHash } = validate(transactionSubmissionSchema, input);
    const lockKey = await this.orderLockKey(id);

    return this.confirm<OrderContext>({
      action: 'confirmAcceptance',
      lockKey,
      txHash,
      check: async (repos, forUpdate) => {
        const context = await this.loadOrder(repos, id, forUpdate);
        if (!sameAddress(context.order.buyerAddress, walletAddress)) {
          throw AuthorizationError.notBuyer('order');
        }
        if (context.order.resolutionTxHash) {
          return this.alreadyApplied(context, context.order.resolutionTxHash, txHash);
        }
        orderStateMachine.validateTransition(context.order.status, 'completed');
        listingStateMachine.validateTransition(context.listing.status, 'released');
        return {
          done: false,
          proof: {
            sender: walletAddress,
            listingId: context.listing.blockchainListingId,
            events: [
              { event: 'Released' },
              { event: 'Resolved', party: { arg: 'to', address: context.listing.sellerAddress } },
            ],
          },
        };
      },
      apply: async (repos) => {
        const order = await repos.orders.update(id, { status: 'completed', resolutionTxHash: txHash });
        const listing = await repos.listings.update(order.listingId, { status: 'released' });
        return { order, listing };
      },
    });
  }

  /**
   * Verifies a disputeListing transaction from the buyer or the seller and
   * opens the order's single Dispute.
   * order paid|delivered -> disputed, listing filled|delivered -> disputed
   */
  async confirmDispute(orderId: string, input: unknown): Promise<DisputeConfirmation> {
    const id = validate(idSchema, orderId);
    const { walletAddress, txHash, reason } = validate(disputeSubmissionSchema, input);
    const lockKey = await this.orderLockKey(id);

    return this.confirm<DisputeConfirmation>({
      action: 'confirmDispute',
      lockKey,
      txHash,
      check: async (repos, forUpdate) => {
        const context = await this.loadOrder(repos, id, forUpdate);
        const { order } = context;
        if (!sameAddress(order.buyerAddress, walletAddress) && !sameAddress(order.sellerAddress, walletAddress)) {
          throw AuthorizationError.notParty('order');
        }
        if (order.disputeTxHash) {
          const applied = this.alreadyApplied(context, order.disputeTxHash, txHash);
          const dispute = await repos.disputes.findByOrderId(order.id);
          if (!dispute) {
            throw new NotFoundError('Dispute', { orderId: order.id });
          }
          return applied.done ? { done: true, result: { ...applied.result, dispute } } : applied;
        }
        orderStateMachine.validateTransition(order.status, 'disputed');
        listingStateMachine.validateTransition(context.listing.status, 'disputed');
        return {
          done: false,
          proof: {
            sender: walletAddress,
            listingId: context.listing.blockchainListingId,
            events: [{ event: 'Disputed', party: { arg: 'sender', address: walletAddress } }],
          },
        };
      },
      apply: async (repos) => {
        const order = await repos.orders.update(id, { status: 'disputed', disputeTxHash: txHash });
        const listing = await repos.listings.update(order.listingId, { status: 'disputed' });
        const dispute = await repos.disputes.create({
          orderId: order.id,
          initiatorAddress: walletAddress,
          reason,
          txHash,
        });
        return { order, listing, dispute };
      },
    });
  }

  /**
   * Verifies a cancel transaction. The seller cancels an open listing; the
   * buyer cancels a filled listing whose order deadline has passed, which
   * also cancels the paid order.
   */
  async confirmCancel(listingId: string, input: unknown): Promise<CancelConfirmation> {
    const id = validate(idSchema, listingId);
    const { walletAddress, txHash } = validate(transactionSubmissionSchema, input);

    return this.confirm<CancelConfirmation>({
      action: 'confirmCancel',
      lockKey: listingLockKey(id),
      txHash,
      check: async (repos, forUpdate) => {
        const listing = await this.requireListing(repos, id, forUpdate);
        const [paid] = await repos.orders.findByListing(id, ['paid', 'canceled']);
        const order = paid ? await repos.orders.findById(paid.id, { forUpdate }) : null;

        const proof: StepProof = {
          sender: walletAddress,
          listingId: listing.blockchainListingId,
          events: [{ event: 'ListingCancelled', party: { arg: 'sender', address: walletAddress } }],
        };

        if (listing.cancelTxHash) {
          if (order && order.cancelTxHash === listing.cancelTxHash) {
            if (!sameAddress(order.buyerAddress, walletAddress)) {
              throw AuthorizationError.notBuyer('listing');
            }
          } else if (!sameAddress(listing.sellerAddress, walletAddress)) {
            throw AuthorizationError.notSeller('listing');
          }
          if (listing.cancelTxHash !== txHash) {
            throw VerificationError.hashMismatch(txHash, listing.cancelTxHash);
          }
          return { done: true, result: { listing, order } };
        }

        if (listing.status === 'open') {
          if (!sameAddress(listing.sellerAddress, walletAddress)) {
            throw AuthorizationError.notSeller('listing');
          }
          return { done: false, proof };
        }

        if (!order || !sameAddress(order.buyerAddress, walletAddress)) {
          throw AuthorizationError.notBuyer('listing');
        }
        listingStateMachine.validateTransition(listing.status, 'canceled');
        orderStateMachine.validateTransition(order.status, 'canceled');
        return { done: false, proof };
      },
      apply: async (repos) => {
        const listing = await repos.listings.update(id, { status: 'canceled', cancelTxHash: txHash });
        const [paid] = await repos.orders.findByListing(id, ['paid']);
        const order = paid ? await repos.orders.update(paid.id, { status: 'canceled', cancelTxHash: txHash }) : null;
        return { listing, order };
      },
    });
  }

  /**
   * Waits for the receipt and checks it targets the escrow contract. With a
   * proof, also checks the sender and looks for one of the step's events.
   */
  async verifyEscrowTransaction(
    txHash: string,
    proof?: StepProof,
    action: string = 'the step'
  ): Promise<ReceiptSummary> {
    const receipt = await this.chain.waitForReceipt(txHash, this.receiptTimeoutSeconds);
    if (!sameAddress(receipt.to, this.chain.escrowAddress)) {
      throw VerificationError.wrongDestination(txHash, this.chain.escrowAddress, receipt.to);
    }
    if (!proof) {
      return receipt;
    }

    if (!sameAddress(receipt.from, proof.sender)) {
      throw VerificationError.wrongSender(txHash, proof.sender, receipt.from);
    }
    const match = findEscrowEvent(receipt, this.chain.escrowAddress, proof.listingId, proof.events);
    if (!match) {
      throw VerificationError.eventNotFound(txHash, action, proof.listingId);
    }
    this.log.debug('Escrow event matched', { txHash, event: match.event, listingId: proof.listingId });
    return receipt;
  }

  private async confirm<T>(confirmation: Confirmation<T>): Promise<T> {
    const { action, lockKey, txHash } = confirmation;

    return this.locks.withLock(lockKey, async () => {
      const before = await confirmation.check(this.store, false);
      if (before.done) {
        this.log.info('Transaction already reconciled', { action, txHash });
        return before.result;
      }
      if (!confirmation.recordedHash) {
        await this.assertHashUnused(this.store, txHash);
      }

      let receipt: ReceiptSummary;
      try {
        receipt = await this.verifyEscrowTransaction(txHash, before.proof, action);
      } catch (error) {
        this.log.warn('Transaction verification failed', {
          action,
          txHash,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      const result = await this.store.transaction(async (repos) => {
        const locked = await confirmation.check(repos, true);
        if (locked.done) {
          return locked.result;
        }
        if (!confirmation.recordedHash) {
          await this.assertHashUnused(repos, txHash);
        }
        return confirmation.apply(repos, receipt);
      });

      this.log.info('Transaction reconciled', { action, txHash, blockNumber: receipt.blockNumber });
      return result;
    });
  }

  private async assertHashUnused(repos: EscrowRepositories, txHash: string): Promise<void> {
    const [listing, order] = await Promise.all([
      repos.listings.findByTxHash(txHash),
      repos.orders.findByTxHash(txHash),
    ]);
    if (listing || order) {
      throw VerificationError.hashReused(txHash);
    }
  }

  private alreadyApplied(context: OrderContext, recorded: string, submitted: string): Precheck<OrderContext> {
    if (recorded !== submitted) {
      throw VerificationError.hashMismatch(submitted, recorded);
    }
    return { done: true, result: context };
  }

  private async orderLockKey(orderId: string): Promise<string> {
    const order = await this.store.orders.findById(orderId);
    if (!order) {
      throw new NotFoundError('Order', { orderId });
    }
    return listingLockKey(order.listingId);
  }

  private async requireListing(repos: EscrowRepositories, id: string, forUpdate: boolean): Promise<Listing> {
    const listing = await repos.listings.findById(id, { forUpdate });
    if (!listing) {
      throw new NotFoundError('Listing', { listingId: id });
    }
    return listing;
  }

  private async loadOrder(repos: EscrowRepositories, id: string, forUpdate: boolean): Promise<OrderContext> {
    const unlocked = await repos.orders.findById(id);
    if (!unlocked) {
      throw new NotFoundError('Order', { orderId: id });
    }
    const listing = await this.requireListing(repos, unlocked.listingId, forUpdate);
    const order = forUpdate ? await repos.orders.findById(id, { forUpdate }) : unlocked;
    if (!order) {
      throw new NotFoundError('Order', { orderId: id });
    }
    return { order, listing };
  }
}
