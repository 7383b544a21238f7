import type { ExtraDataRequest } from '../blockchain/extra-data';
import { TIME } from '../config/constants';
import { AuthorizationError, NotFoundError, ValidationError, errorMessage } from '../errors';
import type { EscrowStore } from '../models/escrow.store';
import { bytes32Schema, idSchema, purchaseSchema, validate, walletRequestSchema } from '../schemas/validation';
import type { Listing, Order } from '../types/escrow.types';
import type {
  CancelListingTx,
  DeliverListingTx,
  DisputeListingTx,
  FillListingTx,
  ResolveListingTx,
} from '../types/transaction.types';
import { sameAddress } from '../utils/addresses';
import { generateId } from '../utils/identifiers';
import { logger } from '../utils/logger';
import type { TransactionBuilder } from './transaction-builder.service';

export interface OrderServiceOptions {
  store: EscrowStore;
  builder: TransactionBuilder;
  now?: () => Date;
}

export interface PreparedPurchase {
  order: Order;
  transaction: FillListingTx;
}

export interface PreparedOrderAction<T> {
  order: Order;
  listing: Listing;
  transaction: T;
}

/**
 * Extra data for filling `listing`. The crosschain NFT check expects the
 * buyer to end up owning the token.
 */
export function extraDataForListing(listing: Listing, buyerAddress: string, tweetId?: string): ExtraDataRequest {
  switch (listing.escrowType) {
    case 'disputable':
      return { escrowType: 'disputable' };

    case 'onchain_approval': {
      const { onchainDestination, onchainCallData, onchainExpectedResult } = listing;
      if (!onchainDestination || onchainCallData === null || onchainExpectedResult === null) {
        throw ValidationError.invalidField('escrowType', 'listing is missing its on-chain approval parameters');
      }
      return {
        escrowType: 'onchain_approval',
        approval: { destination: onchainDestination, callData: onchainCallData, expectedResult: onchainExpectedResult },
      };
    }

    case 'api_approval':
      if (listing.apiApprovalMethod === 'tweet_repost') {
        if (!tweetId) {
          throw ValidationError.missingField('tweetId');
        }
        if (!listing.tweetUsername) {
          throw ValidationError.invalidField('tweetUsername', 'listing has no username to check');
        }
        return {
          escrowType: 'api_approval',
          approval: { method: 'tweet_repost', tweetId, username: listing.tweetUsername },
        };
      }
      if (listing.apiApprovalMethod === 'crosschain_nft') {
        const { crosschainRpcUrl, crosschainNftContract, crosschainTokenId } = listing;
        if (!crosschainRpcUrl || !crosschainNftContract || !crosschainTokenId) {
          throw ValidationError.invalidField('apiApprovalMethod', 'listing is missing its crosschain NFT parameters');
        }
        return {
          escrowType: 'api_approval',
          approval: {
            method: 'crosschain_nft',
            rpcUrl: crosschainRpcUrl,
            nftContract: crosschainNftContract,
            tokenId: crosschainTokenId,
            expectedOwner: buyerAddress,
          },
        };
      }
      throw ValidationError.invalidField('apiApprovalMethod', `unknown method ${String(listing.apiApprovalMethod)}`);
  }
}

export class OrderService {
  private log = logger.child({ component: 'OrderService' });
  private readonly store: EscrowStore;
  private readonly builder: TransactionBuilder;
  private readonly now: () => Date;

  constructor(options: OrderServiceOptions) {
    this.store = options.store;
    this.builder = options.builder;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Creates an order for an open listing and returns the fillListing
   * transaction for the buyer. If the transaction cannot be built the order
   * is removed again.
   */
  async preparePurchase(listingId: string, input: unknown): Promise<PreparedPurchase> {
    const id = validate(idSchema, listingId);
    const { buyerAddress, deadlineDays, tweetId } = validate(purchaseSchema, input);

    const listing = await this.store.listings.findById(id);
    if (!listing) {
      throw new NotFoundError('Listing', { listingId: id });
    }
    if (listing.status !== 'open') {
      throw ValidationError.invalidState('Listing', listing.status, ['open']);
    }

    const now = this.now();
    const nowSeconds = Math.floor(now.getTime() / 1000);
    if (nowSeconds >= listing.blockchainExpiration) {
      throw ValidationError.invalidField('listingId', 'listing has expired');
    }
    if (sameAddress(listing.sellerAddress, buyerAddress)) {
      throw ValidationError.invalidField('buyerAddress', 'seller cannot buy their own listing');
    }

    const extraData = extraDataForListing(listing, buyerAddress, tweetId);
    const deadline = nowSeconds + deadlineDays * TIME.SECONDS_PER_DAY;

    const order = await this.store.orders.create({
      orderId: generateId([listing.blockchainListingId, buyerAddress], now.getTime()),
      listingId: listing.id,
      buyerAddress,
      sellerAddress: listing.sellerAddress,
      amount: listing.price,
      tokenAddress: listing.tokenAddress,
      deadline,
      status: 'created',
      escrowTxHash: null,
      deliveryTxHash: null,
      resolutionTxHash: null,
      disputeTxHash: null,
      cancelTxHash: null,
      deliveredAt: null,
    });

    let transaction: FillListingTx;
    try {
      transaction = await this.builder.buildFillListing({
        listingId: listing.blockchainListingId,
        deadline,
        extraData,
        from: buyerAddress,
      });
    } catch (error) {
      this.log.error('Failed to build fill transaction, removing order', {
        orderId: order.id,
        listingId: listing.id,
        error: errorMessage(error),
      });
      await this.store.orders.delete(order.id);
      throw error;
    }

    this.log.info('Purchase prepared', { orderId: order.id, listingId: listing.id, deadline });
    return { order, transaction };
  }

  async prepareDelivery(orderId: string, input: unknown): Promise<PreparedOrderAction<DeliverListingTx>> {
    const { walletAddress } = validate(walletRequestSchema, input);
    const { order, listing } = await this.loadOrder(orderId);

    if (!sameAddress(listing.sellerAddress, walletAddress)) {
      throw AuthorizationError.notSeller('order');
    }
    if (order.status !== 'paid') {
      throw ValidationError.invalidState('Order', order.status, ['paid']);
    }

    const transaction = await this.builder.buildDeliverListing({
      listingId: listing.blockchainListingId,
      escrowType: listing.escrowType,
      from: walletAddress,
    });
    return { order, listing, transaction };
  }

  /**
   * Buyer acceptance releases the funds to the seller.
   */
  async prepareAcceptance(orderId: string, input: unknown): Promise<PreparedOrderAction<ResolveListingTx>> {
    const { walletAddress } = validate(walletRequestSchema, input);
    const { order, listing } = await this.loadOrder(orderId);

    if (!sameAddress(order.buyerAddress, walletAddress)) {
      throw AuthorizationError.notBuyer('order');
    }
    if (order.status !== 'delivered') {
      throw ValidationError.invalidState('Order', order.status, ['delivered']);
    }

    const transaction = await this.builder.buildResolveListing({
      listingId: listing.blockchainListingId,
      toBuyer: false,
      from: walletAddress,
    });
    return { order, listing, transaction };
  }

  async prepareDispute(orderId: string, input: unknown): Promise<PreparedOrderAction<DisputeListingTx>> {
    const { walletAddress } = validate(walletRequestSchema, input);
    const { order, listing } = await this.loadOrder(orderId);

    if (!sameAddress(order.buyerAddress, walletAddress) && !sameAddress(order.sellerAddress, walletAddress)) {
      throw AuthorizationError.notParty('order');
    }
    if (order.status !== 'paid' && order.status !== 'delivered') {
      throw ValidationError.invalidState('Order', order.status, ['paid', 'delivered']);
    }

    const transaction = await this.builder.buildDisputeListing({
      listingId: listing.blockchainListingId,
      from: walletAddress,
    });
    return { order, listing, transaction };
  }

  /**
   * cancelListingByBuyer once the seller has missed the delivery deadline.
   */
  async prepareBuyerCancel(orderId: string, input: unknown): Promise<PreparedOrderAction<CancelListingTx>> {
    const { walletAddress } = validate(walletRequestSchema, input);
    const { order, listing } = await this.loadOrder(orderId);

    if (!sameAddress(order.buyerAddress, walletAddress)) {
      throw AuthorizationError.notBuyer('order');
    }
    if (order.status !== 'paid') {
      throw ValidationError.invalidState('Order', order.status, ['paid']);
    }
    if (Math.floor(this.now().getTime() / 1000) <= order.deadline) {
      throw ValidationError.invalidField('deadline', 'delivery deadline has not passed');
    }

    const transaction = await this.builder.buildCancelListing({
      listingId: listing.blockchainListingId,
      by: 'buyer',
      from: walletAddress,
    });
    return { order, listing, transaction };
  }

  async getOrder(orderId: string): Promise<Order> {
    const { order } = await this.loadOrder(orderId);
    return order;
  }

  async getOrderByOrderId(orderId: string): Promise<Order> {
    const id = validate(bytes32Schema, orderId);
    const order = await this.store.orders.findByOrderId(id);
    if (!order) {
      throw new NotFoundError('Order', { orderId: id });
    }
    return order;
  }

  private async loadOrder(orderId: string): Promise<{ order: Order; listing: Listing }> {
    const id = validate(idSchema, orderId);
    const order = await this.store.orders.findById(id);
    if (!order) {
      throw new NotFoundError('Order', { orderId: id });
    }
    const listing = await this.store.listings.findById(order.listingId);
    if (!listing) {
      throw new NotFoundError('Listing', { listingId: order.listingId });
    }
    return { order, listing };
  }
}
