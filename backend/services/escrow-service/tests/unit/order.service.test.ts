import { escrowInterface } from '../../src/blockchain/abi';
import { AuthorizationError, ErrorCode, ValidationError } from '../../src/errors';
import { OrderService, extraDataForListing } from '../../src/services/order.service';
import { TransactionBuilder } from '../../src/services/transaction-builder.service';
import { generateId } from '../../src/utils/identifiers';
import { FakeChainClient } from '../fakes/fake-chain-client';
import { InMemoryEscrowStore } from '../fakes/in-memory-store';
import {
  BLOCKCHAIN_LISTING_ID,
  BUYER,
  NFT_CONTRACT,
  NOW,
  NOW_SECONDS,
  SELLER,
  STRANGER,
  TEST_ORACLE,
  buildListing,
  buildOrder,
} from '../fixtures/escrow';

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected rejection');
}

describe('extraDataForListing', () => {
  it('expects the buyer to own the crosschain NFT', () => {
    const listing = buildListing({
      escrowType: 'api_approval',
      apiApprovalMethod: 'crosschain_nft',
      crosschainRpcUrl: 'https://rpc.example.org',
      crosschainNftContract: NFT_CONTRACT,
      crosschainTokenId: '42',
    });

    expect(extraDataForListing(listing, BUYER)).toEqual({
      escrowType: 'api_approval',
      approval: {
        method: 'crosschain_nft',
        rpcUrl: 'https://rpc.example.org',
        nftContract: NFT_CONTRACT,
        tokenId: '42',
        expectedOwner: BUYER,
      },
    });
  });

  it('passes the on-chain approval call through', () => {
    const listing = buildListing({
      escrowType: 'onchain_approval',
      onchainDestination: NFT_CONTRACT,
      onchainCallData: '0x1234',
      onchainExpectedResult: '0x',
    });

    expect(extraDataForListing(listing, BUYER)).toEqual({
      escrowType: 'onchain_approval',
      approval: { destination: NFT_CONTRACT, callData: '0x1234', expectedResult: '0x' },
    });
  });

  it('needs a tweet id for a repost check', () => {
    const listing = buildListing({
      escrowType: 'api_approval',
      apiApprovalMethod: 'tweet_repost',
      tweetUsername: 'synthshop',
    });

    expect(() => extraDataForListing(listing, BUYER)).toThrow('Missing required field: tweetId');
    expect(extraDataForListing(listing, BUYER, '1790000000000000000')).toEqual({
      escrowType: 'api_approval',
      approval: { method: 'tweet_repost', tweetId: '1790000000000000000', username: 'synthshop' },
    });
  });
});

describe('OrderService', () => {
  let store: InMemoryEscrowStore;
  let chain: FakeChainClient;
  let builder: TransactionBuilder;
  let service: OrderService;

  beforeEach(() => {
    store = new InMemoryEscrowStore();
    chain = new FakeChainClient();
    builder = new TransactionBuilder(chain, TEST_ORACLE);
    service = new OrderService({ store, builder, now: () => NOW });
  });

  describe('preparePurchase', () => {
    it('creates an order and returns the fillListing transaction', async () => {
      const listing = store.seedListing(buildListing());

      const { order, transaction } = await service.preparePurchase(listing.id, { buyerAddress: BUYER });

      expect(order).toMatchObject({
        orderId: generateId([BLOCKCHAIN_LISTING_ID, BUYER], NOW.getTime()),
        listingId: listing.id,
        buyerAddress: BUYER,
        sellerAddress: SELLER,
        amount: '100.5',
        deadline: 1767830400,
        status: 'created',
      });
      expect(transaction).toMatchObject({
        action: 'fillListing',
        listingId: BLOCKCHAIN_LISTING_ID,
        deadline: 1767830400,
        extraData: '0x',
        from: BUYER,
        gas: 250000n,
      });
      expect(transaction.data).toBe(
        escrowInterface.encodeFunctionData('fillListing', [BLOCKCHAIN_LISTING_ID, 1767830400, '0x'])
      );
      expect(store.allOrders()).toHaveLength(1);
    });

    it('uses the requested deadline', async () => {
      const listing = store.seedListing(buildListing());

      const { order } = await service.preparePurchase(listing.id, { buyerAddress: BUYER, deadlineDays: 14 });

      expect(order.deadline).toBe(NOW_SECONDS + 14 * 86400);
    });

    it('rejects the seller buying their own listing', async () => {
      const listing = store.seedListing(buildListing());

      const error = await captureError(service.preparePurchase(listing.id, { buyerAddress: SELLER }));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: 'buyerAddress' });
      expect(store.allOrders()).toEqual([]);
    });

    it('rejects an expired listing', async () => {
      const listing = store.seedListing(buildListing({ blockchainExpiration: NOW_SECONDS }));

      const error = await captureError(service.preparePurchase(listing.id, { buyerAddress: BUYER }));

      expect(error).toMatchObject({ field: 'listingId', message: 'Invalid listingId: listing has expired' });
    });

    it('rejects a listing that is not open', async () => {
      const listing = store.seedListing(buildListing({ status: 'filled' }));

      const error = await captureError(service.preparePurchase(listing.id, { buyerAddress: BUYER }));

      expect(error).toMatchObject({ code: ErrorCode.INVALID_STATE });
    });

    it('creates no order when extra data is incomplete', async () => {
      const listing = store.seedListing(
        buildListing({ escrowType: 'api_approval', apiApprovalMethod: 'tweet_repost', tweetUsername: 'synthshop' })
      );

      const error = await captureError(service.preparePurchase(listing.id, { buyerAddress: BUYER }));

      expect(error).toMatchObject({ field: 'tweetId' });
      expect(store.allOrders()).toEqual([]);
    });

    it('removes the order when the transaction cannot be built', async () => {
      const listing = store.seedListing(buildListing());
      jest.spyOn(builder, 'buildFillListing').mockRejectedValue(new Error('node unavailable'));

      await expect(service.preparePurchase(listing.id, { buyerAddress: BUYER })).rejects.toThrow('node unavailable');
      expect(store.allOrders()).toEqual([]);
    });
  });

  describe('prepareDelivery', () => {
    it('checks the seller before the order status', async () => {
      const listing = store.seedListing(buildListing());
      const order = store.seedOrder(buildOrder(listing, { status: 'created' }));

      const error = await captureError(service.prepareDelivery(order.id, { walletAddress: STRANGER }));

      expect(error).toBeInstanceOf(AuthorizationError);
    });

    it('refuses an unpaid order', async () => {
      const listing = store.seedListing(buildListing());
      const order = store.seedOrder(buildOrder(listing, { status: 'created' }));

      const error = await captureError(service.prepareDelivery(order.id, { walletAddress: SELLER }));

      expect(error).toMatchObject({ code: ErrorCode.INVALID_STATE, message: 'Order is created, expected paid' });
    });

    it('picks the delivery call for the escrow type', async () => {
      const listing = store.seedListing(buildListing({ status: 'filled', escrowType: 'api_approval' }));
      const order = store.seedOrder(buildOrder(listing, { status: 'paid' }));

      const { transaction } = await service.prepareDelivery(order.id, { walletAddress: SELLER });

      expect(transaction.action).toBe('deliverApiApprovalListing');
      expect(transaction.gas).toBe(500000n);
    });
  });

  describe('prepareAcceptance', () => {
    it('releases the funds to the seller', async () => {
      const listing = store.seedListing(buildListing({ status: 'delivered' }));
      const order = store.seedOrder(buildOrder(listing, { status: 'delivered' }));

      const { transaction } = await service.prepareAcceptance(order.id, { walletAddress: BUYER });

      expect(transaction).toMatchObject({ action: 'resolveListing', toBuyer: false });
      expect(transaction.data).toBe(escrowInterface.encodeFunctionData('resolveListing', [BLOCKCHAIN_LISTING_ID, false]));
    });

    it('refuses the seller', async () => {
      const listing = store.seedListing(buildListing({ status: 'delivered' }));
      const order = store.seedOrder(buildOrder(listing, { status: 'delivered' }));

      await expect(service.prepareAcceptance(order.id, { walletAddress: SELLER })).rejects.toThrow(AuthorizationError);
    });
  });

  describe('prepareDispute', () => {
    it('attaches the entropy fee as the transaction value', async () => {
      const listing = store.seedListing(buildListing({ status: 'filled' }));
      const order = store.seedOrder(buildOrder(listing, { status: 'paid' }));

      const { transaction } = await service.prepareDispute(order.id, { walletAddress: SELLER });

      expect(transaction.value).toBe(1000000000000000n);
      expect(transaction.entropyFee).toEqual({ value: 1000000000000000n, wasFallback: true });
    });

    it('refuses a completed order', async () => {
      const listing = store.seedListing(buildListing({ status: 'released' }));
      const order = store.seedOrder(buildOrder(listing, { status: 'completed' }));

      const error = await captureError(service.prepareDispute(order.id, { walletAddress: BUYER }));

      expect(error).toMatchObject({ message: 'Order is completed, expected paid or delivered' });
    });
  });

  describe('prepareBuyerCancel', () => {
    it('refuses before the delivery deadline has passed', async () => {
      const listing = store.seedListing(buildListing({ status: 'filled' }));
      const order = store.seedOrder(buildOrder(listing, { status: 'paid', deadline: NOW_SECONDS }));

      const error = await captureError(service.prepareBuyerCancel(order.id, { walletAddress: BUYER }));

      expect(error).toMatchObject({ field: 'deadline' });
    });

    it('builds cancelListingByBuyer after the deadline', async () => {
      const listing = store.seedListing(buildListing({ status: 'filled' }));
      const order = store.seedOrder(buildOrder(listing, { status: 'paid', deadline: NOW_SECONDS - 1 }));

      const { transaction } = await service.prepareBuyerCancel(order.id, { walletAddress: BUYER });

      expect(transaction).toMatchObject({ action: 'cancelListingByBuyer', listingId: BLOCKCHAIN_LISTING_ID });
    });
  });

  it('finds an order by its contract-side id', async () => {
    const listing = store.seedListing(buildListing());
    const order = store.seedOrder(buildOrder(listing));

    await expect(service.getOrderByOrderId(order.orderId)).resolves.toEqual(order);
    await expect(service.getOrderByOrderId('0x' + '00'.repeat(32))).rejects.toThrow('Order not found');
  });

  it('reports a missing order', async () => {
    await expect(service.getOrder('4b1c2f6e-8d0a-4c3b-9e7f-1a2b3c4d5e6f')).rejects.toThrow('Order not found');
  });
});
