import { EscrowCore, createEscrowCore } from '../../src/app';
import { loadConfig } from '../../src/config';
import { toWalletRequest } from '../../src/services/transaction-builder.service';
import type { Listing } from '../../src/types/escrow.types';
import { FakeChainClient } from '../fakes/fake-chain-client';
import { InMemoryEscrowStore } from '../fakes/in-memory-store';
import {
  BUYER,
  ESCROW_ADDRESS,
  NOW,
  SELLER,
  TEST_ORACLE,
  TX_ACCEPT,
  TX_CREATE,
  TX_DELIVER,
  TX_DISPUTE,
  TX_FILL,
} from '../fixtures/escrow';

describe('escrow lifecycle', () => {
  let store: InMemoryEscrowStore;
  let chain: FakeChainClient;
  let core: EscrowCore;

  beforeEach(async () => {
    store = new InMemoryEscrowStore();
    chain = new FakeChainClient();
    core = await createEscrowCore(loadConfig({ NODE_ENV: 'test' }), {
      store,
      chain,
      oracleSources: TEST_ORACLE.sources,
      now: () => NOW,
    });
  });

  async function openListing(): Promise<Listing> {
    const { listing, transaction } = await core.listings.prepareCreateListing({
      sellerAddress: SELLER,
      title: 'Vintage synthesizer',
      price: '100.5',
      currency: 'USDC',
      listingDurationDays: 30,
    });
    expect(toWalletRequest(transaction).to).toBe(ESCROW_ADDRESS);

    await core.listings.recordCreationTx(listing.id, { walletAddress: SELLER, txHash: TX_CREATE });
    chain.mineEvent(TX_CREATE, SELLER, 'ListingCreated', listing.blockchainListingId);
    const opened = await core.reconciliation.finalizeListing(listing.id, { walletAddress: SELLER });
    expect(opened.status).toBe('open');
    return opened;
  }

  async function deliveredOrder(listing: Listing): Promise<string> {
    const { order } = await core.orders.preparePurchase(listing.id, { buyerAddress: BUYER });
    chain.mineEvent(TX_FILL, BUYER, 'ListingFilled', listing.blockchainListingId);
    await core.reconciliation.confirmPurchase(order.id, { walletAddress: BUYER, txHash: TX_FILL });

    await core.orders.prepareDelivery(order.id, { walletAddress: SELLER });
    chain.mineEvent(TX_DELIVER, SELLER, 'Delivered', listing.blockchainListingId);
    await core.reconciliation.confirmDelivery(order.id, { walletAddress: SELLER, txHash: TX_DELIVER });
    return order.id;
  }

  it('wires the core without a database when a store is supplied', () => {
    expect(core.db).toBeNull();
    expect(core.builder.escrowAddress).toBe(ESCROW_ADDRESS);
    expect(core.disputeScanJob.running).toBe(false);
  });

  it('releases the funds after buyer acceptance', async () => {
    const listing = await openListing();
    const orderId = await deliveredOrder(listing);

    const scan = await core.disputeScanner.scan();
    expect(scan.count).toBe(0);

    await core.orders.prepareAcceptance(orderId, { walletAddress: BUYER });
    chain.mineEvent(TX_ACCEPT, BUYER, 'Released', listing.blockchainListingId);
    const accepted = await core.reconciliation.confirmAcceptance(orderId, { walletAddress: BUYER, txHash: TX_ACCEPT });

    expect(accepted.order.status).toBe('completed');
    expect(accepted.listing.status).toBe('released');
  });

  it('settles a seller dispute from the arbiter outcome', async () => {
    const opened = await openListing();
    const orderId = await deliveredOrder(opened);

    const { transaction } = await core.orders.prepareDispute(orderId, { walletAddress: SELLER });
    expect(transaction.value).toBe(1000000000000000n);
    chain.mineEvent(TX_DISPUTE, SELLER, 'Disputed', opened.blockchainListingId);
    const { dispute, listing } = await core.reconciliation.confirmDispute(orderId, {
      walletAddress: SELLER,
      txHash: TX_DISPUTE,
      reason: 'Buyer went silent after delivery',
    });

    chain.onChainListings.set(listing.blockchainListingId, { state: 'released' });
    const resolution = await core.disputes.recordResolution(dispute.id);

    expect(resolution.dispute.arbitratorResult).toBe('seller');
    expect(resolution.listing.status).toBe('released');
    expect((await core.disputes.getDisputeForOrder(orderId)).status).toBe('resolved');
  });
});
