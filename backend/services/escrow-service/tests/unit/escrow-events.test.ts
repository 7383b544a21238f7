import { ZeroHash } from 'ethers';
import type { ReceiptSummary } from '../../src/blockchain/chain-client';
import { deliveryEvents, findEscrowEvent } from '../../src/blockchain/escrow-events';
import { escrowLog } from '../fakes/fake-chain-client';
import { BLOCKCHAIN_LISTING_ID, BUYER, ESCROW_ADDRESS, SELLER, TX_FILL } from '../fixtures/escrow';

function receiptWith(logs: ReceiptSummary['logs']): ReceiptSummary {
  return { txHash: TX_FILL, to: ESCROW_ADDRESS, from: BUYER, blockNumber: 9, gasUsed: 21000n, logs };
}

describe('findEscrowEvent', () => {
  it('matches the expected event for the listing and party', () => {
    const receipt = receiptWith([escrowLog('ListingFilled', BUYER)]);

    const match = findEscrowEvent(receipt, ESCROW_ADDRESS, BLOCKCHAIN_LISTING_ID, [
      { event: 'ListingFilled', party: { arg: 'buyer', address: BUYER } },
    ]);

    expect(match?.event).toBe('ListingFilled');
    expect(match?.args.listingId).toBe(BLOCKCHAIN_LISTING_ID);
  });

  it('compares listing ids in any hex case', () => {
    const receipt = receiptWith([escrowLog('Delivered', SELLER, '0x' + 'ab'.repeat(32))]);

    const match = findEscrowEvent(receipt, ESCROW_ADDRESS, '0x' + 'AB'.repeat(32), [{ event: 'Delivered' }]);

    expect(match?.event).toBe('Delivered');
  });

  it('skips logs the escrow interface cannot decode', () => {
    const receipt = receiptWith([
      { address: ESCROW_ADDRESS, topics: [ZeroHash], data: '0x' },
      escrowLog('Released', SELLER),
    ]);

    const match = findEscrowEvent(receipt, ESCROW_ADDRESS, BLOCKCHAIN_LISTING_ID, [{ event: 'Released' }]);

    expect(match?.event).toBe('Released');
  });

  it('returns null when the party differs', () => {
    const receipt = receiptWith([escrowLog('Disputed', SELLER)]);

    expect(
      findEscrowEvent(receipt, ESCROW_ADDRESS, BLOCKCHAIN_LISTING_ID, [
        { event: 'Disputed', party: { arg: 'sender', address: BUYER } },
      ])
    ).toBeNull();
  });

  it('returns null for a receipt without logs', () => {
    expect(findEscrowEvent(receiptWith([]), ESCROW_ADDRESS, BLOCKCHAIN_LISTING_ID, [{ event: 'Delivered' }])).toBeNull();
  });
});

describe('deliveryEvents', () => {
  it('depends on the escrow type', () => {
    expect(deliveryEvents('disputable')).toEqual([{ event: 'Delivered' }]);
    expect(deliveryEvents('onchain_approval')).toEqual([{ event: 'Delivered' }, { event: 'Released' }]);
    expect(deliveryEvents('api_approval')).toEqual([{ event: 'ApiApprovalRequested' }, { event: 'Delivered' }]);
  });
});
