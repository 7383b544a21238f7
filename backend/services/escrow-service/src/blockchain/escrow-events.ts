import type { LogDescription } from 'ethers';
import { errorMessage } from '../errors';
import type { EscrowType } from '../types/escrow.types';
import { sameAddress } from '../utils/addresses';
import { logger } from '../utils/logger';
import { escrowInterface } from './abi';
import type { ReceiptLog, ReceiptSummary } from './chain-client';

const log = logger.child({ component: 'EscrowEvents' });

// Every event the escrow contract emits carries this prefix
const EVENT_PREFIX = 'DeBazaar__';

export type EscrowEvent =
  | 'ListingCreated'
  | 'ListingFilled'
  | 'Delivered'
  | 'ApiApprovalRequested'
  | 'Released'
  | 'Resolved'
  | 'Disputed'
  | 'ListingCancelled';

export interface EventExpectation {
  event: EscrowEvent;
  /** Indexed address argument that must equal `address`. */
  party?: { arg: string; address: string };
}

/**
 * What a receipt must show to count as proof of one step: the sending wallet
 * and one of the expected events for the listing.
 */
export interface StepProof {
  sender: string;
  listingId: string;
  events: readonly EventExpectation[];
}

export interface EscrowEventMatch {
  event: EscrowEvent;
  args: Record<string, unknown>;
}

function parseEscrowLog(entry: ReceiptLog): LogDescription | null {
  try {
    return escrowInterface.parseLog({ topics: [...entry.topics], data: entry.data });
  } catch (error) {
    log.debug('Skipping undecodable escrow log', { topic: entry.topics[0], error: errorMessage(error) });
    return null;
  }
}

/**
 * First log of the escrow contract in `receipt` that is one of the expected
 * events for `listingId`, or null.
 */
export function findEscrowEvent(
  receipt: ReceiptSummary,
  escrowAddress: string,
  listingId: string,
  expectations: readonly EventExpectation[]
): EscrowEventMatch | null {
  for (const entry of receipt.logs) {
    if (!sameAddress(entry.address, escrowAddress)) {
      continue;
    }
    const parsed = parseEscrowLog(entry);
    if (!parsed) {
      continue;
    }
    const args: Record<string, unknown> = parsed.args.toObject();
    if (String(args.listingId).toLowerCase() !== listingId.toLowerCase()) {
      continue;
    }
    for (const expectation of expectations) {
      if (parsed.name !== EVENT_PREFIX + expectation.event) {
        continue;
      }
      if (expectation.party && !sameAddress(String(args[expectation.party.arg]), expectation.party.address)) {
        continue;
      }
      return { event: expectation.event, args };
    }
  }
  return null;
}

/**
 * Events a delivery may emit. Disputable listings mark delivery directly,
 * on-chain approvals may release in the same call, API approvals start an
 * oracle request.
 */
export function deliveryEvents(escrowType: EscrowType): EventExpectation[] {
  switch (escrowType) {
    case 'disputable':
      return [{ event: 'Delivered' }];
    case 'onchain_approval':
      return [{ event: 'Delivered' }, { event: 'Released' }];
    case 'api_approval':
      return [{ event: 'ApiApprovalRequested' }, { event: 'Delivered' }];
  }
}
