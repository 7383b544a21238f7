import { ConfigError } from '../errors';
import type { EscrowType, OnChainListingState } from '../types/escrow.types';

// Declaration order of the contract's EscrowType and State enums
export const CONTRACT_ESCROW_TYPES = ['api_approval', 'onchain_approval', 'disputable'] as const;
export const CONTRACT_LISTING_STATES = [
  'open',
  'filled',
  'delivered',
  'released',
  'refunded',
  'disputed',
  'canceled',
] as const;

export const ESCROW_TYPE_ENUM: Readonly<Record<EscrowType, number>> = {
  api_approval: 0,
  onchain_approval: 1,
  disputable: 2,
};

export const LISTING_STATE_ENUM: Readonly<Record<OnChainListingState, number>> = {
  open: 0,
  filled: 1,
  delivered: 2,
  released: 3,
  refunded: 4,
  disputed: 5,
  canceled: 6,
};

/**
 * Checks that a mapping table numbers exactly the declared members, each at
 * its declaration index. Throws ConfigError on the first discrepancy.
 */
export function assertEnumTable(
  name: string,
  table: Readonly<Record<string, number>>,
  declared: readonly string[]
): void {
  const entries = Object.entries(table);
  if (entries.length !== declared.length) {
    throw new ConfigError(`${name} table has ${entries.length} entries, contract declares ${declared.length}`, {
      enum: name,
    });
  }

  for (const [member, value] of entries) {
    const index = declared.indexOf(member);
    if (index === -1) {
      throw new ConfigError(`${name} table maps unknown member ${member}`, { enum: name, member });
    }
    if (value !== index) {
      throw new ConfigError(`${name}.${member} is ${value}, contract declares ${index}`, {
        enum: name,
        member,
        value,
        expected: index,
      });
    }
  }
}

export function assertEnumMappings(): void {
  assertEnumTable('EscrowType', ESCROW_TYPE_ENUM, CONTRACT_ESCROW_TYPES);
  assertEnumTable('ListingState', LISTING_STATE_ENUM, CONTRACT_LISTING_STATES);
}

export function decodeEscrowType(value: number): EscrowType {
  const member = CONTRACT_ESCROW_TYPES[value];
  if (member === undefined) {
    throw new ConfigError(`Contract returned unknown EscrowType ${value}`, { value });
  }
  return member;
}

export function decodeListingState(value: number): OnChainListingState {
  const member = CONTRACT_LISTING_STATES[value];
  if (member === undefined) {
    throw new ConfigError(`Contract returned unknown listing state ${value}`, { value });
  }
  return member;
}
