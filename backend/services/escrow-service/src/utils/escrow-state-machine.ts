/**
 * Escrow State Machines
 * Enforces valid listing and order status transitions
 */

import { ErrorCode, ValidationError } from '../errors';
import type { BlockchainStatus, ListingStatus, OrderStatus } from '../types/escrow.types';

export class StateMachine<S extends string> {
  constructor(
    private readonly name: string,
    private readonly transitions: Readonly<Record<S, readonly S[]>>
  ) {}

  canTransition(from: S, to: S): boolean {
    return this.transitions[from].includes(to);
  }

  /**
   * Throws ValidationError (INVALID_STATE) when `to` is not reachable from `from`
   * in one step.
   */
  validateTransition(from: S, to: S): void {
    if (!this.canTransition(from, to)) {
      const allowed = this.transitions[from];
      throw new ValidationError(
        `Invalid ${this.name} status transition: ${from} → ${to}. ` +
          `Valid transitions from ${from}: ${allowed.length > 0 ? allowed.join(', ') : 'none (terminal state)'}`,
        [],
        { from, to },
        ErrorCode.INVALID_STATE
      );
    }
  }
}

export const listingStateMachine = new StateMachine<ListingStatus>('listing', {
  inactive: ['open'],
  open: ['filled', 'canceled'],
  filled: ['delivered', 'disputed', 'canceled'],
  delivered: ['released', 'disputed'],
  disputed: ['released', 'refunded'],
  released: [],
  refunded: [],
  canceled: [],
});

export const blockchainStatusMachine = new StateMachine<BlockchainStatus>('blockchain', {
  pending_tx: ['pending_confirmation'],
  pending_confirmation: ['confirmed'],
  confirmed: [],
});

export const orderStateMachine = new StateMachine<OrderStatus>('order', {
  created: ['paid'],
  paid: ['delivered', 'disputed', 'canceled'],
  delivered: ['completed', 'disputed'],
  confirmed: [],
  completed: [],
  disputed: [],
  canceled: [],
});
