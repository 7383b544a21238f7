import type { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseError } from '../errors';
import type { ArbitratorResult, Dispute, DisputeStatus, DisputeUpdate, NewDispute } from '../types/escrow.types';
import type { LockOptions } from './listing.model';

export interface DisputeRepository {
  create(input: NewDispute): Promise<Dispute>;
  findById(id: string, options?: LockOptions): Promise<Dispute | null>;
  findByOrderId(orderId: string): Promise<Dispute | null>;
  update(id: string, changes: DisputeUpdate): Promise<Dispute>;
}

export interface DisputeRow {
  id: string;
  order_id: string;
  initiator_address: string;
  reason: string;
  status: DisputeStatus;
  arbitrator_result: ArbitratorResult | null;
  arbitrator_notes: string | null;
  tx_hash: string;
  resolved_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export const DISPUTES_TABLE = 'escrow_disputes';

export class KnexDisputeRepository implements DisputeRepository {
  private tableName = DISPUTES_TABLE;

  constructor(private readonly db: Knex | Knex.Transaction) {}

  async create(input: NewDispute): Promise<Dispute> {
    const [row] = await this.db<DisputeRow>(this.tableName)
      .insert({
        id: uuidv4(),
        order_id: input.orderId,
        initiator_address: input.initiatorAddress,
        reason: input.reason,
        status: 'open',
        tx_hash: input.txHash,
      })
      .returning('*');

    return mapToDispute(row);
  }

  async findById(id: string, options: LockOptions = {}): Promise<Dispute | null> {
    const query = this.db<DisputeRow>(this.tableName).where({ id });
    if (options.forUpdate) {
      query.forUpdate();
    }
    const row = await query.first();
    return row ? mapToDispute(row) : null;
  }

  async findByOrderId(orderId: string): Promise<Dispute | null> {
    const row = await this.db<DisputeRow>(this.tableName).where({ order_id: orderId }).first();
    return row ? mapToDispute(row) : null;
  }

  async update(id: string, changes: DisputeUpdate): Promise<Dispute> {
    const [row] = await this.db<DisputeRow>(this.tableName)
      .where({ id })
      .update({
        ...(changes.status !== undefined && { status: changes.status }),
        ...(changes.arbitratorResult !== undefined && { arbitrator_result: changes.arbitratorResult }),
        ...(changes.arbitratorNotes !== undefined && { arbitrator_notes: changes.arbitratorNotes }),
        ...(changes.resolvedAt !== undefined && { resolved_at: changes.resolvedAt }),
        updated_at: new Date(),
      })
      .returning('*');

    if (!row) {
      throw new DatabaseError(`dispute ${id} does not exist`, { table: this.tableName, id });
    }
    return mapToDispute(row);
  }
}

export function mapToDispute(row: DisputeRow): Dispute {
  return {
    id: row.id,
    orderId: row.order_id,
    initiatorAddress: row.initiator_address,
    reason: row.reason,
    status: row.status,
    arbitratorResult: row.arbitrator_result,
    arbitratorNotes: row.arbitrator_notes,
    txHash: row.tx_hash,
    resolvedAt: row.resolved_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
