import type { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseError } from '../errors';
import type { NewOrder, Order, OrderStatus, OrderUpdate } from '../types/escrow.types';
import { normalizeDecimal } from '../utils/amounts';
import { LISTINGS_TABLE, LockOptions } from './listing.model';

export interface DeliveredOrder extends Order {
  blockchainListingId: string;
}

export interface OrderRepository {
  create(input: NewOrder): Promise<Order>;
  findById(id: string, options?: LockOptions): Promise<Order | null>;
  findByOrderId(orderId: string): Promise<Order | null>;
  findByTxHash(txHash: string): Promise<Order | null>;
  findByListing(listingId: string, statuses?: readonly OrderStatus[]): Promise<Order[]>;
  findDeliveredBefore(cutoff: Date, limit: number): Promise<DeliveredOrder[]>;
  update(id: string, changes: OrderUpdate): Promise<Order>;
  delete(id: string): Promise<void>;
}

export interface OrderRow {
  id: string;
  order_id: string;
  listing_id: string;
  buyer_address: string;
  seller_address: string;
  amount: string;
  token_address: string;
  deadline: string | number;
  status: OrderStatus;
  escrow_tx_hash: string | null;
  delivery_tx_hash: string | null;
  resolution_tx_hash: string | null;
  dispute_tx_hash: string | null;
  cancel_tx_hash: string | null;
  delivered_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

interface DeliveredOrderRow extends OrderRow {
  blockchain_listing_id: string;
}

export const ORDERS_TABLE = 'escrow_orders';

export class KnexOrderRepository implements OrderRepository {
  private tableName = ORDERS_TABLE;

  constructor(private readonly db: Knex | Knex.Transaction) {}

  async create(input: NewOrder): Promise<Order> {
    const [row] = await this.db<OrderRow>(this.tableName)
      .insert({
        id: uuidv4(),
        order_id: input.orderId,
        listing_id: input.listingId,
        buyer_address: input.buyerAddress,
        seller_address: input.sellerAddress,
        amount: input.amount,
        token_address: input.tokenAddress,
        deadline: input.deadline,
        status: input.status,
        escrow_tx_hash: input.escrowTxHash,
        delivery_tx_hash: input.deliveryTxHash,
        resolution_tx_hash: input.resolutionTxHash,
        dispute_tx_hash: input.disputeTxHash,
        cancel_tx_hash: input.cancelTxHash,
        delivered_at: input.deliveredAt,
      })
      .returning('*');

    return mapToOrder(row);
  }

  async findById(id: string, options: LockOptions = {}): Promise<Order | null> {
    const query = this.db<OrderRow>(this.tableName).where({ id });
    if (options.forUpdate) {
      query.forUpdate();
    }
    const row = await query.first();
    return row ? mapToOrder(row) : null;
  }

  async findByOrderId(orderId: string): Promise<Order | null> {
    const row = await this.db<OrderRow>(this.tableName).where({ order_id: orderId }).first();
    return row ? mapToOrder(row) : null;
  }

  async findByTxHash(txHash: string): Promise<Order | null> {
    const row = await this.db<OrderRow>(this.tableName)
      .where({ escrow_tx_hash: txHash })
      .orWhere({ delivery_tx_hash: txHash })
      .orWhere({ resolution_tx_hash: txHash })
      .orWhere({ dispute_tx_hash: txHash })
      .orWhere({ cancel_tx_hash: txHash })
      .first();
    return row ? mapToOrder(row) : null;
  }

  async findByListing(listingId: string, statuses?: readonly OrderStatus[]): Promise<Order[]> {
    const query = this.db<OrderRow>(this.tableName).where({ listing_id: listingId }).orderBy('created_at', 'desc');
    if (statuses && statuses.length > 0) {
      query.whereIn('status', [...statuses]);
    }
    const rows = await query;
    return rows.map(mapToOrder);
  }

  async findDeliveredBefore(cutoff: Date, limit: number): Promise<DeliveredOrder[]> {
    const rows: DeliveredOrderRow[] = await this.db(`${this.tableName} as o`)
      .join(`${LISTINGS_TABLE} as l`, 'l.id', 'o.listing_id')
      .where('o.status', 'delivered')
      .whereNotNull('o.delivered_at')
      .where('o.delivered_at', '<', cutoff)
      .orderBy('o.delivered_at', 'asc')
      .limit(limit)
      .select('o.*', 'l.blockchain_listing_id');

    return rows.map((row) => ({ ...mapToOrder(row), blockchainListingId: row.blockchain_listing_id }));
  }

  async update(id: string, changes: OrderUpdate): Promise<Order> {
    const [row] = await this.db<OrderRow>(this.tableName)
      .where({ id })
      .update({
        ...(changes.status !== undefined && { status: changes.status }),
        ...(changes.escrowTxHash !== undefined && { escrow_tx_hash: changes.escrowTxHash }),
        ...(changes.deliveryTxHash !== undefined && { delivery_tx_hash: changes.deliveryTxHash }),
        ...(changes.resolutionTxHash !== undefined && { resolution_tx_hash: changes.resolutionTxHash }),
        ...(changes.disputeTxHash !== undefined && { dispute_tx_hash: changes.disputeTxHash }),
        ...(changes.cancelTxHash !== undefined && { cancel_tx_hash: changes.cancelTxHash }),
        ...(changes.deliveredAt !== undefined && { delivered_at: changes.deliveredAt }),
        updated_at: new Date(),
      })
      .returning('*');

    if (!row) {
      throw new DatabaseError(`order ${id} does not exist`, { table: this.tableName, id });
    }
    return mapToOrder(row);
  }

  async delete(id: string): Promise<void> {
    await this.db<OrderRow>(this.tableName).where({ id }).delete();
  }
}

export function mapToOrder(row: OrderRow): Order {
  return {
    id: row.id,
    orderId: row.order_id,
    listingId: row.listing_id,
    buyerAddress: row.buyer_address,
    sellerAddress: row.seller_address,
    amount: normalizeDecimal(row.amount),
    tokenAddress: row.token_address,
    deadline: Number(row.deadline),
    status: row.status,
    escrowTxHash: row.escrow_tx_hash,
    deliveryTxHash: row.delivery_tx_hash,
    resolutionTxHash: row.resolution_tx_hash,
    disputeTxHash: row.dispute_tx_hash,
    cancelTxHash: row.cancel_tx_hash,
    deliveredAt: row.delivered_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
