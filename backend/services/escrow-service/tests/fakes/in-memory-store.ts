import { v4 as uuidv4 } from 'uuid';
import { DatabaseError } from '../../src/errors';
import type { DisputeRepository } from '../../src/models/dispute.model';
import type { EscrowRepositories, EscrowStore } from '../../src/models/escrow.store';
import type { ListingRepository, LockOptions } from '../../src/models/listing.model';
import type { DeliveredOrder, OrderRepository } from '../../src/models/order.model';
import type {
  Dispute,
  DisputeUpdate,
  Listing,
  ListingStatus,
  ListingUpdate,
  NewDispute,
  NewListing,
  NewOrder,
  Order,
  OrderStatus,
  OrderUpdate,
} from '../../src/types/escrow.types';

interface Tables {
  listings: Map<string, Listing>;
  orders: Map<string, Order>;
  disputes: Map<string, Dispute>;
}

function cloneTables(tables: Tables): Tables {
  return {
    listings: new Map([...tables.listings].map(([id, row]) => [id, { ...row }])),
    orders: new Map([...tables.orders].map(([id, row]) => [id, { ...row }])),
    disputes: new Map([...tables.disputes].map(([id, row]) => [id, { ...row }])),
  };
}

/**
 * EscrowStore over Maps. `transaction` works on a copy of the tables and
 * swaps it in only when the work resolves, so a throw rolls everything back.
 * `forUpdate` reads are counted so tests can see that locks were taken.
 */
export class InMemoryEscrowStore implements EscrowStore {
  private tables: Tables = { listings: new Map(), orders: new Map(), disputes: new Map() };
  private sequence = 0;
  lockedReads = 0;
  transactions = 0;

  readonly listings: ListingRepository = this.listingRepository(() => this.tables);
  readonly orders: OrderRepository = this.orderRepository(() => this.tables);
  readonly disputes: DisputeRepository = this.disputeRepository(() => this.tables);

  async transaction<T>(work: (repos: EscrowRepositories) => Promise<T>): Promise<T> {
    this.transactions += 1;
    const draft = cloneTables(this.tables);
    const result = await work({
      listings: this.listingRepository(() => draft),
      orders: this.orderRepository(() => draft),
      disputes: this.disputeRepository(() => draft),
    });
    this.tables = draft;
    return result;
  }

  seedListing(listing: Listing): Listing {
    this.tables.listings.set(listing.id, { ...listing });
    return listing;
  }

  seedOrder(order: Order): Order {
    this.tables.orders.set(order.id, { ...order });
    return order;
  }

  allOrders(): Order[] {
    return [...this.tables.orders.values()].map((row) => ({ ...row }));
  }

  allDisputes(): Dispute[] {
    return [...this.tables.disputes.values()].map((row) => ({ ...row }));
  }

  private touch(options?: LockOptions): void {
    if (options?.forUpdate) {
      this.lockedReads += 1;
    }
  }

  private nextTimestamp(): Date {
    this.sequence += 1;
    return new Date(Date.UTC(2026, 0, 1) + this.sequence);
  }

  private listingRepository(tables: () => Tables): ListingRepository {
    return {
      create: async (input: NewListing) => {
        const createdAt = this.nextTimestamp();
        const listing: Listing = { ...input, id: uuidv4(), createdAt, updatedAt: createdAt };
        for (const existing of tables().listings.values()) {
          if (existing.blockchainListingId === listing.blockchainListingId) {
            throw new DatabaseError('duplicate blockchain_listing_id');
          }
        }
        tables().listings.set(listing.id, listing);
        return { ...listing };
      },
      findById: async (id: string, options?: LockOptions) => {
        this.touch(options);
        const row = tables().listings.get(id);
        return row ? { ...row } : null;
      },
      findByBlockchainId: async (blockchainListingId: string) => {
        const row = [...tables().listings.values()].find((l) => l.blockchainListingId === blockchainListingId);
        return row ? { ...row } : null;
      },
      findByTxHash: async (txHash: string) => {
        const row = [...tables().listings.values()].find(
          (l) => l.creationTxHash === txHash || l.cancelTxHash === txHash
        );
        return row ? { ...row } : null;
      },
      findBySeller: async (sellerAddress: string, status?: ListingStatus) => {
        return [...tables().listings.values()]
          .filter((l) => l.sellerAddress.toLowerCase() === sellerAddress.toLowerCase())
          .filter((l) => status === undefined || l.status === status)
          .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
          .map((row) => ({ ...row }));
      },
      update: async (id: string, changes: ListingUpdate) => {
        const row = tables().listings.get(id);
        if (!row) {
          throw new DatabaseError(`listing ${id} does not exist`);
        }
        const updated: Listing = { ...row, ...changes, updatedAt: this.nextTimestamp() };
        tables().listings.set(id, updated);
        return { ...updated };
      },
    };
  }

  private orderRepository(tables: () => Tables): OrderRepository {
    return {
      create: async (input: NewOrder) => {
        if (input.buyerAddress.toLowerCase() === input.sellerAddress.toLowerCase()) {
          throw new DatabaseError('violates check constraint chk_escrow_orders_distinct_parties');
        }
        const createdAt = this.nextTimestamp();
        const order: Order = { ...input, id: uuidv4(), createdAt, updatedAt: createdAt };
        tables().orders.set(order.id, order);
        return { ...order };
      },
      findById: async (id: string, options?: LockOptions) => {
        this.touch(options);
        const row = tables().orders.get(id);
        return row ? { ...row } : null;
      },
      findByOrderId: async (orderId: string) => {
        const row = [...tables().orders.values()].find((o) => o.orderId === orderId);
        return row ? { ...row } : null;
      },
      findByTxHash: async (txHash: string) => {
        const row = [...tables().orders.values()].find((o) =>
          [o.escrowTxHash, o.deliveryTxHash, o.resolutionTxHash, o.disputeTxHash, o.cancelTxHash].includes(txHash)
        );
        return row ? { ...row } : null;
      },
      findByListing: async (listingId: string, statuses?: readonly OrderStatus[]) => {
        return [...tables().orders.values()]
          .filter((o) => o.listingId === listingId)
          .filter((o) => !statuses || statuses.length === 0 || statuses.includes(o.status))
          .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
          .map((row) => ({ ...row }));
      },
      findDeliveredBefore: async (cutoff: Date, limit: number) => {
        const delivered: DeliveredOrder[] = [];
        for (const order of tables().orders.values()) {
          const listing = tables().listings.get(order.listingId);
          if (order.status === 'delivered' && order.deliveredAt && order.deliveredAt < cutoff && listing) {
            delivered.push({ ...order, blockchainListingId: listing.blockchainListingId });
          }
        }
        return delivered
          .sort((a, b) => (a.deliveredAt?.getTime() ?? 0) - (b.deliveredAt?.getTime() ?? 0))
          .slice(0, limit);
      },
      update: async (id: string, changes: OrderUpdate) => {
        const row = tables().orders.get(id);
        if (!row) {
          throw new DatabaseError(`order ${id} does not exist`);
        }
        const updated: Order = { ...row, ...changes, updatedAt: this.nextTimestamp() };
        tables().orders.set(id, updated);
        return { ...updated };
      },
      delete: async (id: string) => {
        tables().orders.delete(id);
      },
    };
  }

  private disputeRepository(tables: () => Tables): DisputeRepository {
    return {
      create: async (input: NewDispute) => {
        for (const existing of tables().disputes.values()) {
          if (existing.orderId === input.orderId) {
            throw new DatabaseError('duplicate escrow_disputes.order_id');
          }
        }
        const createdAt = this.nextTimestamp();
        const dispute: Dispute = {
          ...input,
          id: uuidv4(),
          status: 'open',
          arbitratorResult: null,
          arbitratorNotes: null,
          resolvedAt: null,
          createdAt,
          updatedAt: createdAt,
        };
        tables().disputes.set(dispute.id, dispute);
        return { ...dispute };
      },
      findById: async (id: string, options?: LockOptions) => {
        this.touch(options);
        const row = tables().disputes.get(id);
        return row ? { ...row } : null;
      },
      findByOrderId: async (orderId: string) => {
        const row = [...tables().disputes.values()].find((d) => d.orderId === orderId);
        return row ? { ...row } : null;
      },
      update: async (id: string, changes: DisputeUpdate) => {
        const row = tables().disputes.get(id);
        if (!row) {
          throw new DatabaseError(`dispute ${id} does not exist`);
        }
        const updated: Dispute = { ...row, ...changes, updatedAt: this.nextTimestamp() };
        tables().disputes.set(id, updated);
        return { ...updated };
      },
    };
  }
}
