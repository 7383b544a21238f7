import type { Knex } from 'knex';
import { DisputeRepository, KnexDisputeRepository } from './dispute.model';
import { KnexListingRepository, ListingRepository } from './listing.model';
import { KnexOrderRepository, OrderRepository } from './order.model';

export interface EscrowRepositories {
  listings: ListingRepository;
  orders: OrderRepository;
  disputes: DisputeRepository;
}

/**
 * Repositories plus a unit of work. Writes made through the repositories
 * handed to `transaction` commit together or not at all.
 */
export interface EscrowStore extends EscrowRepositories {
  transaction<T>(work: (repos: EscrowRepositories) => Promise<T>): Promise<T>;
}

function repositoriesFor(db: Knex | Knex.Transaction): EscrowRepositories {
  return {
    listings: new KnexListingRepository(db),
    orders: new KnexOrderRepository(db),
    disputes: new KnexDisputeRepository(db),
  };
}

export class KnexEscrowStore implements EscrowStore {
  readonly listings: ListingRepository;
  readonly orders: OrderRepository;
  readonly disputes: DisputeRepository;

  constructor(private readonly db: Knex) {
    const repos = repositoriesFor(db);
    this.listings = repos.listings;
    this.orders = repos.orders;
    this.disputes = repos.disputes;
  }

  async transaction<T>(work: (repos: EscrowRepositories) => Promise<T>): Promise<T> {
    return this.db.transaction((trx) => work(repositoriesFor(trx)));
  }
}
