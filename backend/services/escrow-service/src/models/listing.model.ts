import type { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseError } from '../errors';
import type {
  ApiApprovalMethod,
  BlockchainStatus,
  EscrowType,
  Listing,
  ListingStatus,
  ListingUpdate,
  NewListing,
} from '../types/escrow.types';
import { normalizeDecimal } from '../utils/amounts';

export interface LockOptions {
  forUpdate?: boolean;
}

export interface ListingRepository {
  create(input: NewListing): Promise<Listing>;
  findById(id: string, options?: LockOptions): Promise<Listing | null>;
  findByBlockchainId(blockchainListingId: string): Promise<Listing | null>;
  findByTxHash(txHash: string): Promise<Listing | null>;
  findBySeller(sellerAddress: string, status?: ListingStatus): Promise<Listing[]>;
  update(id: string, changes: ListingUpdate): Promise<Listing>;
}

export interface ListingRow {
  id: string;
  blockchain_listing_id: string;
  seller_address: string;
  title: string;
  description: string;
  price: string;
  currency: string;
  token_address: string;
  escrow_type: EscrowType;
  listing_duration_days: number;
  api_approval_method: ApiApprovalMethod | null;
  tweet_username: string | null;
  crosschain_rpc_url: string | null;
  crosschain_nft_contract: string | null;
  crosschain_token_id: string | null;
  onchain_destination: string | null;
  onchain_call_data: string | null;
  onchain_expected_result: string | null;
  status: ListingStatus;
  blockchain_status: BlockchainStatus;
  creation_tx_hash: string | null;
  cancel_tx_hash: string | null;
  blockchain_expiration: string | number;
  delivered_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export const LISTINGS_TABLE = 'escrow_listings';

export class KnexListingRepository implements ListingRepository {
  private tableName = LISTINGS_TABLE;

  constructor(private readonly db: Knex | Knex.Transaction) {}

  async create(input: NewListing): Promise<Listing> {
    const [row] = await this.db<ListingRow>(this.tableName)
      .insert({
        id: uuidv4(),
        blockchain_listing_id: input.blockchainListingId,
        seller_address: input.sellerAddress,
        title: input.title,
        description: input.description,
        price: input.price,
        currency: input.currency,
        token_address: input.tokenAddress,
        escrow_type: input.escrowType,
        listing_duration_days: input.listingDurationDays,
        api_approval_method: input.apiApprovalMethod,
        tweet_username: input.tweetUsername,
        crosschain_rpc_url: input.crosschainRpcUrl,
        crosschain_nft_contract: input.crosschainNftContract,
        crosschain_token_id: input.crosschainTokenId,
        onchain_destination: input.onchainDestination,
        onchain_call_data: input.onchainCallData,
        onchain_expected_result: input.onchainExpectedResult,
        status: input.status,
        blockchain_status: input.blockchainStatus,
        creation_tx_hash: input.creationTxHash,
        cancel_tx_hash: input.cancelTxHash,
        blockchain_expiration: input.blockchainExpiration,
        delivered_at: input.deliveredAt,
      })
      .returning('*');

    return mapToListing(row);
  }

  async findById(id: string, options: LockOptions = {}): Promise<Listing | null> {
    const query = this.db<ListingRow>(this.tableName).where({ id });
    if (options.forUpdate) {
      query.forUpdate();
    }
    const row = await query.first();
    return row ? mapToListing(row) : null;
  }

  async findByBlockchainId(blockchainListingId: string): Promise<Listing | null> {
    const row = await this.db<ListingRow>(this.tableName)
      .where({ blockchain_listing_id: blockchainListingId })
      .first();
    return row ? mapToListing(row) : null;
  }

  async findByTxHash(txHash: string): Promise<Listing | null> {
    const row = await this.db<ListingRow>(this.tableName)
      .where({ creation_tx_hash: txHash })
      .orWhere({ cancel_tx_hash: txHash })
      .first();
    return row ? mapToListing(row) : null;
  }

  async findBySeller(sellerAddress: string, status?: ListingStatus): Promise<Listing[]> {
    const query = this.db<ListingRow>(this.tableName)
      .whereRaw('lower(seller_address) = ?', [sellerAddress.toLowerCase()])
      .orderBy('created_at', 'desc');
    if (status) {
      query.where({ status });
    }
    const rows = await query;
    return rows.map(mapToListing);
  }

  async update(id: string, changes: ListingUpdate): Promise<Listing> {
    const [row] = await this.db<ListingRow>(this.tableName)
      .where({ id })
      .update({
        ...(changes.status !== undefined && { status: changes.status }),
        ...(changes.blockchainStatus !== undefined && { blockchain_status: changes.blockchainStatus }),
        ...(changes.creationTxHash !== undefined && { creation_tx_hash: changes.creationTxHash }),
        ...(changes.cancelTxHash !== undefined && { cancel_tx_hash: changes.cancelTxHash }),
        ...(changes.deliveredAt !== undefined && { delivered_at: changes.deliveredAt }),
        updated_at: new Date(),
      })
      .returning('*');

    if (!row) {
      throw new DatabaseError(`listing ${id} does not exist`, { table: this.tableName, id });
    }
    return mapToListing(row);
  }
}

export function mapToListing(row: ListingRow): Listing {
  return {
    id: row.id,
    blockchainListingId: row.blockchain_listing_id,
    sellerAddress: row.seller_address,
    title: row.title,
    description: row.description,
    price: normalizeDecimal(row.price),
    currency: row.currency,
    tokenAddress: row.token_address,
    escrowType: row.escrow_type,
    listingDurationDays: row.listing_duration_days,
    apiApprovalMethod: row.api_approval_method,
    tweetUsername: row.tweet_username,
    crosschainRpcUrl: row.crosschain_rpc_url,
    crosschainNftContract: row.crosschain_nft_contract,
    crosschainTokenId: row.crosschain_token_id,
    onchainDestination: row.onchain_destination,
    onchainCallData: row.onchain_call_data,
    onchainExpectedResult: row.onchain_expected_result,
    status: row.status,
    blockchainStatus: row.blockchain_status,
    creationTxHash: row.creation_tx_hash,
    cancelTxHash: row.cancel_tx_hash,
    blockchainExpiration: Number(row.blockchain_expiration),
    deliveredAt: row.delivered_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
