import type { ChainClient } from '../blockchain/chain-client';
import type { NetworkRegistry } from '../blockchain/network-registry';
import { TIME } from '../config/constants';
import { AuthorizationError, NotFoundError, ValidationError, VerificationError } from '../errors';
import type { EscrowStore } from '../models/escrow.store';
import {
  bytes32Schema,
  createListingSchema,
  idSchema,
  transactionSubmissionSchema,
  validate,
  walletRequestSchema,
} from '../schemas/validation';
import type { Listing, ListingOnChain } from '../types/escrow.types';
import type { ApproveTokenTx, CancelListingTx, CreateListingTx } from '../types/transaction.types';
import { sameAddress } from '../utils/addresses';
import { blockchainStatusMachine, listingStateMachine } from '../utils/escrow-state-machine';
import type { Fallback } from '../utils/fallback';
import { generateId } from '../utils/identifiers';
import { logger } from '../utils/logger';
import type { TransactionBuilder } from './transaction-builder.service';

export interface ListingServiceOptions {
  store: EscrowStore;
  builder: TransactionBuilder;
  chain: ChainClient;
  registry: NetworkRegistry;
  networkName: string;
  now?: () => Date;
}

export interface PreparedListing {
  listing: Listing;
  transaction: CreateListingTx;
  decimals: Fallback<number>;
  whitelisted: Fallback<boolean>;
}

export interface PreparedTokenApproval {
  transaction: ApproveTokenTx;
  required: bigint;
  allowance: Fallback<bigint>;
  balance: Fallback<bigint>;
  sufficientAllowance: boolean;
  sufficientBalance: boolean;
}

export class ListingService {
  private log = logger.child({ component: 'ListingService' });
  private readonly store: EscrowStore;
  private readonly builder: TransactionBuilder;
  private readonly chain: ChainClient;
  private readonly registry: NetworkRegistry;
  private readonly networkName: string;
  private readonly now: () => Date;

  constructor(options: ListingServiceOptions) {
    this.store = options.store;
    this.builder = options.builder;
    this.chain = options.chain;
    this.registry = options.registry;
    this.networkName = options.networkName;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Persists a new inactive listing and returns the createListing
   * transaction the seller must sign.
   *
   * A token the contract reports as not whitelisted is rejected. When the
   * whitelist read itself fails the listing goes ahead and the contract has
   * the final say.
   */
  async prepareCreateListing(input: unknown): Promise<PreparedListing> {
    const data = validate(createListingSchema, input);
    const tokenAddress = this.registry.resolveTokenAddress(this.networkName, data.currency);

    const whitelisted = await this.chain.isTokenWhitelisted(tokenAddress);
    if (!whitelisted.value && !whitelisted.wasFallback) {
      throw ValidationError.invalidField('currency', `${data.currency} is not accepted by the escrow contract`);
    }

    const createdAtSeconds = Math.floor(this.now().getTime() / 1000);
    const blockchainListingId = generateId([data.sellerAddress, data.title], createdAtSeconds);
    const blockchainExpiration = createdAtSeconds + data.listingDurationDays * TIME.SECONDS_PER_DAY;

    const { minorUnits, decimals } = await this.builder.scaleAmount(data.price, tokenAddress);
    if (minorUnits === 0n) {
      throw ValidationError.invalidField('price', `rounds to zero at ${decimals.value} decimals`);
    }

    const transaction = await this.builder.buildCreateListing({
      listingId: blockchainListingId,
      tokenAddress,
      amount: minorUnits,
      expiration: blockchainExpiration,
      escrowType: data.escrowType,
      from: data.sellerAddress,
    });

    const listing = await this.store.listings.create({
      blockchainListingId,
      sellerAddress: data.sellerAddress,
      title: data.title,
      description: data.description,
      price: data.price,
      currency: data.currency,
      tokenAddress,
      escrowType: data.escrowType,
      listingDurationDays: data.listingDurationDays,
      apiApprovalMethod: data.apiApprovalMethod ?? null,
      tweetUsername: data.tweetUsername ?? null,
      crosschainRpcUrl: data.crosschainRpcUrl ?? null,
      crosschainNftContract: data.crosschainNftContract ?? null,
      crosschainTokenId: data.crosschainTokenId ?? null,
      onchainDestination: data.onchainDestination ?? null,
      onchainCallData: data.onchainCallData ?? null,
      onchainExpectedResult: data.onchainExpectedResult ?? null,
      status: 'inactive',
      blockchainStatus: 'pending_tx',
      creationTxHash: null,
      cancelTxHash: null,
      blockchainExpiration,
      deliveredAt: null,
    });

    this.log.info('Listing prepared', {
      listingId: listing.id,
      blockchainListingId,
      escrowType: listing.escrowType,
      amount: minorUnits,
    });

    return { listing, transaction, decimals, whitelisted };
  }

  /**
   * Stores the hash of the seller's broadcast createListing transaction.
   * pending_tx -> pending_confirmation
   */
  async recordCreationTx(listingId: string, input: unknown): Promise<Listing> {
    const id = validate(idSchema, listingId);
    const { walletAddress, txHash } = validate(transactionSubmissionSchema, input);

    return this.store.transaction(async (repos) => {
      const listing = await repos.listings.findById(id, { forUpdate: true });
      if (!listing) {
        throw new NotFoundError('Listing', { listingId: id });
      }
      if (!sameAddress(listing.sellerAddress, walletAddress)) {
        throw AuthorizationError.notSeller('listing');
      }
      if (listing.creationTxHash) {
        if (listing.creationTxHash !== txHash) {
          throw VerificationError.hashMismatch(txHash, listing.creationTxHash);
        }
        return listing;
      }

      blockchainStatusMachine.validateTransition(listing.blockchainStatus, 'pending_confirmation');
      if ((await repos.listings.findByTxHash(txHash)) || (await repos.orders.findByTxHash(txHash))) {
        throw VerificationError.hashReused(txHash);
      }
      const updated = await repos.listings.update(id, {
        blockchainStatus: 'pending_confirmation',
        creationTxHash: txHash,
      });
      this.log.info('Creation transaction recorded', { listingId: id, txHash });
      return updated;
    });
  }

  /**
   * cancelListingBySeller for an open listing.
   */
  async prepareCancel(listingId: string, input: unknown): Promise<CancelListingTx> {
    const id = validate(idSchema, listingId);
    const { walletAddress } = validate(walletRequestSchema, input);

    const listing = await this.getListing(id);
    if (!sameAddress(listing.sellerAddress, walletAddress)) {
      throw AuthorizationError.notSeller('listing');
    }
    if (listing.status !== 'open') {
      throw ValidationError.invalidState('Listing', listing.status, ['open']);
    }
    listingStateMachine.validateTransition(listing.status, 'canceled');

    return this.builder.buildCancelListing({
      listingId: listing.blockchainListingId,
      by: 'seller',
      from: walletAddress,
    });
  }

  /**
   * ERC-20 approval a buyer needs before filling the listing, with the
   * buyer's current allowance and balance for the listing's token.
   */
  async prepareTokenApproval(listingId: string, input: unknown): Promise<PreparedTokenApproval> {
    const id = validate(idSchema, listingId);
    const { walletAddress } = validate(walletRequestSchema, input);

    const listing = await this.getListing(id);
    if (sameAddress(listing.sellerAddress, walletAddress)) {
      throw ValidationError.invalidField('walletAddress', 'seller cannot buy their own listing');
    }

    const { minorUnits } = await this.builder.scaleAmount(listing.price, listing.tokenAddress);
    const [allowance, balance] = await Promise.all([
      this.chain.tokenAllowance(listing.tokenAddress, walletAddress, this.builder.escrowAddress),
      this.chain.tokenBalance(listing.tokenAddress, walletAddress),
    ]);

    const transaction = await this.builder.buildApproveToken({
      tokenAddress: listing.tokenAddress,
      amount: minorUnits,
      from: walletAddress,
    });

    return {
      transaction,
      required: minorUnits,
      allowance,
      balance,
      sufficientAllowance: allowance.value >= minorUnits,
      sufficientBalance: balance.value >= minorUnits,
    };
  }

  async getListing(listingId: string): Promise<Listing> {
    const id = validate(idSchema, listingId);
    const listing = await this.store.listings.findById(id);
    if (!listing) {
      throw new NotFoundError('Listing', { listingId: id });
    }
    return listing;
  }

  /**
   * Looks a listing up by the id the contract knows it under.
   */
  async getListingByBlockchainId(blockchainListingId: string): Promise<Listing> {
    const id = validate(bytes32Schema, blockchainListingId);
    const listing = await this.store.listings.findByBlockchainId(id);
    if (!listing) {
      throw new NotFoundError('Listing', { blockchainListingId: id });
    }
    return listing;
  }

  async getOnChainStatus(listingId: string): Promise<ListingOnChain> {
    const listing = await this.getListing(listingId);
    if (listing.blockchainStatus !== 'confirmed') {
      throw ValidationError.invalidState('Listing', listing.blockchainStatus, ['confirmed']);
    }
    return this.chain.readListing(listing.blockchainListingId);
  }

  async listBySeller(sellerAddress: string): Promise<Listing[]> {
    const { walletAddress } = validate(walletRequestSchema, { walletAddress: sellerAddress });
    return this.store.listings.findBySeller(walletAddress);
  }
}
