export const ESCROW_TYPES = ['disputable', 'api_approval', 'onchain_approval'] as const;
export type EscrowType = (typeof ESCROW_TYPES)[number];

export const API_APPROVAL_METHODS = ['tweet_repost', 'crosschain_nft'] as const;
export type ApiApprovalMethod = (typeof API_APPROVAL_METHODS)[number];

export const LISTING_STATUSES = [
  'inactive',
  'open',
  'filled',
  'delivered',
  'disputed',
  'released',
  'refunded',
  'canceled',
] as const;
export type ListingStatus = (typeof LISTING_STATUSES)[number];

export const BLOCKCHAIN_STATUSES = ['pending_tx', 'pending_confirmation', 'confirmed'] as const;
export type BlockchainStatus = (typeof BLOCKCHAIN_STATUSES)[number];

// 'confirmed' exists for stored data only; acceptance moves delivered -> completed
export const ORDER_STATUSES = [
  'created',
  'paid',
  'delivered',
  'confirmed',
  'completed',
  'disputed',
  'canceled',
] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export type DisputeStatus = 'open' | 'resolved';
export type ArbitratorResult = 'buyer' | 'seller';

/** Listing states as numbered by the escrow contract. */
export type OnChainListingState =
  | 'open'
  | 'filled'
  | 'delivered'
  | 'released'
  | 'refunded'
  | 'disputed'
  | 'canceled';

export interface Listing {
  id: string;
  blockchainListingId: string;
  sellerAddress: string;
  title: string;
  description: string;
  price: string;
  currency: string;
  tokenAddress: string;
  escrowType: EscrowType;
  listingDurationDays: number;

  apiApprovalMethod: ApiApprovalMethod | null;
  tweetUsername: string | null;
  crosschainRpcUrl: string | null;
  crosschainNftContract: string | null;
  crosschainTokenId: string | null;

  onchainDestination: string | null;
  onchainCallData: string | null;
  onchainExpectedResult: string | null;

  status: ListingStatus;
  blockchainStatus: BlockchainStatus;
  creationTxHash: string | null;
  cancelTxHash: string | null;
  blockchainExpiration: number;
  deliveredAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewListing = Omit<Listing, 'id' | 'createdAt' | 'updatedAt'>;
export type ListingUpdate = Partial<
  Pick<Listing, 'status' | 'blockchainStatus' | 'creationTxHash' | 'cancelTxHash' | 'deliveredAt'>
>;

export interface Order {
  id: string;
  orderId: string;
  listingId: string;
  buyerAddress: string;
  sellerAddress: string;
  amount: string;
  tokenAddress: string;
  deadline: number;
  status: OrderStatus;
  escrowTxHash: string | null;
  deliveryTxHash: string | null;
  resolutionTxHash: string | null;
  disputeTxHash: string | null;
  cancelTxHash: string | null;
  deliveredAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewOrder = Omit<Order, 'id' | 'createdAt' | 'updatedAt'>;
export type OrderUpdate = Partial<
  Pick<
    Order,
    | 'status'
    | 'escrowTxHash'
    | 'deliveryTxHash'
    | 'resolutionTxHash'
    | 'disputeTxHash'
    | 'cancelTxHash'
    | 'deliveredAt'
  >
>;

export interface Dispute {
  id: string;
  orderId: string;
  initiatorAddress: string;
  reason: string;
  status: DisputeStatus;
  arbitratorResult: ArbitratorResult | null;
  arbitratorNotes: string | null;
  txHash: string;
  resolvedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewDispute = Pick<Dispute, 'orderId' | 'initiatorAddress' | 'reason' | 'txHash'>;
export type DisputeUpdate = Partial<Pick<Dispute, 'status' | 'arbitratorResult' | 'arbitratorNotes' | 'resolvedAt'>>;

export interface ListingOnChain {
  listingId: string;
  buyer: string;
  seller: string;
  token: string;
  amount: bigint;
  expiration: number;
  deadline: number;
  state: OnChainListingState;
  escrowType: EscrowType;
}
