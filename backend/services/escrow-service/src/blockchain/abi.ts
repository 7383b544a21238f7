import { Interface } from 'ethers';

const API_APPROVAL_TUPLE =
  'tuple(string source, bytes encryptedSecretsUrls, string[] args, bytes[] bytesArgs, bytes32 requestId)';
const ONCHAIN_APPROVAL_TUPLE = 'tuple(address destination, bytes data, bytes expectedResult)';

export const API_APPROVAL_DATA_TYPE = API_APPROVAL_TUPLE;
export const ONCHAIN_APPROVAL_DATA_TYPE = ONCHAIN_APPROVAL_TUPLE;

export const ESCROW_ABI = [
  'function createListing(bytes32 _listingId, address _token, uint256 _amount, uint64 _expiration, uint8 _escrowType)',
  'function fillListing(bytes32 _listingId, uint64 _deadline, bytes _extraData)',
  'function deliverDisputableListing(bytes32 _listingId)',
  'function deliverOnchainApprovalListing(bytes32 _listingId)',
  'function deliverApiApprovalListing(bytes32 _listingId, string[] _args, bytes[] _bytesArgs, uint8 _donHostedSecretsSlotID, uint64 _donHostedSecretsVersion, uint64 _subscriptionId, uint32 _gasLimit, bytes32 _donID)',
  'function resolveListing(bytes32 _listingId, bool _toBuyer)',
  'function disputeListing(bytes32 _listingId) payable',
  'function cancelListingBySeller(bytes32 _listingId)',
  'function cancelListingByBuyer(bytes32 _listingId)',
  `function getListing(bytes32 _listingId) view returns (tuple(bytes32 listingId, address buyer, address seller, address token, uint256 amount, uint64 expiration, uint64 deadline, uint8 state, uint8 escrowType, ${ONCHAIN_APPROVAL_TUPLE} onchainApprovalData, ${API_APPROVAL_TUPLE} apiApprovalData))`,
  'function isTokenWhitelisted(address _token) view returns (bool)',
  'function getFee() view returns (uint256)',
  'event DeBazaar__ListingCreated(bytes32 indexed listingId, address indexed seller, address indexed token, uint256 amount, uint64 expiration, uint8 escrowType)',
  'event DeBazaar__ListingFilled(bytes32 indexed listingId, address indexed buyer, uint64 deadline)',
  'event DeBazaar__Delivered(bytes32 indexed listingId)',
  'event DeBazaar__ApiApprovalRequested(bytes32 indexed listingId, bytes32 requestId)',
  'event DeBazaar__Released(bytes32 indexed listingId)',
  'event DeBazaar__Refunded(bytes32 indexed listingId)',
  'event DeBazaar__Resolved(bytes32 indexed listingId, address indexed to)',
  'event DeBazaar__Disputed(bytes32 indexed listingId, address indexed sender)',
  'event DeBazaar__ListingCancelled(address indexed sender, bytes32 indexed listingId)',
] as const;

export const ERC20_ABI = [
  'function approve(address spender, uint256 amount) returns (bool)',
  'function allowance(address owner, address spender) view returns (uint256)',
  'function decimals() view returns (uint8)',
  'function balanceOf(address account) view returns (uint256)',
] as const;

export const escrowInterface = new Interface(ESCROW_ABI);
export const erc20Interface = new Interface(ERC20_ABI);
