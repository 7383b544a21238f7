/**
 * Input validation schemas for the escrow service
 *
 * Every public service operation validates its input through one of these
 * schemas. Addresses come out checksummed, strings trimmed and defaults filled.
 */

import Joi from 'joi';
import { getAddress, isAddress } from 'ethers';
import { DISPUTE_CONSTRAINTS, LISTING_CONSTRAINTS } from '../config/constants';
import { ValidationError } from '../errors';
import {
  API_APPROVAL_METHODS,
  ApiApprovalMethod,
  ESCROW_TYPES,
  EscrowType,
} from '../types/escrow.types';

const TX_HASH_REGEX = /^0x[0-9a-fA-F]{64}$/;
const HEX_BYTES_REGEX = /^0x([0-9a-fA-F]{2})*$/;
const DECIMAL_REGEX = new RegExp(`^\\d+(\\.\\d{1,${LISTING_CONSTRAINTS.MAX_PRICE_DECIMALS}})?$`);

/**
 * Common field validators
 */
const CommonFields = {
  uuid: Joi.string().uuid({ version: 'uuidv4' }).messages({
    'string.guid': '{{#label}} must be a valid UUID'
  }),

  walletAddress: Joi.string()
    .trim()
    .custom((value: string, helpers) => {
      if (!isAddress(value)) {
        return helpers.error('any.invalid');
      }
      return getAddress(value);
    })
    .messages({
      'any.invalid': '{{#label}} must be a valid EVM address'
    }),

  txHash: Joi.string().trim().pattern(TX_HASH_REGEX).lowercase().messages({
    'string.pattern.base': '{{#label}} must be a 32-byte hex transaction hash'
  }),

  hexBytes: Joi.string().trim().pattern(HEX_BYTES_REGEX).messages({
    'string.pattern.base': '{{#label}} must be 0x-prefixed hex bytes'
  }),

  price: Joi.string()
    .trim()
    .pattern(DECIMAL_REGEX)
    .custom((value: string, helpers) => (/[1-9]/.test(value) ? value : helpers.error('number.positive')))
    .messages({
      'string.pattern.base': `{{#label}} must be a decimal with at most ${LISTING_CONSTRAINTS.MAX_PRICE_DECIMALS} fractional digits`,
      'number.positive': '{{#label}} must be greater than zero'
    }),
};

export interface CreateListingInput {
  sellerAddress: string;
  title: string;
  description: string;
  price: string;
  currency: string;
  escrowType: EscrowType;
  listingDurationDays: number;
  apiApprovalMethod?: ApiApprovalMethod;
  tweetUsername?: string;
  crosschainRpcUrl?: string;
  crosschainNftContract?: string;
  crosschainTokenId?: string;
  onchainDestination?: string;
  onchainCallData?: string;
  onchainExpectedResult?: string;
}

export const createListingSchema = Joi.object<CreateListingInput>({
  sellerAddress: CommonFields.walletAddress.required(),
  title: Joi.string().trim().min(1).max(LISTING_CONSTRAINTS.MAX_TITLE_LENGTH).required(),
  description: Joi.string().trim().allow('').max(LISTING_CONSTRAINTS.MAX_DESCRIPTION_LENGTH).default(''),
  price: CommonFields.price.required(),
  currency: Joi.string().trim().uppercase().pattern(/^[A-Z0-9]{2,16}$/).required(),
  escrowType: Joi.string().valid(...ESCROW_TYPES).default('disputable'),
  listingDurationDays: Joi.number()
    .integer()
    .min(LISTING_CONSTRAINTS.MIN_DURATION_DAYS)
    .max(LISTING_CONSTRAINTS.MAX_DURATION_DAYS)
    .required(),

  apiApprovalMethod: Joi.when('escrowType', {
    is: 'api_approval',
    then: Joi.string().valid(...API_APPROVAL_METHODS).required(),
    otherwise: Joi.any().strip()
  }),
  tweetUsername: Joi.when('apiApprovalMethod', {
    is: 'tweet_repost',
    then: Joi.string().trim().min(1).max(64).required(),
    otherwise: Joi.any().strip()
  }),
  crosschainRpcUrl: Joi.when('apiApprovalMethod', {
    is: 'crosschain_nft',
    then: Joi.string().trim().uri({ scheme: ['http', 'https'] }).required(),
    otherwise: Joi.any().strip()
  }),
  crosschainNftContract: Joi.when('apiApprovalMethod', {
    is: 'crosschain_nft',
    then: CommonFields.walletAddress.required(),
    otherwise: Joi.any().strip()
  }),
  crosschainTokenId: Joi.when('apiApprovalMethod', {
    is: 'crosschain_nft',
    then: Joi.string().trim().pattern(/^\d+$/).required(),
    otherwise: Joi.any().strip()
  }),

  onchainDestination: Joi.when('escrowType', {
    is: 'onchain_approval',
    then: CommonFields.walletAddress.required(),
    otherwise: Joi.any().strip()
  }),
  onchainCallData: Joi.when('escrowType', {
    is: 'onchain_approval',
    then: CommonFields.hexBytes.required(),
    otherwise: Joi.any().strip()
  }),
  onchainExpectedResult: Joi.when('escrowType', {
    is: 'onchain_approval',
    then: CommonFields.hexBytes.required(),
    otherwise: Joi.any().strip()
  }),
});

export interface TransactionSubmission {
  walletAddress: string;
  txHash: string;
}

export const transactionSubmissionSchema = Joi.object<TransactionSubmission>({
  walletAddress: CommonFields.walletAddress.required(),
  txHash: CommonFields.txHash.required(),
});

export interface WalletRequest {
  walletAddress: string;
}

export const walletRequestSchema = Joi.object<WalletRequest>({
  walletAddress: CommonFields.walletAddress.required(),
});

export interface PurchaseInput {
  buyerAddress: string;
  deadlineDays: number;
  tweetId?: string;
}

export const purchaseSchema = Joi.object<PurchaseInput>({
  buyerAddress: CommonFields.walletAddress.required(),
  deadlineDays: Joi.number()
    .integer()
    .min(LISTING_CONSTRAINTS.MIN_DEADLINE_DAYS)
    .max(LISTING_CONSTRAINTS.MAX_DEADLINE_DAYS)
    .default(LISTING_CONSTRAINTS.DEFAULT_DEADLINE_DAYS),
  tweetId: Joi.string().trim().pattern(/^\d{1,30}$/).messages({
    'string.pattern.base': '{{#label}} must be a numeric tweet id'
  }),
});

export interface DisputeSubmission extends TransactionSubmission {
  reason: string;
}

export const disputeSubmissionSchema = Joi.object<DisputeSubmission>({
  walletAddress: CommonFields.walletAddress.required(),
  txHash: CommonFields.txHash.required(),
  reason: Joi.string().trim().max(DISPUTE_CONSTRAINTS.MAX_REASON_LENGTH).default('Blockchain dispute initiated'),
});

export interface ResolutionInput {
  notes?: string;
}

export const resolutionSchema = Joi.object<ResolutionInput>({
  notes: Joi.string().trim().max(DISPUTE_CONSTRAINTS.MAX_REASON_LENGTH),
});

export const idSchema = CommonFields.uuid.required();

// Contract-side listing and order ids share the transaction hash shape
export const bytes32Schema = CommonFields.txHash.required().messages({
  'string.pattern.base': '{{#label}} must be a 32-byte hex id'
});

/**
 * Validates `input` against `schema`, returning the converted value or throwing
 * a ValidationError listing every failing field.
 */
export function validate<T>(schema: Joi.Schema<T>, input: unknown): T {
  const { error, value } = schema.validate(input, {
    abortEarly: false,
    stripUnknown: true,
    convert: true
  });

  if (error) {
    const violations = error.details.map((detail) => ({
      field: detail.path.join('.') || 'value',
      message: detail.message
    }));
    throw new ValidationError('Validation failed', violations);
  }

  return value;
}

export { CommonFields };
